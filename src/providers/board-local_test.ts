import { Effect, Either } from "effect";
import { expect, test } from "vitest";
import { colorTestGrid, layoutText } from "../grid.ts";
import { decodeBoardResponse } from "./board-local.ts";

// --- decodeBoardResponse ---

test("decodeBoardResponse: unwraps a message envelope", async () => {
  const grid = layoutText("HELLO");
  const result = await Effect.runPromise(
    Effect.either(decodeBoardResponse({ message: grid })),
  );
  expect(result).toEqual(Either.right(grid));
});

test("decodeBoardResponse: accepts a bare grid", async () => {
  const result = await Effect.runPromise(
    Effect.either(decodeBoardResponse(colorTestGrid())),
  );
  expect(result).toEqual(Either.right(colorTestGrid()));
});

test("decodeBoardResponse: wrong shape is a read failure", async () => {
  const result = await Effect.runPromise(
    Effect.either(decodeBoardResponse({ message: [[0, 0]] })),
  );
  expect(Either.isLeft(result)).toBe(true);
  if (Either.isLeft(result)) {
    expect(result.left._tag).toBe("ReadFailed");
    expect(result.left.message).toBe("Board returned a grid that is not 6x22");
  }
});

test("decodeBoardResponse: non-grid payload is a read failure", async () => {
  const result = await Effect.runPromise(
    Effect.either(decodeBoardResponse({ status: "ok" })),
  );
  expect(Either.isLeft(result)).toBe(true);
  if (Either.isLeft(result)) {
    expect(result.left.message.startsWith("Invalid board response:")).toBe(true);
  }
});
