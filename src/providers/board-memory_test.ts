import { Effect, Either } from "effect";
import { expect, test } from "vitest";
import { layoutText } from "../grid.ts";
import { makeMemoryBoard } from "./board-memory.ts";

test("makeMemoryBoard: starts blank", async () => {
  const grid = await Effect.runPromise(
    makeMemoryBoard().pipe(Effect.flatMap((board) => board.service.read)),
  );
  expect(grid).toEqual(layoutText(""));
});

test("makeMemoryBoard: post lays out the text and records it", async () => {
  const { posts, shown } = await Effect.runPromise(
    Effect.gen(function* () {
      const board = yield* makeMemoryBoard();
      yield* board.service.post("A\nB");
      return { posts: yield* board.posts, shown: yield* board.service.read };
    }),
  );
  expect(posts).toEqual(["A\nB"]);
  expect(shown[0][0]).toBe(1);
  expect(shown[1][0]).toBe(2);
});

test("makeMemoryBoard: raw rejects a grid of the wrong shape", async () => {
  const result = await Effect.runPromise(
    makeMemoryBoard().pipe(
      Effect.flatMap((board) => board.service.raw([[1, 2, 3]])),
      Effect.either,
    ),
  );
  expect(Either.isLeft(result)).toBe(true);
  if (Either.isLeft(result)) {
    expect(result.left.message).toBe("grid must be 6x22");
  }
});

test("makeMemoryBoard: failSends records the write but rejects it", async () => {
  const { result, posts, shown } = await Effect.runPromise(
    Effect.gen(function* () {
      const board = yield* makeMemoryBoard({ failSends: true });
      const result = yield* Effect.either(board.service.post("HI"));
      return {
        result,
        posts: yield* board.posts,
        shown: yield* board.service.read,
      };
    }),
  );
  expect(Either.isLeft(result)).toBe(true);
  expect(posts).toEqual(["HI"]);
  expect(shown).toEqual(layoutText(""));
});
