import { Effect, Either } from "effect";
import { expect, test } from "vitest";
import { markupPage, metalQuoteQuery, nextDataPage } from "./fixtures.ts";
import { STRATEGY_NAMES, strategyFor } from "./index.ts";
import { firstSuccessful } from "./strategy.ts";

// --- strategyFor ---

test("strategyFor: each name resolves to a strategy of that name", () => {
  for (const name of STRATEGY_NAMES) {
    expect(strategyFor(name).name).toBe(name);
  }
});

// --- auto ---

test("auto: prefers the page data over the markup", async () => {
  const html = nextDataPage([metalQuoteQuery({ bid: 4015.5, ask: 4016.2 })])
    .replace("</body>", `${markupPage({ bid: "1.00", ask: "2.00" })}</body>`);
  const result = await Effect.runPromise(
    Effect.either(strategyFor("auto").extract(html, "gold")),
  );
  expect(result).toEqual(Either.right({ bid: "4,015.50", ask: "4,016.20" }));
});

test("auto: falls through to the markup", async () => {
  const result = await Effect.runPromise(
    Effect.either(
      strategyFor("auto").extract(markupPage({ bid: "49.10", ask: "49.35" }), "silver"),
    ),
  );
  expect(result).toEqual(Either.right({ bid: "49.10", ask: "49.35" }));
});

test("auto: reports the last strategy's error when all fail", async () => {
  const result = await Effect.runPromise(
    Effect.either(strategyFor("auto").extract(markupPage({ bid: "49.10" }), "silver")),
  );
  expect(Either.isLeft(result)).toBe(true);
  if (Either.isLeft(result)) {
    expect(result.left.message).toBe("markup: could not find ask price for silver");
  }
});

// --- firstSuccessful ---

test("firstSuccessful: with no strategies fails", async () => {
  const result = await Effect.runPromise(
    Effect.either(firstSuccessful("none", []).extract("<html></html>", "gold")),
  );
  expect(Either.isLeft(result)).toBe(true);
  if (Either.isLeft(result)) {
    expect(result.left.message).toBe("No extraction strategies configured");
  }
});
