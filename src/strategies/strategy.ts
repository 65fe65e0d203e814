// Extraction strategies — how a bid/ask pair is found in a fetched page.
//
// The page layout of the price source drifts. Each strategy loads the page
// into whatever form it reads best, then runs two independent lookups, one
// for the bid and one for the ask. A layout change should only ever touch a
// lookup.

import { Console, Effect, Option, type Scope } from "effect";
import type { Metal } from "../domain.ts";
import { ExtractionFailed } from "../metals-api.ts";

// --- Types ---

export interface RawQuote {
  readonly bid: string;
  readonly ask: string;
}

export interface ExtractionStrategy {
  readonly name: string;
  readonly extract: (
    html: string,
    metal: Metal,
  ) => Effect.Effect<RawQuote, ExtractionFailed>;
}

/** Finds one price in a loaded page. */
export type Lookup<Page> = (page: Page) => Option.Option<string>;

export interface LookupStrategyConfig<Page> {
  readonly name: string;
  /** Resources acquired while loading are released once both lookups ran. */
  readonly load: (
    html: string,
    metal: Metal,
  ) => Effect.Effect<Page, ExtractionFailed, Scope.Scope>;
  readonly bid: Lookup<Page>;
  readonly ask: Lookup<Page>;
}

// --- Helpers ---

/** Trimmed text, or none when blank. */
export function nonEmpty(text: string | null | undefined): Option.Option<string> {
  return Option.fromNullable(text).pipe(
    Option.map((t) => t.trim()),
    Option.filter((t) => t.length > 0),
  );
}

const priceFormat = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** 4015.5 -> "4,015.50" */
export function formatPrice(value: number): string {
  return priceFormat.format(value);
}

// --- Constructors ---

export function makeLookupStrategy<Page>(
  config: LookupStrategyConfig<Page>,
): ExtractionStrategy {
  const { name, load, bid, ask } = config;
  return {
    name,
    extract: (html, metal) =>
      Effect.scoped(
        Effect.gen(function* () {
          const page = yield* load(html, metal);
          const found = { bid: bid(page), ask: ask(page) };
          if (Option.isSome(found.bid) && Option.isSome(found.ask)) {
            return { bid: found.bid.value, ask: found.ask.value };
          }
          const missing = (["bid", "ask"] as const)
            .filter((side) => Option.isNone(found[side]))
            .join(" and ");
          return yield* Effect.fail(
            new ExtractionFailed({
              metal,
              message: `${name}: could not find ${missing} price for ${metal}`,
            }),
          );
        }),
      ),
  };
}

/** Try each strategy on the same page in order. The page is fetched once,
 *  so falling through costs no extra request. */
export function firstSuccessful(
  name: string,
  strategies: readonly ExtractionStrategy[],
): ExtractionStrategy {
  return {
    name,
    extract: (html, metal) => {
      const loop = (
        index: number,
        lastError: ExtractionFailed,
      ): Effect.Effect<RawQuote, ExtractionFailed> => {
        if (index >= strategies.length) return Effect.fail(lastError);

        const strategy = strategies[index];

        return Console.debug(`[extract] trying ${strategy.name} for ${metal}...`)
          .pipe(
            Effect.flatMap(() => strategy.extract(html, metal)),
            Effect.catchTag("ExtractionFailed", (e) =>
              Console.debug(`[extract] ${e.message}`).pipe(
                Effect.flatMap(() => loop(index + 1, e)),
              )),
          );
      };

      return loop(
        0,
        new ExtractionFailed({
          metal,
          message: "No extraction strategies configured",
        }),
      );
    },
  };
}
