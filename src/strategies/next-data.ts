// Structured-data strategy — reads the JSON state the page ships in
// script#__NEXT_DATA__ for client hydration.

import * as cheerio from "cheerio";
import { Effect, Option, Schema } from "effect";
import type { Metal } from "../domain.ts";
import { ExtractionFailed } from "../metals-api.ts";
import { formatPrice, makeLookupStrategy } from "./strategy.ts";

// --- Page data schema ---

const Query = Schema.Struct({
  queryKey: Schema.optional(Schema.Array(Schema.Unknown)),
  state: Schema.optional(
    Schema.Struct({ data: Schema.optional(Schema.Unknown) }),
  ),
});

const NextData = Schema.Struct({
  props: Schema.Struct({
    pageProps: Schema.Struct({
      dehydratedState: Schema.Struct({
        queries: Schema.Array(Query),
      }),
    }),
  }),
});

const Price = Schema.optional(Schema.NullOr(Schema.Number));

const MetalQuoteData = Schema.Struct({
  GetMetalQuoteV3: Schema.Struct({
    results: Schema.Array(Schema.Struct({ bid: Price, ask: Price })),
  }),
});

export type MetalQuoteResult =
  (typeof MetalQuoteData.Type)["GetMetalQuoteV3"]["results"][number];

const METAL_QUOTE_KEY = "metalQuote";

// --- Decode ---

/** First non-empty metalQuote result in the page's hydration state. */
export function findMetalQuote(
  json: unknown,
  metal: Metal,
): Effect.Effect<MetalQuoteResult, ExtractionFailed> {
  return Schema.decodeUnknown(NextData)(json).pipe(
    Effect.mapError(
      (e) =>
        new ExtractionFailed({
          metal,
          message: `next-data: unexpected page data: ${e.message}`,
        }),
    ),
    Effect.flatMap(({ props }) => {
      const result = Option.firstSomeOf(
        props.pageProps.dehydratedState.queries
          .filter((query) => query.queryKey?.[0] === METAL_QUOTE_KEY)
          .map((query) =>
            Schema.decodeUnknownOption(MetalQuoteData)(query.state?.data).pipe(
              Option.flatMap(({ GetMetalQuoteV3 }) =>
                Option.fromNullable(GetMetalQuoteV3.results[0])
              ),
            )
          ),
      );
      return Option.match(result, {
        onNone: () =>
          Effect.fail(
            new ExtractionFailed({
              metal,
              message: `next-data: no metal quote data for ${metal}`,
            }),
          ),
        onSome: Effect.succeed,
      });
    }),
  );
}

function readNextData(
  html: string,
  metal: Metal,
): Effect.Effect<unknown, ExtractionFailed> {
  const script = cheerio.load(html)("script#__NEXT_DATA__").first().text();
  if (script.trim().length === 0) {
    return Effect.fail(
      new ExtractionFailed({
        metal,
        message: `next-data: no __NEXT_DATA__ script for ${metal}`,
      }),
    );
  }
  return Effect.try({
    try: (): unknown => JSON.parse(script),
    catch: () =>
      new ExtractionFailed({
        metal,
        message: `next-data: __NEXT_DATA__ is not valid JSON for ${metal}`,
      }),
  });
}

// --- Strategy ---

const price = (value: number | null | undefined) =>
  Option.fromNullable(value).pipe(Option.map(formatPrice));

export const nextDataStrategy = makeLookupStrategy<MetalQuoteResult>({
  name: "next-data",
  load: (html, metal) =>
    readNextData(html, metal).pipe(
      Effect.flatMap((json) => findMetalQuote(json, metal)),
    ),
  bid: (quote) => price(quote.bid),
  ask: (quote) => price(quote.ask),
});
