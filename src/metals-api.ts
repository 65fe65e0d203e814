// Metals API — service definition and domain errors.

import { Context, Data, Effect } from "effect";
import type { Metal, PriceSnapshot } from "./domain.ts";

// --- Errors ---

export const TIMEOUT_MESSAGE =
  "kitco.com website down. Precious metals SPOT PRICES are NOT UP TO DATE.";

/** The source did not answer within the fetch timeout. Its message is meant
 *  for the board itself, so stale prices are not mistaken for live ones. */
export class SourceTimeout extends Data.TaggedError("SourceTimeout")<{
  readonly metal: Metal;
  readonly message: string;
}> {
  readonly displayOnBoard = true;
}

export const sourceTimeout = (metal: Metal): SourceTimeout =>
  new SourceTimeout({ metal, message: TIMEOUT_MESSAGE });

/** The page arrived (or the network failed outright) but no complete
 *  bid/ask pair could be read. */
export class ExtractionFailed extends Data.TaggedError("ExtractionFailed")<{
  readonly metal: Metal;
  readonly message: string;
}> {}

export type MetalsSourceError = SourceTimeout | ExtractionFailed;

// --- Service ---

export class MetalsSource extends Context.Tag("MetalsSource")<
  MetalsSource,
  {
    readonly fetchPrices: Effect.Effect<PriceSnapshot, MetalsSourceError>;
  }
>() {}
