// Strategy registry — maps a configured name to an extraction strategy.

import { markupStrategy } from "./markup.ts";
import { nextDataStrategy } from "./next-data.ts";
import { renderedDomStrategy } from "./rendered-dom.ts";
import { type ExtractionStrategy, firstSuccessful } from "./strategy.ts";

export type { ExtractionStrategy, RawQuote } from "./strategy.ts";

export const STRATEGY_NAMES = [
  "auto",
  "next-data",
  "markup",
  "rendered-dom",
] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

// rendered-dom runs page scripts, so it is never picked implicitly.
const autoStrategy = firstSuccessful("auto", [nextDataStrategy, markupStrategy]);

export function strategyFor(name: StrategyName): ExtractionStrategy {
  switch (name) {
    case "auto":
      return autoStrategy;
    case "next-data":
      return nextDataStrategy;
    case "markup":
      return markupStrategy;
    case "rendered-dom":
      return renderedDomStrategy;
  }
}
