// Markup strategy — reads the server-rendered price widget by its classes.

import * as cheerio from "cheerio";
import { Effect } from "effect";
import { type Lookup, makeLookupStrategy, nonEmpty } from "./strategy.ts";

export const SELECTORS = {
  bid: "h3.text-4xl.font-bold",
  askLabel: "div.text-sm.font-normal",
  askValue: 'div[class*="text-[19px]"]',
} as const;

export const findBid: Lookup<cheerio.CheerioAPI> = ($) =>
  nonEmpty($(SELECTORS.bid).first().text());

/** The ask value sits next to a small "Ask" label inside the same parent. */
export const findAsk: Lookup<cheerio.CheerioAPI> = ($) =>
  nonEmpty(
    $(SELECTORS.askLabel)
      .filter((_, label) => $(label).text().includes("Ask"))
      .first()
      .parent()
      .find(SELECTORS.askValue)
      .first()
      .text(),
  );

export const markupStrategy = makeLookupStrategy<cheerio.CheerioAPI>({
  name: "markup",
  load: (html) => Effect.sync(() => cheerio.load(html)),
  bid: findBid,
  ask: findAsk,
});
