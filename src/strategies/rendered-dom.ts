// Rendered-DOM strategy — for pages that only show prices after their own
// scripts run. Only use against sources you are willing to execute.
//
// Inline scripts run synchronously while jsdom parses the page, after the
// fetch and outside its timeout: a script that never returns blocks the
// call indefinitely. External scripts are never loaded, so a page that
// renders from its own bundles (a Next.js page, for one) shows no prices
// here.

import { Effect, Option } from "effect";
import { JSDOM, VirtualConsole } from "jsdom";
import type { Metal } from "../domain.ts";
import { ExtractionFailed } from "../metals-api.ts";
import { type Lookup, makeLookupStrategy, nonEmpty } from "./strategy.ts";

/** A DOM window that is closed when the enclosing scope ends, whichever
 *  way it ends. */
export function acquireDocument(html: string, metal: Metal) {
  return Effect.acquireRelease(
    Effect.try({
      try: () =>
        new JSDOM(html, {
          runScripts: "dangerously",
          virtualConsole: new VirtualConsole(),
        }),
      catch: (e) =>
        new ExtractionFailed({
          metal,
          message: `rendered-dom: could not load page: ${String(e)}`,
        }),
    }),
    (dom) => Effect.sync(() => dom.window.close()),
  ).pipe(Effect.map((dom) => dom.window.document));
}

/** Text of the element right after a leaf element reading exactly `label`. */
export function labelledValue(label: string): Lookup<Document> {
  return (document) => {
    for (const element of Array.from(document.querySelectorAll("body *"))) {
      if (element.children.length > 0) continue;
      if (element.textContent?.trim() !== label) continue;
      const value = nonEmpty(element.nextElementSibling?.textContent);
      if (Option.isSome(value)) return value;
    }
    return Option.none();
  };
}

export const renderedDomStrategy = makeLookupStrategy<Document>({
  name: "rendered-dom",
  load: acquireDocument,
  bid: labelledValue("Bid"),
  ask: labelledValue("Ask"),
});
