// Page builders shared by the strategy and source tests.

export function nextDataPage(queries: readonly unknown[]): string {
  const data = { props: { pageProps: { dehydratedState: { queries } } } };
  return [
    "<html><head><title>Live Gold Price</title></head><body>",
    '<div id="__next"></div>',
    `<script id="__NEXT_DATA__" type="application/json">${JSON.stringify(data)}</script>`,
    "</body></html>",
  ].join("");
}

export function metalQuoteQuery(
  quote: { readonly bid?: number | null; readonly ask?: number | null },
): unknown {
  return {
    queryKey: ["metalQuote", { symbol: "AU", currency: "USD" }],
    state: {
      data: { GetMetalQuoteV3: { results: [{ ...quote, change: 1.25 }] } },
    },
  };
}

export function markupPage(
  prices: { readonly bid?: string; readonly ask?: string },
): string {
  const bid = prices.bid === undefined
    ? ""
    : `<h3 class="font-mulish mb-[3px] text-4xl font-bold leading-normal">\n  ${prices.bid}\n</h3>`;
  const ask = prices.ask === undefined
    ? ""
    : [
      '<div class="flex items-center justify-between">',
      '<div class="text-sm font-normal">Ask</div>',
      `<div class="text-[19px] font-normal">${prices.ask}</div>`,
      "</div>",
    ].join("");
  return `<html><body><div class="mb-4">${bid}${ask}</div></body></html>`;
}
