// Pure formatting functions — no I/O.

import type { PriceSnapshot } from "./domain.ts";
import type { ErrorKind, OperationResult } from "./result.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Board layout ---

export interface MetalFields {
  readonly bid?: string;
  readonly ask?: string;
}

/** Whatever price data is at hand; every PriceSnapshot qualifies. */
export interface PriceDisplay {
  readonly gold?: MetalFields;
  readonly silver?: MetalFields;
  readonly date?: string;
  readonly time?: string;
}

const PLACEHOLDER = "N/A";

const MONTHS: ReadonlyArray<readonly [string, string]> = [
  ["Jan", "January"],
  ["Feb", "February"],
  ["Mar", "March"],
  ["Apr", "April"],
  ["May", "May"],
  ["Jun", "June"],
  ["Jul", "July"],
  ["Aug", "August"],
  ["Sep", "September"],
  ["Oct", "October"],
  ["Nov", "November"],
  ["Dec", "December"],
];

/** "Oct 10, 2025" -> "October 10". */
export function formatDisplayDate(date: string): string {
  const monthDay = date.split(",")[0].trim();
  const month = MONTHS.find(([abbr]) => monthDay.startsWith(abbr));
  return month === undefined
    ? monthDay
    : month[1] + monthDay.slice(month[0].length);
}

/** Six lines, each fitting a 22-column row once sanitized. */
export function formatPrices(data: PriceDisplay): string {
  const field = (value: string | undefined) => value ?? PLACEHOLDER;
  const date = data.date === undefined ? "" : formatDisplayDate(data.date);

  return [
    `GOLD  BID:${field(data.gold?.bid)}`,
    `      ASK:${field(data.gold?.ask)}`,
    "",
    `SILVER BID:${field(data.silver?.bid)}`,
    `       ASK:${field(data.silver?.ask)}`,
    `${date} ${data.time ?? ""}`.trim(),
  ].join("\n");
}

export function formatSummary(snapshot: PriceSnapshot): string {
  const { gold, silver } = snapshot;
  return `Gold Bid: ${gold.bid}, Ask: ${gold.ask} | ` +
    `Silver Bid: ${silver.bid}, Ask: ${silver.ask}`;
}

// --- Result formatting ---

export function formatResult<A>(result: OperationResult<A>): string {
  if (result.status === "success") {
    return ["", `${GREEN}${BOLD}  ✓ ${result.message}${RESET}`, ""].join("\n");
  }
  const { kind, boardUpdated } = result.data;
  return [
    "",
    `${RED}${BOLD}  ✗ ${result.message}${RESET}`,
    `  ${DIM}${describeFailure(kind, boardUpdated)}${RESET}`,
    "",
  ].join("\n");
}

function describeFailure(kind: ErrorKind, boardUpdated: boolean): string {
  const board = boardUpdated
    ? "The board shows a notice instead."
    : "The board was left unchanged.";
  switch (kind) {
    case "SourceTimeout":
      return `The price source did not answer in time. ${board}`;
    case "ExtractionFailed":
      return `Prices could not be read from the source page. ${board}`;
    case "SendFailed":
      return "The board rejected or did not receive the update.";
    case "ReadFailed":
      return "The board could not be read. Check its address and API key.";
    case "InvalidInput":
      return "Nothing was sent.";
  }
}
