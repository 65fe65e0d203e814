// Pure domain types — no framework dependency, no I/O.

export type Metal = "gold" | "silver";

export const METALS: readonly Metal[] = ["gold", "silver"];

export interface MetalQuote {
  readonly metal: "Gold" | "Silver";
  readonly bid: string; // already formatted, e.g. "4,015.50"
  readonly ask: string;
  readonly date: string; // local capture date, e.g. "Oct 10, 2025"
  readonly time: string; // local capture time, e.g. "02:30 PM"
}

/** Both metals captured together. Never partially populated. */
export interface PriceSnapshot {
  readonly gold: MetalQuote;
  readonly silver: MetalQuote;
  readonly date: string;
  readonly time: string;
}

// --- Board geometry ---

export const ROWS = 6;
export const COLUMNS = 22;
export const BOARD_CAPACITY = ROWS * COLUMNS;

/** 6 rows x 22 columns of tile codes. */
export type DisplayGrid = readonly (readonly number[])[];

export function isDisplayGrid(value: unknown): value is DisplayGrid {
  return (
    Array.isArray(value) &&
    value.length === ROWS &&
    value.every(
      (row) =>
        Array.isArray(row) &&
        row.length === COLUMNS &&
        row.every((code) => Number.isInteger(code)),
    )
  );
}
