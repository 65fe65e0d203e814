// Grid construction — pure functions over the fixed 6x22 board geometry.

import {
  alphabet,
  BLANK_CODE,
  codeFor,
  COLOR_COUNT,
  FIRST_COLOR_CODE,
  isColorCode,
} from "./alphabet.ts";
import { COLUMNS, type DisplayGrid, ROWS } from "./domain.ts";

function makeGrid(cell: (row: number, column: number) => number): DisplayGrid {
  return Array.from({ length: ROWS }, (_, row) =>
    Array.from({ length: COLUMNS }, (_, column) => cell(row, column)));
}

/** Hardware diagnostic: every color tile, cycling in row-major order. */
export function colorTestGrid(): DisplayGrid {
  return makeGrid((row, column) =>
    FIRST_COLOR_CODE + ((row * COLUMNS + column) % COLOR_COUNT)
  );
}

// --- Text layout ---

/** Greedy word wrap. Lines that already fit are returned untouched so
 *  leading spaces used for alignment survive. */
export function wrapLine(line: string, width: number = COLUMNS): string[] {
  if (Array.from(line).length <= width) return [line];

  const rows: string[] = [];
  let current = "";
  for (const word of line.split(" ").filter((w) => w.length > 0)) {
    let rest = Array.from(word);
    while (rest.length > width) {
      if (current.length > 0) {
        rows.push(current);
        current = "";
      }
      rows.push(rest.slice(0, width).join(""));
      rest = rest.slice(width);
    }
    const piece = rest.join("");
    if (current.length === 0) {
      current = piece;
    } else if (Array.from(current).length + 1 + rest.length <= width) {
      current = `${current} ${piece}`;
    } else {
      rows.push(current);
      current = piece;
    }
  }
  if (current.length > 0) rows.push(current);
  return rows;
}

/** Lay text out top-left aligned; overflow past the last row is dropped. */
export function layoutText(text: string): DisplayGrid {
  const rows = text.split("\n").flatMap((line) => wrapLine(line)).slice(0, ROWS);
  const characters = rows.map((row) => Array.from(row));
  return makeGrid((row, column) => {
    const character = characters[row]?.[column];
    return character === undefined ? BLANK_CODE : codeFor(character);
  });
}

// --- Rendering ---

export const COLOR_GLYPH = "█";

/** Text view of a grid for terminals and logs. */
export function renderGrid(grid: DisplayGrid): string {
  return grid
    .map((row) =>
      row
        .map((code) =>
          isColorCode(code)
            ? COLOR_GLYPH
            : alphabet.characterByCode.get(code) ?? " "
        )
        .join("")
    )
    .join("\n");
}
