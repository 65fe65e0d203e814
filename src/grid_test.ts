import { expect, test } from "vitest";
import { COLUMNS, isDisplayGrid, ROWS } from "./domain.ts";
import { colorTestGrid, layoutText, renderGrid, wrapLine } from "./grid.ts";

// --- colorTestGrid ---

test("colorTestGrid: is exactly 6 rows of 22 columns", () => {
  const grid = colorTestGrid();
  expect(grid.length).toBe(ROWS);
  for (const row of grid) expect(row.length).toBe(COLUMNS);
});

test("colorTestGrid: cycles the nine colors in row-major order", () => {
  const grid = colorTestGrid();
  grid.forEach((row, r) =>
    row.forEach((code, c) => expect(code).toBe(63 + ((r * 22 + c) % 9)))
  );
});

test("colorTestGrid: spot checks", () => {
  const grid = colorTestGrid();
  expect(grid[0][0]).toBe(63);
  expect(grid[0][8]).toBe(71);
  expect(grid[0][9]).toBe(63);
  expect(grid[1][0]).toBe(67);
  expect(grid[5][21]).toBe(68);
});

// --- wrapLine ---

test("wrapLine: short lines are kept as written", () => {
  expect(wrapLine("      ASK:4,016.20")).toEqual(["      ASK:4,016.20"]);
});

test("wrapLine: long lines break between words", () => {
  expect(wrapLine("THE QUICK BROWN FOX JUMPS OVER THE LAZY DOG")).toEqual([
    "THE QUICK BROWN FOX",
    "JUMPS OVER THE LAZY",
    "DOG",
  ]);
});

test("wrapLine: words wider than a row are split", () => {
  expect(wrapLine("ABCDEFGHIJKLMNOPQRSTUVWXYZ")).toEqual([
    "ABCDEFGHIJKLMNOPQRSTUV",
    "WXYZ",
  ]);
});

// --- layoutText ---

test("layoutText: places text top-left and pads with blanks", () => {
  const grid = layoutText("HI");
  expect(isDisplayGrid(grid)).toBe(true);
  expect(grid[0].slice(0, 3)).toEqual([8, 9, 0]);
  expect(grid[1].every((code) => code === 0)).toBe(true);
});

test("layoutText: keeps leading spaces", () => {
  expect(layoutText("  A")[0].slice(0, 4)).toEqual([0, 0, 1, 0]);
});

test("layoutText: drops rows past the sixth", () => {
  const grid = layoutText("1\n2\n3\n4\n5\n6\n7");
  expect(grid.length).toBe(6);
  expect(grid[5][0]).toBe(32);
});

test("layoutText: unknown characters become blanks", () => {
  expect(layoutText("a~")[0].slice(0, 2)).toEqual([0, 0]);
});

// --- renderGrid ---

test("renderGrid: shows characters and pads rows", () => {
  const lines = renderGrid(layoutText("HI")).split("\n");
  expect(lines.length).toBe(6);
  expect(lines[0]).toBe("HI" + " ".repeat(20));
});

test("renderGrid: shows color tiles as blocks", () => {
  expect(renderGrid(colorTestGrid()).split("\n")[0]).toBe("█".repeat(22));
});
