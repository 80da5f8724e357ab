import { describe, expect, test } from "vitest";

import { QrSymbol } from "./symbol";

// Builds a symbol without quiet zone from rows of '#' (dark) and '.' (light).
function symbolOf(...rows: string[]): QrSymbol {
  const symbol = new QrSymbol(rows.length, 0);
  rows.forEach((row, y) => Array.from(row).forEach((c, x) => symbol._set(x, y, c == "#")));
  return symbol;
}

function blank(size: number): QrSymbol {
  return symbolOf(...new Array<string>(size).fill(".".repeat(size)));
}

describe("module grid", () => {
  test("coordinates are relative to the quiet zone", () => {
    const symbol = new QrSymbol(3, 2);
    expect(symbol._fullSize).toBe(7);
    symbol._set(0, 1, true);
    expect(symbol._get(0, 1)).toBe(true);
    expect(symbol._empty(0, 1)).toBe(false);
    expect(symbol._empty(1, 0)).toBe(true);
    expect(symbol._numEmptyModules()).toBe(8);
    expect(symbol._bitmap()[3][2]).toBe(true);
  });

  test("light modules count as used", () => {
    const symbol = new QrSymbol(2, 0);
    symbol._set2dPattern(0, 0, [
      [false, true],
      [false, false],
    ]);
    expect(symbol._numEmptyModules()).toBe(0);
    expect(symbol._bitmap()).toEqual([
      [false, true],
      [false, false],
    ]);
  });

  test("bitmap is a copy", () => {
    const symbol = blank(2);
    symbol._bitmap()[0][0] = true;
    expect(symbol._get(0, 0)).toBe(false);
  });
});

describe("penalty rules", () => {
  test("a blank symbol", () => {
    const symbol = blank(7);
    // 14 lines of 7 equal modules: 4 for reaching 6 and 1 for the 7th.
    expect(symbol._penalty1()).toBe(70);
    expect(symbol._penalty2()).toBe(36 * 3);
    expect(symbol._penalty3()).toBe(0);
    // 24 of 49 away from half, in steps of 2 modules.
    expect(symbol._penalty4()).toBe(120);
    expect(symbol._penaltyScore()).toBe(70 + 108 + 120);
  });

  test("runs shorter than 6 are free", () => {
    expect(
      symbolOf(
        "#####.",
        ".....#",
        "#####.",
        ".....#",
        "#####.",
        ".....#"
      )._penalty1()
    ).toBe(0);
  });

  test("runs in columns", () => {
    // Every column is a run of 6; rows alternate.
    const symbol = symbolOf("#.#.#.", "#.#.#.", "#.#.#.", "#.#.#.", "#.#.#.", "#.#.#.");
    expect(symbol._penalty1()).toBe(6 * 4);
    expect(symbol._penalty2()).toBe(0);
  });

  test("2x2 blocks overlap", () => {
    expect(symbolOf("###", "###", "...")._penalty2()).toBe(2 * 3);
  });

  test.each([
    ["dark end", "#.###.#....", 40],
    ["dark start", "....#.###.#", 40],
    ["at the end of the line", "#.###.#", 40],
    ["preceded by a dark module", "##.###.#.#.", 0],
  ])("finder-like pattern, %s", (_name, row, expected) => {
    const size = row.length;
    const symbol = symbolOf(row, ...new Array<string>(size - 1).fill(".".repeat(size)));
    expect(symbol._penalty3()).toBe(expected);
  });

  test("finder-like pattern in a column", () => {
    const column = "#.###.#....";
    const symbol = symbolOf(...Array.from(column, (c) => c + ".".repeat(10)));
    expect(symbol._penalty3()).toBe(40);
  });

  test("dark proportion", () => {
    const rows = [...new Array<string>(6).fill("#".repeat(10)), ...new Array<string>(4).fill(".".repeat(10))];
    expect(symbolOf(...rows)._penalty4()).toBe(20);
    const balanced = [...new Array<string>(5).fill("#".repeat(10)), ...new Array<string>(5).fill(".".repeat(10))];
    expect(symbolOf(...balanced)._penalty4()).toBe(0);
  });
});
