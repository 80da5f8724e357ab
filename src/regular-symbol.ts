/*
 * QR Code generator library (TypeScript)
 *
 * Copyright (c) Project Nayuki. (MIT License)
 * https://www.nayuki.io/page/qr-code-generator-library
 *
 * Permission is hereby granted, free of charge, to any person obtaining a copy of
 * this software and associated documentation files (the "Software"), to deal in
 * the Software without restriction, including without limitation the rights to
 * use, copy, modify, merge, publish, distribute, sublicense, and/or sell copies of
 * the Software, and to permit persons to whom the Software is furnished to do so,
 * subject to the following conditions:
 * - The above copyright notice and this permission notice shall be included in
 *   all copies or substantial portions of the Software.
 * - The Software is provided "as is", without warranty of any kind, express or
 *   implied, including but not limited to the warranties of merchantability,
 *   fitness for a particular purpose and noninfringement. In no event shall the
 *   authors or copyright holders be liable for any claim, damages or other
 *   liability, whether in an action of contract, tort or otherwise, arising from,
 *   out of or in connection with the Software or the use or other dealings in the
 *   Software.
 */

"use strict";

import { BitSet } from "./bitset";
import { _assert } from "./errors";
import { QrSymbol } from "./symbol";
import { FORMAT_INFO_LENGTH_BITS, QrVersion, VERSION_INFO_LENGTH_BITS } from "./version";

type int = number;

const floor = Math.floor;
const abs = Math.abs;

/*---- Symbol construction ----*/

// 7*7 finder pattern, dark except for the ring at distance 2 from the center.
const FINDER_PATTERN: ReadonlyArray<ReadonlyArray<boolean>> = _squarePattern(3, (d) => d != 2);
const FINDER_PATTERN_SIZE: int = 7;

// Light separators below/above and beside each finder pattern.
const FINDER_HORIZONTAL_BORDER: ReadonlyArray<ReadonlyArray<boolean>> = [
  new Array<boolean>(8).fill(false),
];
const FINDER_VERTICAL_BORDER: ReadonlyArray<ReadonlyArray<boolean>> = Array.from(
  { length: 8 },
  () => [false]
);

// 5*5 alignment pattern, dark except for the ring at distance 1.
const ALIGNMENT_PATTERN: ReadonlyArray<ReadonlyArray<boolean>> = _squarePattern(2, (d) => d != 1);

// Returns true if the module at the given row and column is inverted by the mask.
export function maskInverts(mask: int, y: int, x: int): boolean {
  switch (mask) {
    case 0:
      return (y + x) % 2 == 0;
    case 1:
      return y % 2 == 0;
    case 2:
      return x % 3 == 0;
    case 3:
      return (y + x) % 3 == 0;
    case 4:
      return (floor(y / 2) + floor(x / 3)) % 2 == 0;
    case 5:
      return ((y * x) % 2) + ((y * x) % 3) == 0;
    case 6:
      return (((y * x) % 2) + ((y * x) % 3)) % 2 == 0;
    case 7:
      return (((y + x) % 2) + ((y * x) % 3)) % 2 == 0;
    default:
      throw new RangeError("Mask value out of range");
  }
}

// Builds the complete symbol for the given version and mask from the final
// interleaved codeword sequence (remainder bits included).
export function buildRegularSymbol(
  version: QrVersion,
  mask: int,
  data: BitSet,
  includeQuietZone: boolean
): QrSymbol {
  if (mask < 0 || mask > 7) throw new RangeError("Mask value out of range");
  const symbol = new QrSymbol(
    version._symbolSize(),
    includeQuietZone ? version._quietZoneSize() : 0
  );

  _drawFinderPatterns(symbol);
  _drawAlignmentPatterns(symbol, version);
  _drawTimingPatterns(symbol);
  _drawFormatInfo(symbol, version, mask);
  _drawVersionInfo(symbol, version);
  _drawData(symbol, mask, data);

  const numEmpty: int = symbol._numEmptyModules();
  _assert(
    numEmpty == 0,
    `${numEmpty} modules left empty (version=${version._version})`
  );
  return symbol;
}

// Draws the three finder patterns (all corners except bottom right)
// together with their light separators.
function _drawFinderPatterns(symbol: QrSymbol): void {
  const size: int = symbol._symbolSize;
  const fp: int = FINDER_PATTERN_SIZE;

  symbol._set2dPattern(0, 0, FINDER_PATTERN);
  symbol._set2dPattern(0, fp, FINDER_HORIZONTAL_BORDER);
  symbol._set2dPattern(fp, 0, FINDER_VERTICAL_BORDER);

  symbol._set2dPattern(size - fp, 0, FINDER_PATTERN);
  symbol._set2dPattern(size - fp - 1, fp, FINDER_HORIZONTAL_BORDER);
  symbol._set2dPattern(size - fp - 1, 0, FINDER_VERTICAL_BORDER);

  symbol._set2dPattern(0, size - fp, FINDER_PATTERN);
  symbol._set2dPattern(0, size - fp - 1, FINDER_HORIZONTAL_BORDER);
  symbol._set2dPattern(fp, size - fp - 1, FINDER_VERTICAL_BORDER);
}

// Draws an alignment pattern at every pair of positions whose
// center is still free, which leaves out the three finder corners.
function _drawAlignmentPatterns(symbol: QrSymbol, version: QrVersion): void {
  const positions: Array<int> = getAlignmentPatternPositions(version._version);
  for (const x of positions) {
    for (const y of positions) {
      if (symbol._empty(x, y)) symbol._set2dPattern(x - 2, y - 2, ALIGNMENT_PATTERN);
    }
  }
}

// Draws horizontal and vertical timing patterns between the finders.
// Where they cross alignment patterns the colours already agree.
function _drawTimingPatterns(symbol: QrSymbol): void {
  const fp: int = FINDER_PATTERN_SIZE;
  let isDark: boolean = true;
  for (let i = fp + 1; i < symbol._symbolSize - fp; i++) {
    symbol._set(i, fp - 1, isDark);
    symbol._set(fp - 1, i, isDark);
    isDark = !isDark;
  }
}

// Draws two copies of the format bits (with its own error correction code)
// based on the given mask and the version's error correction level.
function _drawFormatInfo(symbol: QrSymbol, version: QrVersion, mask: int): void {
  const size: int = symbol._symbolSize;
  const fp: int = FINDER_PATTERN_SIZE;
  const f: BitSet = version._formatInfo(mask);
  // Bit i counts from the least significant end.
  const bit = (i: int): boolean => f._at(FORMAT_INFO_LENGTH_BITS - 1 - i);

  // Bits 0-7, under the top right finder pattern.
  for (let i = 0; i <= 7; i++) symbol._set(size - i - 1, fp + 1, bit(i));

  // Bits 0-5, right of the top left finder pattern.
  for (let i = 0; i <= 5; i++) symbol._set(fp + 1, i, bit(i));

  // Bits 6-8 on the corner of the top left finder pattern.
  symbol._set(fp + 1, fp, bit(6));
  symbol._set(fp + 1, fp + 1, bit(7));
  symbol._set(fp, fp + 1, bit(8));

  // Bits 9-14 on the underside of the top left finder pattern.
  for (let i = 9; i <= 14; i++) symbol._set(14 - i, fp + 1, bit(i));

  // Bits 8-14 on the right side of the bottom left finder pattern.
  for (let i = 8; i <= 14; i++) symbol._set(fp + 1, size - fp + i - 8, bit(i));

  symbol._set(fp + 1, size - fp - 1, true); // Always dark
}

// Draws two copies of the version bits, iff 7 <= version <= 40.
function _drawVersionInfo(symbol: QrSymbol, version: QrVersion): void {
  const v: BitSet | undefined = version._versionInfo();
  if (v === undefined) return;
  const size: int = symbol._symbolSize;
  const fp: int = FINDER_PATTERN_SIZE;

  for (let i = 0; i < VERSION_INFO_LENGTH_BITS; i++) {
    const isDark: boolean = v._at(VERSION_INFO_LENGTH_BITS - 1 - i);
    // Above the bottom left finder pattern.
    symbol._set(floor(i / 3), size - fp - 4 + (i % 3), isDark);
    // Left of the top right finder pattern.
    symbol._set(size - fp - 4 + (i % 3), floor(i / 3), isDark);
  }
}

// Places the data bits in the zigzag scan: pairs of columns from the right,
// alternately upwards and downwards, skipping the vertical timing column and
// every module already in use. Each bit is XORed with the mask.
function _drawData(symbol: QrSymbol, mask: int, data: BitSet): void {
  const size: int = symbol._symbolSize;
  let x: int = size - 2; // Left column of the current pair
  let y: int = size - 1;
  let xOffset: int = 1;
  let upward: boolean = true;

  for (let i = 0; i < data._len(); i++) {
    symbol._set(x + xOffset, y, maskInverts(mask, y, x + xOffset) != data._at(i));
    if (i == data._len() - 1) break;

    // Find next free module in the symbol
    do {
      if (xOffset == 1) {
        xOffset = 0;
      } else {
        xOffset = 1;
        if (upward) {
          if (y > 0) y--;
          else {
            upward = false;
            x -= 2;
          }
        } else {
          if (y < size - 1) y++;
          else {
            upward = true;
            x -= 2;
          }
        }
      }
      // Skip over the vertical timing pattern entirely
      if (x == 5) x--;
      _assert(x >= 0, "Data does not fit the symbol");
    } while (!symbol._empty(x + xOffset, y));
  }
}

// Returns an ascending list of positions of alignment patterns for this version number.
// Each position is in the range [0,177), and are used on both the x and y axes.
export function getAlignmentPatternPositions(ver: int): Array<int> {
  if (ver == 1) return [];
  const numAlign: int = floor(ver / 7) + 2;
  const step: int =
    ver == 32 ? 26 : Math.ceil((ver * 4 + 4) / (numAlign * 2 - 2)) * 2;
  const result: Array<int> = [6];
  for (let pos = ver * 4 + 17 - 7; result.length < numAlign; pos -= step)
    result.splice(1, 0, pos);
  return result;
}

// Returns a (2r+1)*(2r+1) grid, dark where isDark holds for the Chebyshev
// distance of the module from the center.
function _squarePattern(
  r: int,
  isDark: (dist: int) => boolean
): ReadonlyArray<ReadonlyArray<boolean>> {
  const rows: Array<Array<boolean>> = [];
  for (let dy = -r; dy <= r; dy++) {
    const row: Array<boolean> = [];
    for (let dx = -r; dx <= r; dx++) row.push(isDark(Math.max(abs(dx), abs(dy))));
    rows.push(row);
  }
  return rows;
}
