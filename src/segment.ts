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

type byte = number;
type int = number;

const floor = Math.floor;

/*---- Public helper enumeration ----*/

/*
 * Describes how a segment's data bits are interpreted. Immutable.
 * Modes are ordered by generality: every numeric character is also
 * alphanumeric, and every character can be written in byte mode.
 */
export class Mode {
  /*-- Constants --*/

  public static readonly NUMERIC = new Mode("numeric", 1, 0x1, [10, 12, 14]);
  public static readonly ALPHANUMERIC = new Mode("alphanumeric", 2, 0x2, [9, 11, 13]);
  public static readonly BYTE = new Mode("byte", 3, 0x4, [8, 16, 16]);

  /*-- Constructor and fields --*/

  private constructor(
    public readonly name: string,
    // Higher values can represent more characters.
    public readonly _generality: int,
    // The mode indicator bits, which is a uint4 value (range 0 to 15).
    public readonly _modeBits: int,
    // Number of character count bits for three different version ranges.
    private readonly _numBitsCharCount: [int, int, int]
  ) {}

  /*-- Methods --*/

  // Returns the bit width of the character count field for a segment in this
  // mode in a QR Code at the given version number. The result is in the range [8, 16].
  public _numCharCountBits(ver: int): int {
    return this._numBitsCharCount[floor((ver + 7) / 17)];
  }

  // Returns the number of payload bits for the given number of characters,
  // excluding the mode indicator and the character count.
  public _numPayloadBits(numChars: int): int {
    switch (this) {
      case Mode.NUMERIC:
        return 10 * floor(numChars / 3) + (numChars % 3 == 0 ? 0 : 1 + 3 * (numChars % 3));
      case Mode.ALPHANUMERIC:
        return 11 * floor(numChars / 2) + 6 * (numChars % 2);
      default:
        return 8 * numChars;
    }
  }

  // Returns the least general mode able to hold the given byte.
  public static _classify(b: byte): Mode {
    if (b >= 0x30 && b <= 0x39) return Mode.NUMERIC;
    if (ALPHANUMERIC_CHARSET.indexOf(String.fromCharCode(b)) >= 0)
      return Mode.ALPHANUMERIC;
    return Mode.BYTE;
  }
}

// The set of all legal characters in alphanumeric mode,
// where each character value maps to the index in the string.
export const ALPHANUMERIC_CHARSET: string =
  "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ $%*+-./:";

/*---- Data segment ----*/

/*
 * A run of content bytes sharing one mode. Instances are immutable.
 */
export class Segment {
  public constructor(
    public readonly _mode: Mode,
    public readonly _data: Readonly<Array<byte>>
  ) {}

  public _numChars(): int {
    return this._data.length;
  }
}

// Bit cost of a segment of the given mode and length, including its header.
// Infinity marks a length that does not fit the character count field.
export type SegmentCost = (mode: Mode, numChars: int) => number;

// Splits the content into maximal runs of bytes of the same (least general) mode.
export function classifySegments(data: Readonly<Array<byte>>): Array<Segment> {
  const result: Array<Segment> = [];
  let start: int = 0;
  for (let i = 1; i <= data.length; i++) {
    if (
      i == data.length ||
      Mode._classify(data[i]) !== Mode._classify(data[start])
    ) {
      result.push(new Segment(Mode._classify(data[start]), data.slice(start, i)));
      start = i;
    }
  }
  return result;
}

// Coalesces runs where that shortens the bit stream. Starting from each run,
// following runs of a mode no more general than its own are absorbed while the
// merged segment costs strictly less than the two kept apart.
export function optimiseSegments(
  actual: Readonly<Array<Segment>>,
  cost: SegmentCost
): Array<Segment> {
  const result: Array<Segment> = [];
  for (let i = 0; i < actual.length; ) {
    const mode: Mode = actual[i]._mode;
    let numChars: int = actual[i]._numChars();
    let j: int = i + 1;
    for (; j < actual.length; j++) {
      const next: Segment = actual[j];
      if (next._mode._generality > mode._generality) break;
      const coalesced: number = cost(mode, numChars + next._numChars());
      const separate: number = cost(mode, numChars) + cost(next._mode, next._numChars());
      if (!(coalesced < separate)) break;
      numChars += next._numChars();
    }
    let data: Array<byte> = [];
    for (let k = i; k < j; k++) data = data.concat(actual[k]._data);
    result.push(new Segment(mode, data));
    i = j;
  }
  return result;
}

// Returns the minimal segment list for the given content: the optimised runs,
// or a single segment in the most general mode present if that is no longer.
export function makeSegments(
  data: Readonly<Array<byte>>,
  cost: SegmentCost
): Array<Segment> {
  if (data.length == 0) return [];
  const actual: Array<Segment> = classifySegments(data);
  const optimised: Array<Segment> = optimiseSegments(actual, cost);

  let highest: Mode = Mode.NUMERIC;
  for (const seg of actual)
    if (seg._mode._generality > highest._generality) highest = seg._mode;

  const optimisedCost: number = optimised.reduce(
    (sum, seg) => sum + cost(seg._mode, seg._numChars()),
    0
  );
  if (cost(highest, data.length) <= optimisedCost)
    return [new Segment(highest, data)];
  return optimised;
}
