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
import {
  ALPHANUMERIC_CHARSET,
  Mode,
  Segment,
  makeSegments,
} from "./segment";

type byte = number;
type int = number;

/*---- Public helper enumeration ----*/

/*
 * A range of versions sharing the same character count field widths.
 * The encoder tries the brackets in order and keeps the first that fits.
 */
export class EncoderBracket {
  /*-- Constants --*/

  public static readonly V1_TO_9 = new EncoderBracket(1, 9);
  public static readonly V10_TO_26 = new EncoderBracket(10, 26);
  public static readonly V27_TO_40 = new EncoderBracket(27, 40);

  public static readonly _ALL: ReadonlyArray<EncoderBracket> = [
    EncoderBracket.V1_TO_9,
    EncoderBracket.V10_TO_26,
    EncoderBracket.V27_TO_40,
  ];

  /*-- Constructor and fields --*/

  private constructor(
    public readonly _minVersion: int,
    public readonly _maxVersion: int
  ) {}

  /*-- Methods --*/

  public _numCharCountBits(mode: Mode): int {
    return mode._numCharCountBits(this._minVersion);
  }

  // Returns the number of bits needed to encode numChars characters as one
  // segment, or Infinity if the count does not fit its field.
  public _encodedLength(mode: Mode, numChars: int): number {
    const ccbits: int = this._numCharCountBits(mode);
    if (numChars >= 1 << ccbits) return Infinity;
    return 4 + ccbits + mode._numPayloadBits(numChars);
  }
}

/*---- Data encoder ----*/

export interface EncodedData {
  readonly bits: BitSet;
  readonly segments: ReadonlyArray<Segment>;
}

/*
 * Turns content bytes into the segment bit stream for one version bracket.
 */
export class DataEncoder {
  public constructor(public readonly _bracket: EncoderBracket) {}

  // Returns the bit stream for the given content with the segments it was
  // built from, or undefined if some segment is too long for this bracket's
  // character count fields.
  public _encode(data: Readonly<Array<byte>>): EncodedData | undefined {
    const segments: Array<Segment> = makeSegments(data, (mode, n) =>
      this._bracket._encodedLength(mode, n)
    );
    const bb = new BitSet();
    for (const seg of segments) {
      if (!isFinite(this._bracket._encodedLength(seg._mode, seg._numChars())))
        return undefined;
      this._encodeSegment(seg, bb);
    }
    return { bits: bb, segments: Object.freeze(segments) };
  }

  // Appends one segment: mode indicator, character count, then payload.
  public _encodeSegment(seg: Segment, bb: BitSet): void {
    const data = seg._data;
    bb._appendBits(seg._mode._modeBits, 4);
    bb._appendBits(data.length, this._bracket._numCharCountBits(seg._mode));
    switch (seg._mode) {
      case Mode.NUMERIC:
        for (let i = 0; i < data.length; i += 3) {
          // Consume up to 3 digits per iteration
          const n: int = Math.min(data.length - i, 3);
          let value: int = 0;
          for (let j = i; j < i + n; j++) value = value * 10 + (data[j] - 0x30);
          bb._appendBits(value, n * 3 + 1);
        }
        break;
      case Mode.ALPHANUMERIC:
        for (let i = 0; i < data.length; i += 2) {
          if (i + 1 < data.length) {
            // Process groups of 2
            bb._appendBits(
              _alphanumericValue(data[i]) * 45 + _alphanumericValue(data[i + 1]),
              11
            );
          } else bb._appendBits(_alphanumericValue(data[i]), 6);
        }
        break;
      default:
        bb._appendBytes(data);
    }
  }
}

function _alphanumericValue(b: byte): int {
  const value: int = ALPHANUMERIC_CHARSET.indexOf(String.fromCharCode(b));
  if (value < 0) throw new RangeError("Not an alphanumeric character");
  return value;
}
