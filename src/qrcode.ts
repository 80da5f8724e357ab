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
import { DataEncoder, EncoderBracket } from "./data-encoder";
import type { EncodedData } from "./data-encoder";
import { ContentTooLongError, _assert } from "./errors";
import { rsEncode } from "./reed-solomon";
import { buildRegularSymbol } from "./regular-symbol";
import type { Segment } from "./segment";
import { QrSymbol } from "./symbol";
import { QrVersion, RecoveryLevel, chooseVersion } from "./version";

type byte = number;
type int = number;

export interface EncodeOptions {
  // Surround the symbol with the 4 module light border readers expect.
  quietZone?: boolean;
}

export type EncodeResult =
  | { readonly ok: true; readonly qrCode: QrCode }
  | { readonly ok: false; readonly error: ContentTooLongError };

// Pad codewords 0b11101100 and 0b00010001, inserted alternately.
const PAD_CODEWORDS: ReadonlyArray<byte> = [0xec, 0x11];

const NUM_MASKS: int = 8;

/*---- QR Code symbol class ----*/

/*
 * A QR Code symbol, which is a type of two-dimension barcode.
 * Invented by Denso Wave and described in the ISO/IEC 18004 standard.
 * Instances hold the content's encoded bit stream for the smallest version
 * that fits it; the symbol itself is drawn, for all eight masks, the first
 * time a mask or module is asked for, and the best one is kept.
 */
export class QrCode {
  /*-- Static factory function --*/

  // Encodes the given text (as UTF-8) or bytes at the given recovery level.
  // The smallest possible version is chosen automatically. Content that does
  // not fit version 40 at that level yields a ContentTooLongError result.
  public static _encode(
    content: string | Uint8Array,
    level: RecoveryLevel,
    options: EncodeOptions = {}
  ): EncodeResult {
    const data: Array<byte> =
      typeof content == "string" ? _toUtf8ByteArray(content) : Array.from(content);

    // Each bracket changes the character count widths, so try them in order
    for (const bracket of EncoderBracket._ALL) {
      const encoded: EncodedData | undefined = new DataEncoder(bracket)._encode(data);
      if (encoded === undefined) continue;
      const version: QrVersion | undefined = chooseVersion(level, bracket, encoded.bits._len());
      if (version === undefined) continue;
      return {
        ok: true,
        qrCode: new QrCode(
          version,
          bracket,
          encoded.segments,
          encoded.bits,
          options.quietZone ?? true
        ),
      };
    }
    return { ok: false, error: new ContentTooLongError(data.length) };
  }

  /*-- Fields --*/

  // Set on first use by _build().
  private _symbol: QrSymbol | undefined;
  private _mask: int = -1;

  /*-- Constructor (low level) --*/

  private constructor(
    public readonly _version: QrVersion,
    // The bracket whose character count widths the data uses.
    public readonly _bracket: EncoderBracket,
    // The segments the data was built from.
    public readonly _segments: ReadonlyArray<Segment>,
    // Segment bits, before terminator and padding.
    private readonly _data: BitSet,
    private readonly _includeQuietZone: boolean
  ) {}

  /*-- Accessor methods --*/

  public get level(): RecoveryLevel {
    return this._version._level;
  }

  // The version number, between 1 and 40 (inclusive).
  public get version(): int {
    return this._version._version;
  }

  // The width and height of the bitmap, quiet zone included.
  public get size(): int {
    return this._build()._fullSize;
  }

  // The index of the chosen mask pattern, between 0 and 7 (inclusive).
  public get mask(): int {
    this._build();
    return this._mask;
  }

  // Returns a fresh copy of the modules, indexed [y][x]; true is dark.
  public bitmap(): Array<Array<boolean>> {
    return this._build()._bitmap();
  }

  /*-- Private helper methods --*/

  // Draws the symbol with every mask and keeps the one with the lowest
  // penalty; the earliest mask wins ties.
  private _build(): QrSymbol {
    if (this._symbol !== undefined) return this._symbol;

    const codewords: BitSet = this._addEccAndInterleave(this._terminatedAndPadded());
    let best: QrSymbol | undefined;
    let minPenalty: int = Infinity;
    for (let mask = 0; mask < NUM_MASKS; mask++) {
      const candidate: QrSymbol = buildRegularSymbol(
        this._version,
        mask,
        codewords,
        this._includeQuietZone
      );
      const penalty: int = candidate._penaltyScore();
      if (best === undefined || penalty < minPenalty) {
        best = candidate;
        this._mask = mask;
        minPenalty = penalty;
      }
    }
    _assert(best !== undefined && 0 <= this._mask && this._mask <= 7);
    this._symbol = best;
    return best;
  }

  // Returns a copy of the data bits with the terminator, the padding up to a
  // codeword boundary, and the alternating pad codewords up to full capacity.
  private _terminatedAndPadded(): BitSet {
    const version: QrVersion = this._version;
    const numDataBits: int = version._numDataBits();
    const bb: BitSet = this._data._clone();

    bb._appendNumBools(version._numTerminatorBitsRequired(bb._len()), false);
    bb._appendNumBools(version._numBitsToPadToCodeword(bb._len()), false);
    for (let i = 0; numDataBits - bb._len() >= 8; i ^= 1)
      bb._appendBits(PAD_CODEWORDS[i], 8);

    _assert(bb._len() == numDataBits, `got ${bb._len()} data bits, expected ${numDataBits}`);
    return bb;
  }

  // Splits the padded data into the version's blocks, appends error correction
  // to each, and interleaves first the data and then the error correction
  // codewords of all blocks. The remainder bits come last.
  private _addEccAndInterleave(data: BitSet): BitSet {
    const blocks: Array<{ codewords: BitSet; eccOffset: int }> = [];
    let start: int = 0;
    for (const group of this._version._blocks) {
      for (let j = 0; j < group.numBlocks; j++) {
        const end: int = start + group.numDataCodewords * 8;
        blocks.push({
          codewords: rsEncode(
            data._substr(start, end),
            group.numCodewords - group.numDataCodewords
          ),
          eccOffset: end - start,
        });
        start = end;
      }
    }

    const result = new BitSet();
    // Interleave (not concatenate) the bytes from every block into a single sequence
    for (let i = 0, working = true; working; i += 8) {
      working = false;
      for (const b of blocks) {
        if (i >= b.eccOffset) continue;
        result._append(b.codewords._substr(i, i + 8));
        working = true;
      }
    }
    for (let i = 0, working = true; working; i += 8) {
      working = false;
      for (const b of blocks) {
        const offset: int = i + b.eccOffset;
        if (offset >= b.codewords._len()) continue;
        result._append(b.codewords._substr(offset, offset + 8));
        working = true;
      }
    }

    result._appendNumBools(this._version._numRemainderBits, false);
    return result;
  }
}

// Returns a new array of bytes representing the given string encoded in UTF-8.
// Unpaired surrogates become U+FFFD.
function _toUtf8ByteArray(str: string): Array<byte> {
  return Array.from(new TextEncoder().encode(str));
}

// Encodes the given content at the given recovery level. See QrCode._encode().
export function encode(
  content: string | Uint8Array,
  level: RecoveryLevel,
  options?: EncodeOptions
): EncodeResult {
  return QrCode._encode(content, level, options);
}
