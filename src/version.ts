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
import type { EncoderBracket } from "./data-encoder";
import { _assert } from "./errors";
import table from "./data/versions.json";

type int = number;

/*---- Public helper enumeration ----*/

/*
 * The error correction level in a QR Code symbol. Immutable.
 */
export class RecoveryLevel {
  /*-- Constants --*/

  public static readonly LOW = new RecoveryLevel("LOW", 0, 1); // The QR Code can tolerate about  7% erroneous codewords
  public static readonly MEDIUM = new RecoveryLevel("MEDIUM", 1, 0); // The QR Code can tolerate about 15% erroneous codewords
  public static readonly HIGH = new RecoveryLevel("HIGH", 2, 3); // The QR Code can tolerate about 25% erroneous codewords
  public static readonly HIGHEST = new RecoveryLevel("HIGHEST", 3, 2); // The QR Code can tolerate about 30% erroneous codewords

  public static readonly _ALL: ReadonlyArray<RecoveryLevel> = [
    RecoveryLevel.LOW,
    RecoveryLevel.MEDIUM,
    RecoveryLevel.HIGH,
    RecoveryLevel.HIGHEST,
  ];

  /*-- Constructor and fields --*/

  private constructor(
    public readonly name: string,
    // In the range 0 to 3 (unsigned 2-bit integer).
    public readonly _ordinal: int,
    // (Package-private) In the range 0 to 3 (unsigned 2-bit integer).
    public readonly _formatBits: int
  ) {}

  public static _fromName(name: string): RecoveryLevel {
    const level = RecoveryLevel._ALL.find((l) => l.name == name);
    if (level === undefined) throw new RangeError(`Unknown level ${name}`);
    return level;
  }
}

/*---- Format and version information ----*/

export const FORMAT_INFO_LENGTH_BITS: int = 15;
export const VERSION_INFO_LENGTH_BITS: int = 18;

// Appends the BCH error correction bits of the given generator to data.
function _bch(data: int, generator: int, numEccBits: int): int {
  let rem: int = data;
  for (let i = 0; i < numEccBits; i++)
    rem = (rem << 1) ^ ((rem >>> (numEccBits - 1)) * generator);
  return (data << numEccBits) | rem;
}

// Indexed by the 5 data bits: 2 bits of level, then 3 bits of mask.
// For example level L (01) with mask 001 is entry 0b01001, 0x72f3.
const FORMAT_INFO: ReadonlyArray<int> = Object.freeze(
  Array.from({ length: 32 }, (_, data) => _bch(data, 0x537, 10) ^ 0x5412)
);

// Indexed by version. Only versions 7 and above carry version information.
const VERSION_INFO: ReadonlyArray<int> = Object.freeze(
  Array.from({ length: 41 }, (_, ver) => (ver < 7 ? 0 : _bch(ver, 0x1f25, 12)))
);

/*---- Capacity table ----*/

/*
 * A group of equally sized blocks in a symbol.
 */
export interface BlockGroup {
  readonly numBlocks: int;
  // Total codewords per block (error correction included).
  readonly numCodewords: int;
  readonly numDataCodewords: int;
}

/*
 * One (version, level) combination with its block layout. Immutable.
 */
export class QrVersion {
  public constructor(
    // Between 1 and 40 (inclusive).
    public readonly _version: int,
    public readonly _level: RecoveryLevel,
    public readonly _blocks: ReadonlyArray<BlockGroup>,
    // Bits of padding after the interleaved codewords to fill the symbol.
    public readonly _numRemainderBits: int
  ) {}

  // Returns the data capacity in bits.
  public _numDataBits(): int {
    return this._blocks.reduce(
      (sum, b) => sum + 8 * b.numBlocks * b.numDataCodewords,
      0
    );
  }

  public _numBlocks(): int {
    return this._blocks.reduce((sum, b) => sum + b.numBlocks, 0);
  }

  // The terminator is up to 4 zero bits, truncated when the symbol is nearly full.
  public _numTerminatorBitsRequired(numDataBits: int): int {
    return Math.min(4, this._numDataBits() - numDataBits);
  }

  // Returns the number of bits required to pad data of the given
  // length up to the nearest codeword boundary.
  public _numBitsToPadToCodeword(numDataBits: int): int {
    if (numDataBits == this._numDataBits()) return 0;
    return (8 - (numDataBits % 8)) % 8;
  }

  // The width and height of the symbol in modules, without the quiet zone.
  public _symbolSize(): int {
    return 21 + (this._version - 1) * 4;
  }

  public _quietZoneSize(): int {
    return 4;
  }

  // Returns the 15-bit format information for this level and the given mask.
  public _formatInfo(mask: int): BitSet {
    if (mask < 0 || mask > 7) throw new RangeError("Mask value out of range");
    const result = new BitSet();
    result._appendBits(
      FORMAT_INFO[(this._level._formatBits << 3) | mask],
      FORMAT_INFO_LENGTH_BITS
    );
    return result;
  }

  // Returns the 18-bit version information, or undefined below version 7.
  public _versionInfo(): BitSet | undefined {
    if (this._version < 7) return undefined;
    const result = new BitSet();
    result._appendBits(VERSION_INFO[this._version], VERSION_INFO_LENGTH_BITS);
    return result;
  }
}

// Every (version, level) pair, ascending by version then by level ordinal.
export const VERSIONS: ReadonlyArray<QrVersion> = Object.freeze(
  table.map((entry) => {
    const blocks: Array<BlockGroup> = entry.blocks.map((b) => {
      _assert(b.length == 3, "Malformed block group");
      return Object.freeze({
        numBlocks: b[0],
        numCodewords: b[1],
        numDataCodewords: b[2],
      });
    });
    return new QrVersion(
      entry.version,
      RecoveryLevel._fromName(entry.level),
      Object.freeze(blocks),
      entry.remainderBits
    );
  })
);

// Returns the smallest version of the given level, within the bracket's range,
// that holds numDataBits bits of segment data; undefined if none does.
export function chooseVersion(
  level: RecoveryLevel,
  bracket: EncoderBracket,
  numDataBits: int
): QrVersion | undefined {
  for (const v of VERSIONS) {
    if (v._level !== level || v._version < bracket._minVersion) continue;
    if (v._version > bracket._maxVersion) break;
    if (v._numDataBits() >= numDataBits) return v;
  }
  return undefined;
}

export function getVersion(level: RecoveryLevel, version: int): QrVersion {
  const result = VERSIONS.find((v) => v._level === level && v._version == version);
  if (result === undefined) throw new RangeError("Version number out of range");
  return result;
}
