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

type bit = number;
type byte = number;
type int = number;

/*---- Bit buffer ----*/

/*
 * An append-only sequence of bits, most significant bit first.
 * Every bit stream of the encoder (segments, padding, codewords and the
 * final interleaved sequence) is built in one of these.
 */
export class BitSet {
  /*-- Static factory functions --*/

  public static _of(...bits: Array<boolean>): BitSet {
    const result = new BitSet();
    result._appendBools(...bits);
    return result;
  }

  // Parses a string of '0' and '1' characters. Spaces are ignored,
  // so groups can be written apart for readability.
  public static _fromBase2String(s: string): BitSet {
    const result = new BitSet();
    for (const c of s) {
      if (c == "1") result._bits.push(1);
      else if (c == "0") result._bits.push(0);
      else if (c != " ") throw new RangeError(`Invalid character "${c}"`);
    }
    return result;
  }

  /*-- Fields --*/

  private readonly _bits: Array<bit> = [];

  /*-- Appending --*/

  // Appends the given number of low-order bits of the given value.
  // Requires 0 <= len <= 31 and 0 <= val < 2^len.
  public _appendBits(val: int, len: int): void {
    if (len < 0 || len > 31 || val >>> len != 0)
      throw new RangeError("Value out of range");
    for (let i = len - 1; i >= 0; i--) this._bits.push((val >>> i) & 1);
  }

  public _appendBytes(data: Readonly<Array<byte>>): void {
    for (const b of data) this._appendBits(b, 8);
  }

  public _appendBools(...bits: Array<boolean>): void {
    for (const b of bits) this._bits.push(b ? 1 : 0);
  }

  public _appendNumBools(num: int, value: boolean): void {
    for (let i = 0; i < num; i++) this._bits.push(value ? 1 : 0);
  }

  public _append(other: BitSet): void {
    for (const b of other._bits) this._bits.push(b);
  }

  /*-- Accessors --*/

  public _len(): int {
    return this._bits.length;
  }

  public _at(index: int): boolean {
    if (index < 0 || index >= this._bits.length)
      throw new RangeError("Index out of range");
    return this._bits[index] == 1;
  }

  // Returns the 8 bits starting at the given index as a byte. Bits past
  // the end read as zero.
  public _byteAt(index: int): byte {
    if (index < 0 || index >= this._bits.length)
      throw new RangeError("Index out of range");
    let result: byte = 0;
    for (let i = index; i < index + 8; i++)
      result = (result << 1) | (i < this._bits.length ? this._bits[i] : 0);
    return result;
  }

  // Returns a copy of the bits in [start, end).
  public _substr(start: int, end: int): BitSet {
    if (start < 0 || start > end || end > this._bits.length)
      throw new RangeError("Range out of bounds");
    const result = new BitSet();
    for (let i = start; i < end; i++) result._bits.push(this._bits[i]);
    return result;
  }

  public _clone(): BitSet {
    return this._substr(0, this._bits.length);
  }

  public _equals(other: BitSet): boolean {
    return (
      this._bits.length == other._bits.length &&
      this._bits.every((b, i) => b == other._bits[i])
    );
  }

  public toString(): string {
    return this._bits.join("");
  }
}
