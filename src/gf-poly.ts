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
  GF_LOG,
  GF_ZERO,
  gfAdd,
  gfDivide,
  gfMultiply,
} from "./gf256";

type byte = number;
type int = number;

/*---- Polynomial over GF(2^8) ----*/

/*
 * A polynomial whose coefficients are elements of GF(2^8). Immutable.
 * The i'th term is the coefficient of x^i. Instances are always normalized:
 * the highest stored term is non-zero, and the zero polynomial has no terms.
 */
export class GfPoly {
  /*-- Static factory functions --*/

  public static readonly _ZERO = new GfPoly([]);

  // Returns the polynomial with the given coefficients, lowest degree first.
  public static _fromTerms(terms: Readonly<Array<byte>>): GfPoly {
    return new GfPoly(_normalized(terms));
  }

  // Returns term * x^degree.
  public static _monomial(term: byte, degree: int): GfPoly {
    if (term === GF_ZERO) return GfPoly._ZERO;
    const terms: Array<byte> = new Array<byte>(degree + 1).fill(0);
    terms[degree] = term;
    return new GfPoly(terms);
  }

  // Reads the given bits as bytes. The last byte becomes the x^0
  // coefficient, the second to last the x^1 coefficient, and so on.
  public static _fromData(data: BitSet): GfPoly {
    const numBytes: int = Math.ceil(data._len() / 8);
    const terms: Array<byte> = new Array<byte>(numBytes).fill(0);
    for (let j = 0, i = numBytes - 1; j < data._len(); j += 8, i--)
      terms[i] = data._byteAt(j);
    return GfPoly._fromTerms(terms);
  }

  /*-- Constructor and fields --*/

  private constructor(public readonly _terms: ReadonlyArray<byte>) {}

  /*-- Methods --*/

  public _numTerms(): int {
    return this._terms.length;
  }

  // Returns the degree, or -1 for the zero polynomial.
  public _degree(): int {
    return this._terms.length - 1;
  }

  public _isZero(): boolean {
    return this._terms.length == 0;
  }

  public _add(other: GfPoly): GfPoly {
    const a = this._terms;
    const b = other._terms;
    const result: Array<byte> = [];
    for (let i = 0; i < Math.max(a.length, b.length); i++) {
      if (i < a.length && i < b.length) result.push(gfAdd(a[i], b[i]));
      else if (i < a.length) result.push(a[i]);
      else result.push(b[i]);
    }
    return GfPoly._fromTerms(result);
  }

  public _multiply(other: GfPoly): GfPoly {
    const a = this._terms;
    const b = other._terms;
    const result: Array<byte> = new Array<byte>(a.length + b.length).fill(0);
    for (let i = 0; i < a.length; i++) {
      if (a[i] === GF_ZERO) continue;
      for (let j = 0; j < b.length; j++)
        result[i + j] = gfAdd(result[i + j], gfMultiply(a[i], b[j]));
    }
    return GfPoly._fromTerms(result);
  }

  // Returns this polynomial modulo the given denominator, which must not be zero.
  // Every step cancels the leading term, so the degree strictly decreases.
  public _remainder(denominator: GfPoly): GfPoly {
    if (denominator._isZero()) throw new RangeError("Remainder by zero");
    const lead: byte = denominator._terms[denominator._degree()];
    let remainder: GfPoly = this;
    while (remainder._numTerms() >= denominator._numTerms()) {
      const coefficient: byte = gfDivide(
        remainder._terms[remainder._degree()],
        lead
      );
      const divisor: GfPoly = denominator._multiply(
        GfPoly._monomial(
          coefficient,
          remainder._numTerms() - denominator._numTerms()
        )
      );
      remainder = remainder._add(divisor);
    }
    return remainder;
  }

  // Returns the coefficients as numTerms bytes, highest degree first,
  // left-padded with zero bytes.
  public _toBytes(numTerms: int): Array<byte> {
    if (numTerms < this._numTerms())
      throw new RangeError("Polynomial has too many terms");
    const result: Array<byte> = new Array<byte>(numTerms).fill(0);
    for (let j = this._degree(), i = numTerms - this._numTerms(); j >= 0; j--, i++)
      result[i] = this._terms[j];
    return result;
  }

  public _equals(other: GfPoly): boolean {
    const n: int = Math.max(this._numTerms(), other._numTerms());
    for (let i = 0; i < n; i++) {
      const a: byte = i < this._numTerms() ? this._terms[i] : GF_ZERO;
      const b: byte = i < other._numTerms() ? other._terms[i] : GF_ZERO;
      if (a !== b) return false;
    }
    return true;
  }

  // Renders the polynomial highest degree first, e.g. "3x^2 + 1x^0".
  // In index form every coefficient is written as a power of the generator.
  public toString(useIndexForm: boolean = false): string {
    const parts: Array<string> = [];
    for (let i = this._degree(); i >= 0; i--) {
      const term: byte = this._terms[i];
      if (term === GF_ZERO) continue;
      parts.push(useIndexForm ? `a^${GF_LOG[term]}x^${i}` : `${term}x^${i}`);
    }
    return parts.length == 0 ? "0" : parts.join(" + ");
  }
}

// Drops zero coefficients from the high end.
function _normalized(terms: Readonly<Array<byte>>): Array<byte> {
  let end: int = terms.length;
  while (end > 0 && terms[end - 1] === GF_ZERO) end--;
  return terms.slice(0, end);
}
