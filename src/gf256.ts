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

/*---- Arithmetic in GF(2^8/0x11D) ----*/

// Field elements are unsigned 8-bit integers. Addition is XOR; multiplication
// and division go through the exponent and logarithm tables below.

function _buildTables(): [ReadonlyArray<byte>, ReadonlyArray<int>] {
  const exp: Array<byte> = new Array<byte>(256).fill(0);
  const log: Array<int> = new Array<int>(256).fill(0);
  let x: int = 1;
  for (let i = 0; i < 255; i++) {
    exp[i] = x;
    log[x] = i;
    x <<= 1;
    if (x & 0x100) x ^= 0x11d;
  }
  exp[255] = exp[0]; // Wraps around, since the generator 0x02 has order 255
  return [Object.freeze(exp), Object.freeze(log)];
}

// GF_EXP[i] is 2^i in the field. GF_LOG is its inverse, with GF_LOG[0] unused.
export const [GF_EXP, GF_LOG] = _buildTables();

export const GF_ZERO: byte = 0;
export const GF_ONE: byte = 1;

// Returns the sum (and difference) of the two field elements.
export function gfAdd(a: byte, b: byte): byte {
  return a ^ b;
}

export function gfMultiply(a: byte, b: byte): byte {
  if (a === GF_ZERO || b === GF_ZERO) return GF_ZERO;
  return GF_EXP[(GF_LOG[a] + GF_LOG[b]) % 255];
}

// Returns a / b. Division by zero is a construction defect and throws.
export function gfDivide(a: byte, b: byte): byte {
  if (b === GF_ZERO) throw new RangeError("Divide by zero");
  if (a === GF_ZERO) return GF_ZERO;
  return gfMultiply(a, gfInverse(b));
}

// Returns the multiplicative inverse of a. Zero has none and throws.
export function gfInverse(a: byte): byte {
  if (a === GF_ZERO) throw new RangeError("No multiplicative inverse of 0");
  return GF_EXP[255 - GF_LOG[a]];
}
