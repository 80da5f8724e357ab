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
import { GF_EXP, GF_ONE } from "./gf256";
import { GfPoly } from "./gf-poly";

type int = number;

/*---- Reed-Solomon error correction ----*/

// Returns a copy of the given data block followed by numEccBytes error
// correction codewords. The data length must be a multiple of 8 bits.
export function rsEncode(data: BitSet, numEccBytes: int): BitSet {
  if (data._len() % 8 != 0)
    throw new RangeError("Data block is not byte aligned");

  // The data bytes become the coefficients of a polynomial, last byte as x^0.
  // Shifting by x^n leaves room for the n remainder coefficients.
  const shifted: GfPoly = GfPoly._fromData(data)._multiply(
    GfPoly._monomial(GF_ONE, numEccBytes)
  );
  const remainder: GfPoly = shifted._remainder(
    rsGeneratorPoly(numEccBytes)
  );

  // Mathematically the codeword is shifted + remainder, but going through the
  // polynomial would lose leading zero bytes, so the original bits are kept.
  const result: BitSet = data._clone();
  result._appendBytes(remainder._toBytes(numEccBytes));
  return result;
}

// Returns the generator polynomial (x + a^0)(x + a^1)...(x + a^(degree-1)).
export function rsGeneratorPoly(degree: int): GfPoly {
  if (degree < 2) throw new RangeError("Degree out of range");
  let generator: GfPoly = GfPoly._fromTerms([GF_ONE]);
  for (let i = 0; i < degree; i++)
    generator = generator._multiply(GfPoly._fromTerms([GF_EXP[i], GF_ONE]));
  return generator;
}
