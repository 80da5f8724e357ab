import { expect, test } from "vitest";

import { BitSet } from "./bitset";
import { rsEncode, rsGeneratorPoly } from "./reed-solomon";

function bytesOf(bits: BitSet): number[] {
  const result: number[] = [];
  for (let i = 0; i < bits._len(); i += 8) result.push(bits._byteAt(i));
  return result;
}

function bitsOf(bytes: number[]): BitSet {
  const bits = new BitSet();
  bits._appendBytes(bytes);
  return bits;
}

test("generator polynomials", () => {
  expect(rsGeneratorPoly(2)._terms).toEqual([2, 3, 1]);
  expect(rsGeneratorPoly(7)._terms).toEqual([117, 68, 11, 164, 154, 122, 127, 1]);
  expect(() => rsGeneratorPoly(1)).toThrow(RangeError);
});

test("version 1-M codewords for 01234567", () => {
  const data = [
    0x10, 0x20, 0x0c, 0x56, 0x61, 0x80, 0xec, 0x11, 0xec, 0x11, 0xec, 0x11,
    0xec, 0x11, 0xec, 0x11,
  ];
  expect(bytesOf(rsEncode(bitsOf(data), 10))).toEqual([
    ...data,
    0xa5, 0x24, 0xd4, 0xc1, 0xed, 0x36, 0xc7, 0x87, 0x2c, 0x55,
  ]);
});

test("keeps leading zero bytes of the data", () => {
  expect(bytesOf(rsEncode(bitsOf([0, 0, 1]), 2))).toEqual([0, 0, 1, 3, 2]);
});

test("all-zero data has all-zero error correction", () => {
  expect(bytesOf(rsEncode(bitsOf([0, 0, 0]), 4))).toEqual([0, 0, 0, 0, 0, 0, 0]);
});

test("does not modify its input", () => {
  const data = bitsOf([1, 2, 3]);
  rsEncode(data, 5);
  expect(data._len()).toBe(24);
});

test("rejects data that is not byte aligned", () => {
  expect(() => rsEncode(BitSet._fromBase2String("101"), 2)).toThrow(
    "Data block is not byte aligned"
  );
});
