import { describe, expect, test } from "vitest";

import { BitSet } from "./bitset";

describe("appending", () => {
  test("bools", () => {
    const bits = BitSet._of(true, false);
    bits._appendBools(true, true);
    expect(bits.toString()).toBe("1011");
    expect(BitSet._of()._len()).toBe(0);
  });

  test("low-order bits of a number", () => {
    const bits = new BitSet();
    bits._appendBits(0xaaaaaaaf & 0xf, 4);
    bits._appendBits(5, 6);
    expect(bits.toString()).toBe("1111000101");
    expect(() => bits._appendBits(4, 2)).toThrow("Value out of range");
  });

  test("runs and other sets", () => {
    const bits = BitSet._fromBase2String("1");
    bits._appendNumBools(3, false);
    bits._append(BitSet._fromBase2String("11"));
    bits._appendBytes([0x81]);
    expect(bits.toString()).toBe("10001110000001");
    expect(bits._len()).toBe(14);
  });
});

describe("reading", () => {
  const bits = BitSet._fromBase2String("0101 0110 1");

  test("single bits", () => {
    expect([0, 1, 2, 3, 8].map((i) => bits._at(i))).toEqual([false, true, false, true, true]);
    expect(() => bits._at(9)).toThrow(RangeError);
  });

  test("bytes, padding past the end with zeros", () => {
    expect(bits._byteAt(0)).toBe(0x56);
    expect(bits._byteAt(8)).toBe(0x80);
  });

  test("sub ranges are copies", () => {
    const sub = bits._substr(2, 6);
    expect(sub.toString()).toBe("0101");
    sub._appendBools(true);
    expect(bits._len()).toBe(9);
    expect(() => bits._substr(4, 10)).toThrow(RangeError);
  });

  test("equality", () => {
    expect(bits._equals(bits._clone())).toBe(true);
    expect(bits._equals(BitSet._fromBase2String("0101"))).toBe(false);
  });
});

test("rejects malformed base 2 strings", () => {
  expect(() => BitSet._fromBase2String("012")).toThrow('Invalid character "2"');
});
