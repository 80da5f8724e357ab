import { describe, expect, test } from "vitest";

import { EncoderBracket } from "./data-encoder";
import { RecoveryLevel, VERSIONS, chooseVersion, getVersion } from "./version";

describe("capacity table", () => {
  test("one record per version and level", () => {
    expect(VERSIONS).toHaveLength(160);
    const keys = new Set(VERSIONS.map((v) => `${v._version}/${v._level.name}`));
    expect(keys.size).toBe(160);
  });

  test("codewords fill the symbol", () => {
    for (const v of VERSIONS) {
      const size = v._symbolSize();
      const numCodewords = v._blocks.reduce((sum, b) => sum + b.numBlocks * b.numCodewords, 0);
      // Function modules: finders, separators and format info...
      let functionModules = 3 * 64 + 31 + 2 * (size - 16);
      const numAlign = v._version == 1 ? 0 : Math.floor(v._version / 7) + 2;
      // ...alignment patterns, minus their overlap with the timing strips...
      if (numAlign > 0) functionModules += 25 * (numAlign * numAlign - 3) - 10 * (numAlign - 2);
      // ...and version info.
      if (v._version >= 7) functionModules += 36;
      expect(numCodewords * 8 + v._numRemainderBits).toBe(size * size - functionModules);
    }
  });

  test.each<[RecoveryLevel, number, number, number]>([
    [RecoveryLevel.LOW, 1, 152, 1],
    [RecoveryLevel.MEDIUM, 1, 128, 1],
    [RecoveryLevel.HIGHEST, 5, 368, 4],
    [RecoveryLevel.LOW, 40, 23648, 25],
    [RecoveryLevel.HIGHEST, 40, 10208, 81],
  ])("%s version %i", (level, version, numDataBits, numBlocks) => {
    const v = getVersion(level, version);
    expect(v._numDataBits()).toBe(numDataBits);
    expect(v._numBlocks()).toBe(numBlocks);
  });

  test("unknown version", () => {
    expect(() => getVersion(RecoveryLevel.LOW, 41)).toThrow(RangeError);
  });

  test("symbol sizes", () => {
    expect(getVersion(RecoveryLevel.LOW, 1)._symbolSize()).toBe(21);
    expect(getVersion(RecoveryLevel.LOW, 40)._symbolSize()).toBe(177);
    expect(getVersion(RecoveryLevel.LOW, 40)._quietZoneSize()).toBe(4);
  });
});

describe("padding", () => {
  const v1 = getVersion(RecoveryLevel.LOW, 1);

  test.each([
    [0, 0],
    [1, 7],
    [7, 1],
    [8, 0],
    [151, 1],
    [152, 0],
  ])("pad %i bits by %i", (numBits, expected) => {
    expect(v1._numBitsToPadToCodeword(numBits)).toBe(expected);
  });

  test.each([
    [0, 4],
    [148, 4],
    [150, 2],
    [152, 0],
  ])("terminate %i bits with %i", (numBits, expected) => {
    expect(v1._numTerminatorBitsRequired(numBits)).toBe(expected);
  });
});

describe("format and version information", () => {
  test.each<[RecoveryLevel, number, number]>([
    [RecoveryLevel.LOW, 1, 0x72f3],
    [RecoveryLevel.MEDIUM, 2, 0x5e7c],
    [RecoveryLevel.HIGH, 3, 0x3a06],
    [RecoveryLevel.HIGHEST, 4, 0x0762],
    [RecoveryLevel.LOW, 5, 0x6318],
    [RecoveryLevel.MEDIUM, 6, 0x4f97],
    [RecoveryLevel.HIGH, 7, 0x2bed],
  ])("%s mask %i", (level, mask, expected) => {
    expect(getVersion(level, 1)._formatInfo(mask).toString()).toBe(expected.toString(2).padStart(15, "0"));
  });

  test("mask out of range", () => {
    expect(() => getVersion(RecoveryLevel.LOW, 1)._formatInfo(8)).toThrow(RangeError);
    expect(() => getVersion(RecoveryLevel.LOW, 1)._formatInfo(-1)).toThrow(RangeError);
  });

  test.each([
    [7, 0x07c94],
    [10, 0x0a4d3],
    [20, 0x149a6],
    [30, 0x1ed75],
    [40, 0x28c69],
  ])("version %i", (version, expected) => {
    expect(getVersion(RecoveryLevel.MEDIUM, version)._versionInfo()?.toString()).toBe(
      expected.toString(2).padStart(18, "0")
    );
  });

  test("no version information below version 7", () => {
    expect(getVersion(RecoveryLevel.MEDIUM, 6)._versionInfo()).toBeUndefined();
  });
});

describe("choosing a version", () => {
  test("smallest version that fits", () => {
    expect(chooseVersion(RecoveryLevel.LOW, EncoderBracket.V1_TO_9, 0)?._version).toBe(1);
    expect(chooseVersion(RecoveryLevel.LOW, EncoderBracket.V1_TO_9, 152)?._version).toBe(1);
    expect(chooseVersion(RecoveryLevel.LOW, EncoderBracket.V1_TO_9, 153)?._version).toBe(2);
    expect(chooseVersion(RecoveryLevel.MEDIUM, EncoderBracket.V1_TO_9, 153)?._version).toBe(2);
  });

  test("stays within the bracket", () => {
    expect(chooseVersion(RecoveryLevel.LOW, EncoderBracket.V10_TO_26, 1)?._version).toBe(10);
    expect(chooseVersion(RecoveryLevel.LOW, EncoderBracket.V1_TO_9, 100000)).toBeUndefined();
    expect(chooseVersion(RecoveryLevel.LOW, EncoderBracket.V27_TO_40, 23648)?._version).toBe(40);
    expect(chooseVersion(RecoveryLevel.LOW, EncoderBracket.V27_TO_40, 23649)).toBeUndefined();
  });

  test("keeps the requested level", () => {
    expect(chooseVersion(RecoveryLevel.HIGH, EncoderBracket.V1_TO_9, 1)?._level).toBe(RecoveryLevel.HIGH);
  });

  test("levels by name", () => {
    expect(RecoveryLevel._fromName("HIGHEST")).toBe(RecoveryLevel.HIGHEST);
    expect(() => RecoveryLevel._fromName("EXTREME")).toThrow(RangeError);
  });
});
