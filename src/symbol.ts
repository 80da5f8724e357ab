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

type int = number;

/*---- Module grid ----*/

/*
 * A square grid of modules surrounded by a quiet zone. Each module has a
 * value (true = dark) and a flag telling whether it has been written yet.
 * Coordinates passed to the accessors are relative to the symbol, so
 * (0, 0) is the top left module inside the quiet zone.
 */
export class QrSymbol {
  // The modules including the quiet zone, indexed [y][x].
  private readonly _modules: Array<Array<boolean>> = [];
  private readonly _isUsed: Array<Array<boolean>> = [];

  // Width and height of the symbol and both quiet zones.
  public readonly _fullSize: int;

  public constructor(
    // Width and height of the symbol only.
    public readonly _symbolSize: int,
    // Width of one quiet zone.
    public readonly _quietZoneSize: int
  ) {
    this._fullSize = _symbolSize + 2 * _quietZoneSize;
    for (let i = 0; i < this._fullSize; i++) {
      this._modules.push(new Array<boolean>(this._fullSize).fill(false));
      this._isUsed.push(new Array<boolean>(this._fullSize).fill(false));
    }
  }

  /*-- Accessors --*/

  public _get(x: int, y: int): boolean {
    return this._modules[y + this._quietZoneSize][x + this._quietZoneSize];
  }

  public _empty(x: int, y: int): boolean {
    return !this._isUsed[y + this._quietZoneSize][x + this._quietZoneSize];
  }

  public _set(x: int, y: int, isDark: boolean): void {
    this._modules[y + this._quietZoneSize][x + this._quietZoneSize] = isDark;
    this._isUsed[y + this._quietZoneSize][x + this._quietZoneSize] = true;
  }

  // Writes the pattern with its top left corner at (x, y). Rows are y.
  public _set2dPattern(x: int, y: int, pattern: ReadonlyArray<ReadonlyArray<boolean>>): void {
    pattern.forEach((row, j) => row.forEach((v, i) => this._set(x + i, y + j, v)));
  }

  // Counts the modules of the symbol (quiet zone excluded) never written.
  public _numEmptyModules(): int {
    let count: int = 0;
    for (let y = 0; y < this._symbolSize; y++) {
      for (let x = 0; x < this._symbolSize; x++) if (this._empty(x, y)) count++;
    }
    return count;
  }

  // Returns a copy of all modules, quiet zone included, indexed [y][x].
  public _bitmap(): Array<Array<boolean>> {
    return this._modules.map((row) => row.slice());
  }

  /*-- Penalty scoring --*/

  // Scores how likely the symbol's data area is to confuse a reader.
  // Lower is better; used to choose among the eight masks.
  public _penaltyScore(): int {
    return this._penalty1() + this._penalty2() + this._penalty3() + this._penalty4();
  }

  // Runs of same-colour modules in a row or column. A run reaching
  // 6 modules scores PENALTY_N1 + 1, and every further module 1 more.
  public _penalty1(): int {
    let penalty: int = 0;
    for (const vertical of [true, false]) {
      for (let a = 0; a < this._symbolSize; a++) {
        let lastValue: boolean = this._line(vertical, a, 0);
        let count: int = 1;
        for (let b = 1; b < this._symbolSize; b++) {
          const v: boolean = this._line(vertical, a, b);
          if (v != lastValue) {
            count = 1;
            lastValue = v;
          } else {
            count++;
            if (count == 6) penalty += PENALTY_N1 + 1;
            else if (count > 6) penalty++;
          }
        }
      }
    }
    return penalty;
  }

  // 2*2 blocks of modules having same color
  public _penalty2(): int {
    let penalty: int = 0;
    for (let y = 1; y < this._symbolSize; y++) {
      for (let x = 1; x < this._symbolSize; x++) {
        const color: boolean = this._get(x, y);
        if (
          color == this._get(x - 1, y) &&
          color == this._get(x, y - 1) &&
          color == this._get(x - 1, y - 1)
        )
          penalty++;
      }
    }
    return penalty * PENALTY_N2;
  }

  // Finder-like 1:1:3:1:1 patterns with four light modules on one side,
  // scanned along rows first and then along columns.
  public _penalty3(): int {
    let penalty: int = 0;
    for (const vertical of [false, true]) {
      for (let a = 0; a < this._symbolSize; a++) {
        let window: int = 0; // The last 11 modules, most recent in the low bit
        for (let b = 0; b < this._symbolSize; b++) {
          window = ((window << 1) | (this._line(vertical, a, b) ? 1 : 0)) & 0x7ff;
          if (
            window == 0b00001011101 ||
            window == 0b10111010000 ||
            (b == this._symbolSize - 1 && (window & 0x7f) == 0b1011101)
          ) {
            penalty += PENALTY_N3;
            window = 0xff;
          }
        }
      }
    }
    return penalty;
  }

  // Balance of dark and light modules, in steps of 5% away from half.
  public _penalty4(): int {
    const numModules: int = this._symbolSize * this._symbolSize;
    let numDark: int = 0;
    for (let y = 0; y < this._symbolSize; y++) {
      for (let x = 0; x < this._symbolSize; x++) if (this._get(x, y)) numDark++;
    }
    const deviation: int = Math.abs(Math.floor(numModules / 2) - numDark);
    return PENALTY_N4 * Math.floor(deviation / Math.floor(numModules / 20));
  }

  // Reads module b of row a, or of column a when vertical.
  private _line(vertical: boolean, a: int, b: int): boolean {
    return vertical ? this._get(a, b) : this._get(b, a);
  }
}

// For use in _penaltyScore(), when evaluating which mask is best.
const PENALTY_N1: int = 3;
const PENALTY_N2: int = 3;
const PENALTY_N3: int = 40;
const PENALTY_N4: int = 10;
