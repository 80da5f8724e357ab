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

/*---- Error types ----*/

/*
 * Returned by encode() when the content does not fit the largest symbol
 * of the requested recovery level in any character count bracket.
 * This is the only failure a caller can provoke.
 */
export class ContentTooLongError extends RangeError {
  public constructor(
    // Length of the rejected content in bytes.
    public readonly contentLength: number
  ) {
    super("content does not fit any supported version/level combination");
    this.name = "ContentTooLongError";
  }
}

// Throws an exception if the given condition is false. Reserved for
// internal invariants; a failure here means the encoder itself is broken.
export function _assert(cond: boolean, message = "Assertion error"): asserts cond {
  if (!cond) throw new Error(message);
}
