/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @csxdif/dif - Versioned DIF interior assembly
 */

export { DifWriter } from './writer.js';
export { DifReader } from './reader.js';
export { encodeInterior, stripOrder, fanMask, DEFAULT_MIN_PIXELS } from './interior-encoder.js';
export type { InteriorSource, EncodeInteriorOptions } from './interior-encoder.js';
export { buildEmitString, buildPolyList } from './hull-strings.js';
export type { HullPoly, PolyList, PolyListSurface } from './hull-strings.js';
export { BufferWriter, BufferReader, MAX_STRING_BYTES } from './utils/buffer-utils.js';
export * from './types.js';
