/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @csxdif/spatial - BSP construction and raycast coverage
 */

export { BspBuilder, buildBsp, balanceFactor, nodeHeights, DEFAULT_BSP_OPTIONS } from './bsp-builder.js';
export { computeBspReport, raycastHits, RAY_DISTANCE } from './bsp-report.js';
export { makeRng } from './rng.js';
export type { RNG } from './rng.js';
export type { BspInput, BspInternalNode, BspLeaf, BspNode, BspOptions, BspReport, BspTree } from './types.js';
