// src/core/dithering/lib/matrices.ts

import type { IThresholdMatrix } from '../../../@types/index.ts';

/** Recursive 8x8 Bayer index matrix (dispersed dot). */
export const BAYER_8X8: IThresholdMatrix = {
    size: 8,
    ranks: [
        0, 32, 8, 40, 2, 34, 10, 42,
        48, 16, 56, 24, 50, 18, 58, 26,
        12, 44, 4, 36, 14, 46, 6, 38,
        60, 28, 52, 20, 62, 30, 54, 22,
        3, 35, 11, 43, 1, 33, 9, 41,
        51, 19, 59, 27, 49, 17, 57, 25,
        15, 47, 7, 39, 13, 45, 5, 37,
        63, 31, 55, 23, 61, 29, 53, 21,
    ],
};

/**
 * 8x8 clustered-dot matrix, two 45° cells per tile. Low ranks sit at the cell
 * centres, so paper-white dots grow outward from there as the level rises.
 */
export const CLUSTER_8X8: IThresholdMatrix = {
    size: 8,
    ranks: [
        24, 10, 12, 26, 35, 47, 49, 37,
        8, 0, 2, 14, 45, 59, 61, 51,
        22, 6, 4, 16, 43, 57, 63, 53,
        30, 20, 18, 28, 33, 41, 55, 39,
        34, 46, 48, 36, 25, 11, 13, 27,
        44, 58, 60, 50, 9, 1, 3, 15,
        42, 56, 62, 52, 23, 7, 5, 17,
        32, 40, 54, 38, 31, 21, 19, 29,
    ],
};

/**
 * Converts ranks 0..n-1 to 8-bit thresholds centred in their bucket:
 * `round((rank + 0.5) * 256 / n)`.
 */
export function toThresholds(matrix: IThresholdMatrix): Uint8Array {
    const cells = matrix.size * matrix.size;
    return Uint8Array.from(matrix.ranks, (rank) => Math.round((rank + 0.5) * 256 / cells));
}
