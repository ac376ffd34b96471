// src/core/dithering/lib/kernels.ts

import type { DiffusionKernelName, IDiffusionKernel } from '../../../@types/index.ts';

type RawOffset = readonly [dx: number, dy: number, numerator: number];

function kernel(divisor: number, raw: readonly RawOffset[]): IDiffusionKernel {
    return {
        offsets: raw.map(([dx, dy, n]) => [dx, dy, n / divisor] as const),
    };
}

/**
 * Error distribution kernels. Offsets only point at pixels the raster scan has
 * not visited yet (same row to the right, or any later row).
 *
 * ```
 * Floyd-Steinberg /16      Atkinson /8
 *       *  7                    *  1  1
 *    3  5  1                 1  1  1
 *                               1
 * ```
 */
export const DiffusionKernels: Record<DiffusionKernelName, IDiffusionKernel> = {
    'floyd-steinberg': kernel(16, [
        [1, 0, 7],
        [-1, 1, 3], [0, 1, 5], [1, 1, 1],
    ]),
    // diffuses 6/8 of the error
    'atkinson': kernel(8, [
        [1, 0, 1], [2, 0, 1],
        [-1, 1, 1], [0, 1, 1], [1, 1, 1],
        [0, 2, 1],
    ]),
    'jarvis-judice-ninke': kernel(48, [
        [1, 0, 7], [2, 0, 5],
        [-2, 1, 3], [-1, 1, 5], [0, 1, 7], [1, 1, 5], [2, 1, 3],
        [-2, 2, 1], [-1, 2, 3], [0, 2, 5], [1, 2, 3], [2, 2, 1],
    ]),
    'stucki': kernel(42, [
        [1, 0, 8], [2, 0, 4],
        [-2, 1, 2], [-1, 1, 4], [0, 1, 8], [1, 1, 4], [2, 1, 2],
        [-2, 2, 1], [-1, 2, 2], [0, 2, 4], [1, 2, 2], [2, 2, 1],
    ]),
    'burkes': kernel(32, [
        [1, 0, 8], [2, 0, 4],
        [-2, 1, 2], [-1, 1, 4], [0, 1, 8], [1, 1, 4], [2, 1, 2],
    ]),
    'sierra3': kernel(32, [
        [1, 0, 5], [2, 0, 3],
        [-2, 1, 2], [-1, 1, 4], [0, 1, 5], [1, 1, 4], [2, 1, 2],
        [-1, 2, 2], [0, 2, 3], [1, 2, 2],
    ]),
    'sierra2': kernel(16, [
        [1, 0, 4], [2, 0, 3],
        [-2, 1, 1], [-1, 1, 2], [0, 1, 3], [1, 1, 2], [2, 1, 1],
    ]),
    // Sierra Lite
    'sierra-2-4a': kernel(4, [
        [1, 0, 2],
        [-1, 1, 1], [0, 1, 1],
    ]),
};

/** Fraction of the quantization error a kernel hands on (1 for all but Atkinson). */
export function kernelWeightSum(k: IDiffusionKernel): number {
    return k.offsets.reduce((sum, [, , w]) => sum + w, 0);
}
