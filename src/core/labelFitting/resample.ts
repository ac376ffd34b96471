// src/core/labelFitting/resample.ts

import type { IPixelBuffer } from '../../@types/index.ts';
import { InvalidGeometryError } from '../errors.ts';
import { assertPixelBuffer } from '../pixelBuffer/pixelBuffer.ts';

/** Source taps contributing to one destination sample along an axis. */
interface AxisTaps {
    start: number;
    weights: number[];
}

/**
 * Area-averaging taps for a shrinking axis: each destination sample covers
 * `srcLen / dstLen` source samples, partial ones weighted by their overlap.
 */
function areaTaps(srcLen: number, dstLen: number): AxisTaps[] {
    const scale = srcLen / dstLen;
    const taps: AxisTaps[] = [];
    for (let d = 0; d < dstLen; d++) {
        const lo = d * scale;
        const hi = Math.min(srcLen, (d + 1) * scale);
        const start = Math.floor(lo);
        const end = Math.min(srcLen, Math.ceil(hi));
        const weights: number[] = [];
        for (let i = start; i < end; i++) {
            const overlap = Math.min(hi, i + 1) - Math.max(lo, i);
            weights.push(overlap / scale);
        }
        taps.push({ start, weights });
    }
    return taps;
}

/**
 * Bilinear taps for a growing axis, pixel-centre aligned, edges clamped.
 */
function bilinearTaps(srcLen: number, dstLen: number): AxisTaps[] {
    const scale = dstLen / srcLen;
    const taps: AxisTaps[] = [];
    for (let d = 0; d < dstLen; d++) {
        const pos = Math.min(srcLen - 1, Math.max(0, (d + 0.5) / scale - 0.5));
        const i0 = Math.floor(pos);
        const frac = pos - i0;
        if (frac === 0 || i0 + 1 >= srcLen) {
            taps.push({ start: i0, weights: [1] });
        } else {
            taps.push({ start: i0, weights: [1 - frac, frac] });
        }
    }
    return taps;
}

function axisTaps(srcLen: number, dstLen: number): AxisTaps[] {
    if (dstLen === srcLen) {
        return Array.from({ length: dstLen }, (_, i) => ({ start: i, weights: [1] }));
    }
    return dstLen < srcLen ? areaTaps(srcLen, dstLen) : bilinearTaps(srcLen, dstLen);
}

/**
 * Resizes a grayscale buffer with a separable filter: area averaging on axes
 * that shrink, bilinear interpolation on axes that grow.
 */
export function resample(buffer: IPixelBuffer, width: number, height: number): IPixelBuffer {
    assertPixelBuffer(buffer, 'gray8');
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
        throw new InvalidGeometryError(`Cannot resample to ${width}x${height}`);
    }
    const { width: srcW, height: srcH, data } = buffer;
    const xTaps = axisTaps(srcW, width);
    const yTaps = axisTaps(srcH, height);

    // horizontal pass: srcH rows of `width` samples
    const rows = new Float64Array(width * srcH);
    for (let y = 0; y < srcH; y++) {
        const rowOffset = y * srcW;
        for (let x = 0; x < width; x++) {
            const { start, weights } = xTaps[x];
            let acc = 0;
            for (let k = 0; k < weights.length; k++) {
                acc += data[rowOffset + start + k] * weights[k];
            }
            rows[y * width + x] = acc;
        }
    }

    // vertical pass
    const out = new Uint8Array(width * height);
    for (let y = 0; y < height; y++) {
        const { start, weights } = yTaps[y];
        for (let x = 0; x < width; x++) {
            let acc = 0;
            for (let k = 0; k < weights.length; k++) {
                acc += rows[(start + k) * width + x] * weights[k];
            }
            out[y * width + x] = Math.min(255, Math.max(0, Math.round(acc)));
        }
    }
    return { width, height, depth: 'gray8', data: out };
}
