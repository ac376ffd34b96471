// src/core/dithering/strategies/RiemersmaDitherer.ts

import type { DitheringStrategy, IPixelBuffer, ISpaceFillingConfig } from '../../../@types/index.ts';
import { UnsupportedAlgorithmError } from '../../errors.ts';
import { assertPixelBuffer } from '../../pixelBuffer/pixelBuffer.ts';
import { gilbertOrder } from '../lib/gilbertCurve.ts';
import { MID_THRESHOLD } from './ThresholdDitherer.ts';

export const MIN_HISTORY = 2;
export const MAX_HISTORY = 32;

/**
 * Weight of a remembered error by age (0 = newest): decays geometrically from
 * 1 for the newest to `ratio` for the oldest.
 */
export function riemersmaWeights(history: number, ratio: number): Float64Array {
    const weights = new Float64Array(history);
    for (let age = 0; age < history; age++) {
        weights[age] = history === 1 ? 1 : Math.pow(ratio, age / (history - 1));
    }
    return weights;
}

/**
 * Riemersma dithering: walks the buffer along a generalized Hilbert curve and
 * biases each pixel by a weighted sum of the last `history` quantization
 * errors. The error remembered for a pixel is its original value minus its
 * output, which keeps the running correction bounded.
 *
 * Accepts `history >= 1`; with a history of one this is a plain threshold
 * corrected by the previous pixel's error.
 */
export function riemersmaDither(buffer: IPixelBuffer, history: number, ratio: number): IPixelBuffer {
    const { width, height, data } = buffer;
    const out = new Uint8Array(data.length);
    const weights = riemersmaWeights(history, ratio);
    // ring buffer of errors; `head` is the slot of the newest one
    const errors = new Float64Array(history);
    let head = 0;

    const order = gilbertOrder(width, height);
    for (let n = 0; n < order.length; n++) {
        const i = order[n];
        const value = data[i];

        let correction = 0;
        for (let age = 0; age < history; age++) {
            correction += weights[age] * errors[(head + age) % history];
        }
        const quantized = value + correction >= MID_THRESHOLD ? 255 : 0;
        out[i] = quantized === 255 ? 1 : 0;

        head = (head + history - 1) % history;
        errors[head] = value - quantized;
    }
    return { width, height, depth: 'mono1', data: out };
}

export class RiemersmaDitherer implements DitheringStrategy<ISpaceFillingConfig> {
    public dither(buffer: IPixelBuffer, config: ISpaceFillingConfig): IPixelBuffer {
        assertPixelBuffer(buffer, 'gray8');
        validateSpaceFillingConfig(config);
        return riemersmaDither(buffer, config.history, config.ratio);
    }
}

export function validateSpaceFillingConfig(config: ISpaceFillingConfig): void {
    const { history, ratio } = config;
    if (!Number.isInteger(history) || history < MIN_HISTORY || history > MAX_HISTORY) {
        throw new UnsupportedAlgorithmError(
            `Riemersma history depth must be an integer in [${MIN_HISTORY}, ${MAX_HISTORY}], got ${history}`,
        );
    }
    if (!Number.isFinite(ratio) || ratio <= 0 || ratio >= 1) {
        throw new UnsupportedAlgorithmError(`Riemersma decay ratio must be within (0, 1), got ${ratio}`);
    }
}
