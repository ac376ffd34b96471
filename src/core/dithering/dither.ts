// src/core/dithering/dither.ts

import type { DitherConfig, IPixelBuffer } from '../../@types/index.ts';
import { UnsupportedAlgorithmError } from '../errors.ts';
import { assertPixelBuffer } from '../pixelBuffer/pixelBuffer.ts';
import { ErrorDiffusionDitherer } from './strategies/ErrorDiffusionDitherer.ts';
import { OrderedDitherer } from './strategies/OrderedDitherer.ts';
import { RiemersmaDitherer } from './strategies/RiemersmaDitherer.ts';
import { ThresholdDitherer } from './strategies/ThresholdDitherer.ts';

const thresholdDitherer = new ThresholdDitherer();
const orderedDitherer = new OrderedDitherer();
const errorDiffusionDitherer = new ErrorDiffusionDitherer();
const riemersmaDitherer = new RiemersmaDitherer();

/**
 * Reduces an 8-bit grayscale buffer to 1 bit per pixel with the selected algorithm.
 * Output samples are 1 for white and 0 for black; the size is unchanged.
 *
 * @param {IPixelBuffer} buffer - Grayscale input, typically already fitted to the label.
 * @param {DitherConfig} config - Algorithm family and its parameters.
 * @return {IPixelBuffer} A new `mono1` buffer.
 * @throws {UnsupportedAlgorithmError} if the family, matrix, kernel or parameters are not recognised.
 */
export function dither(buffer: IPixelBuffer, config: DitherConfig): IPixelBuffer {
    assertPixelBuffer(buffer, 'gray8');
    switch (config.family) {
        case 'threshold':
            return thresholdDitherer.dither(buffer, config);
        case 'ordered':
            return orderedDitherer.dither(buffer, config);
        case 'error-diffusion':
            return errorDiffusionDitherer.dither(buffer, config);
        case 'space-filling':
            return riemersmaDitherer.dither(buffer, config);
        default: {
            const unknownConfig: never = config;
            return unsupported(unknownConfig);
        }
    }
}

// configs read from files or flags may carry tags the type does not know about
function unsupported(config: unknown): never {
    const tag = typeof config === 'object' && config !== null && 'family' in config ? String(config.family) : String(config);
    throw new UnsupportedAlgorithmError(`Unsupported dithering algorithm "${tag}"`);
}
