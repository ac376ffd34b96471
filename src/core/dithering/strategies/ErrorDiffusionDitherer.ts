// src/core/dithering/strategies/ErrorDiffusionDitherer.ts

import type { DitheringStrategy, IDiffusionKernel, IErrorDiffusionConfig, IPixelBuffer } from '../../../@types/index.ts';
import { UnsupportedAlgorithmError } from '../../errors.ts';
import { assertPixelBuffer } from '../../pixelBuffer/pixelBuffer.ts';
import { DiffusionKernels } from '../lib/kernels.ts';
import { MID_THRESHOLD } from './ThresholdDitherer.ts';

/**
 * Raster-order error diffusion with a per-pixel pending-error accumulator.
 *
 * Each pixel is quantized as `value + pending >= 128 ? white : black`; the
 * difference is spread over the kernel's not-yet-visited neighbours. Error
 * aimed outside the buffer is dropped.
 */
export function diffuseErrors(buffer: IPixelBuffer, kernel: IDiffusionKernel): IPixelBuffer {
    const { width, height, data } = buffer;
    const pending = new Float64Array(data.length);
    const out = new Uint8Array(data.length);
    const { offsets } = kernel;

    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const i = y * width + x;
            const value = data[i] + pending[i];
            const quantized = value >= MID_THRESHOLD ? 255 : 0;
            out[i] = quantized === 255 ? 1 : 0;
            const error = value - quantized;
            if (error === 0) continue;

            for (let k = 0; k < offsets.length; k++) {
                const [dx, dy, weight] = offsets[k];
                const nx = x + dx;
                const ny = y + dy;
                if (nx < 0 || nx >= width || ny >= height) continue;
                pending[ny * width + nx] += error * weight;
            }
        }
    }
    return { width, height, depth: 'mono1', data: out };
}

export class ErrorDiffusionDitherer implements DitheringStrategy<IErrorDiffusionConfig> {
    public dither(buffer: IPixelBuffer, config: IErrorDiffusionConfig): IPixelBuffer {
        assertPixelBuffer(buffer, 'gray8');
        if (!Object.hasOwn(DiffusionKernels, config.kernel)) {
            throw new UnsupportedAlgorithmError(`Unknown error diffusion kernel "${config.kernel}"`);
        }
        return diffuseErrors(buffer, DiffusionKernels[config.kernel]);
    }
}
