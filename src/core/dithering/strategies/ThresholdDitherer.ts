// src/core/dithering/strategies/ThresholdDitherer.ts

import type { DitheringStrategy, IPixelBuffer, IThresholdConfig } from '../../../@types/index.ts';
import { assertPixelBuffer } from '../../pixelBuffer/pixelBuffer.ts';

export const MID_THRESHOLD = 128;

/**
 * Plain 50% threshold: white where the sample is at least 128.
 */
export class ThresholdDitherer implements DitheringStrategy<IThresholdConfig> {
    public dither(buffer: IPixelBuffer, _config?: IThresholdConfig): IPixelBuffer {
        assertPixelBuffer(buffer, 'gray8');
        const src = buffer.data;
        const out = new Uint8Array(src.length);
        for (let i = 0; i < src.length; i++) {
            out[i] = src[i] >= MID_THRESHOLD ? 1 : 0;
        }
        return { width: buffer.width, height: buffer.height, depth: 'mono1', data: out };
    }
}
