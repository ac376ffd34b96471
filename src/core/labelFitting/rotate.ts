// src/core/labelFitting/rotate.ts

import type { IPixelBuffer } from '../../@types/index.ts';
import { assertPixelBuffer } from '../pixelBuffer/pixelBuffer.ts';

/**
 * Rotates a buffer 90° counter-clockwise. A `W x H` input becomes `H x W`;
 * the input's right-hand column becomes the output's top row.
 */
export function rotate90(buffer: IPixelBuffer): IPixelBuffer {
    assertPixelBuffer(buffer);
    const { width, height, data } = buffer;
    const out = new Uint8Array(data.length);
    // output is `height` wide and `width` tall
    for (let oy = 0; oy < width; oy++) {
        const sx = width - 1 - oy;
        for (let ox = 0; ox < height; ox++) {
            out[oy * height + ox] = data[ox * width + sx];
        }
    }
    return { width: height, height: width, depth: buffer.depth, data: out };
}
