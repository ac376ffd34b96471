// src/core/enhancement/enhancer.ts

import type { IEnhancementSettings, IPixelBuffer } from '../../@types/index.ts';
import { assertPixelBuffer } from '../pixelBuffer/pixelBuffer.ts';

const MID_GRAY = 128;

export const IDENTITY_ENHANCEMENT: Readonly<IEnhancementSettings> = Object.freeze({ brightness: 1, contrast: 1 });

function clamp255(v: number): number {
    return v < 0 ? 0 : v > 255 ? 255 : v;
}

/**
 * Applies contrast, then brightness, to every sample of a grayscale buffer.
 *
 * Contrast spreads samples around mid-gray: `(s - 128) * contrast + 128`.
 * Brightness scales the result: `s * brightness`. Each step clamps to [0, 255];
 * the final value is rounded once. Factors themselves are not range-checked.
 *
 * @param {IPixelBuffer} buffer - 8-bit grayscale input; left untouched.
 * @param {IEnhancementSettings} settings - Brightness and contrast factors.
 * @return {IPixelBuffer} A new grayscale buffer of the same size.
 */
export function applyEnhancement(buffer: IPixelBuffer, settings: IEnhancementSettings): IPixelBuffer {
    assertPixelBuffer(buffer, 'gray8');
    const { brightness, contrast } = settings;
    const src = buffer.data;
    const out = new Uint8Array(src.length);

    // Only 256 possible inputs, so map through a lookup table.
    const lut = new Uint8Array(256);
    for (let s = 0; s < 256; s++) {
        const contrasted = clamp255((s - MID_GRAY) * contrast + MID_GRAY);
        lut[s] = Math.round(clamp255(contrasted * brightness));
    }
    for (let i = 0; i < src.length; i++) {
        out[i] = lut[src[i]];
    }
    return { width: buffer.width, height: buffer.height, depth: 'gray8', data: out };
}
