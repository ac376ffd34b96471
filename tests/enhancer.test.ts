// tests/enhancer.test.ts

import { describe, expect, it } from 'vitest';
import { applyEnhancement, IDENTITY_ENHANCEMENT } from '../src/core/enhancement/enhancer.ts';
import { pixelBufferFromSamples } from '../src/core/pixelBuffer/pixelBuffer.ts';

const ramp = pixelBufferFromSamples(8, 1, 'gray8', [0, 1, 64, 100, 127, 128, 200, 255]);

describe('Enhancer', () => {
    it('should be the identity with both factors at 1.0', () => {
        const out = applyEnhancement(ramp, IDENTITY_ENHANCEMENT);
        expect(Array.from(out.data)).toEqual(Array.from(ramp.data));
        expect(out.data).not.toBe(ramp.data);
    });

    it('should spread samples around 128 for contrast', () => {
        const out = applyEnhancement(ramp, { brightness: 1, contrast: 2 });
        // (s - 128) * 2 + 128, clamped
        expect(Array.from(out.data)).toEqual([0, 0, 0, 72, 126, 128, 255, 255]);
    });

    it('should scale samples for brightness', () => {
        const out = applyEnhancement(ramp, { brightness: 1.5, contrast: 1 });
        expect(Array.from(out.data)).toEqual([0, 2, 96, 150, 191, 192, 255, 255]);
    });

    it('should apply contrast before brightness', () => {
        const single = pixelBufferFromSamples(1, 1, 'gray8', [100]);
        // contrast: (100 - 128) * 1.5 + 128 = 86; brightness: 86 * 1.2 = 103.2
        const out = applyEnhancement(single, { brightness: 1.2, contrast: 1.5 });
        expect(out.data[0]).toBe(103);
    });

    it('should accept out-of-range factors and clamp per sample', () => {
        const out = applyEnhancement(ramp, { brightness: -1, contrast: 1 });
        expect(Array.from(out.data)).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
        const flat = applyEnhancement(ramp, { brightness: 1, contrast: 0 });
        expect(Array.from(flat.data)).toEqual([128, 128, 128, 128, 128, 128, 128, 128]);
    });

    it('should leave the input buffer untouched', () => {
        const before = Array.from(ramp.data);
        applyEnhancement(ramp, { brightness: 2, contrast: 2 });
        expect(Array.from(ramp.data)).toEqual(before);
    });
});
