// tests/pixelBuffer.test.ts

import { describe, expect, it } from 'vitest';
import {
    assertPixelBuffer,
    createPixelBuffer,
    getSample,
    monoToGray,
    pixelBufferFromSamples,
} from '../src/core/pixelBuffer/pixelBuffer.ts';
import { BufferSizeMismatchError, InvalidGeometryError } from '../src/core/errors.ts';

describe('PixelBuffer', () => {
    it('should allocate a filled buffer of width x height samples', () => {
        const buffer = createPixelBuffer(3, 2, 'gray8', 255);
        expect(buffer.data.length).toBe(6);
        expect(Array.from(buffer.data)).toEqual([255, 255, 255, 255, 255, 255]);
    });

    it('should address samples row-major', () => {
        const buffer = pixelBufferFromSamples(3, 2, 'gray8', [1, 2, 3, 4, 5, 6]);
        expect(getSample(buffer, 2, 0)).toBe(3);
        expect(getSample(buffer, 0, 1)).toBe(4);
    });

    it('should reject non-positive dimensions', () => {
        expect(() => createPixelBuffer(0, 4, 'gray8')).toThrow(InvalidGeometryError);
        expect(() => createPixelBuffer(4, -1, 'mono1')).toThrow(InvalidGeometryError);
        expect(() => createPixelBuffer(2.5, 4, 'gray8')).toThrow(InvalidGeometryError);
    });

    it('should report a length that disagrees with the declared size', () => {
        const broken = { width: 4, height: 4, depth: 'gray8' as const, data: new Uint8Array(15) };
        expect(() => assertPixelBuffer(broken)).toThrow(BufferSizeMismatchError);
        expect(() => assertPixelBuffer(broken)).toThrow(expect.objectContaining({ code: 'BufferSizeMismatch' }));
    });

    it('should reject a buffer of the wrong depth when one is required', () => {
        const gray = createPixelBuffer(2, 2, 'gray8');
        expect(() => assertPixelBuffer(gray, 'mono1')).toThrow(BufferSizeMismatchError);
    });

    it('should validate sample ranges per depth', () => {
        expect(() => pixelBufferFromSamples(2, 1, 'mono1', [0, 2])).toThrow(RangeError);
        expect(() => pixelBufferFromSamples(2, 1, 'gray8', [0, 256])).toThrow(RangeError);
    });

    it('should reject fractional and NaN samples', () => {
        expect(() => pixelBufferFromSamples(2, 1, 'gray8', [1.7, 0])).toThrow(
            'gray8 samples must be integers, found 1.7 at index 0',
        );
        expect(() => pixelBufferFromSamples(2, 1, 'gray8', [0, NaN])).toThrow(
            'gray8 samples must be integers, found NaN at index 1',
        );
        expect(() => pixelBufferFromSamples(2, 1, 'mono1', [0.5, 1])).toThrow(RangeError);
    });

    it('should copy samples instead of aliasing the caller array', () => {
        const samples = new Uint8Array([10, 20]);
        const buffer = pixelBufferFromSamples(2, 1, 'gray8', samples);
        samples[0] = 99;
        expect(buffer.data[0]).toBe(10);
    });

    it('should expand 1-bit samples to black and white', () => {
        const mono = pixelBufferFromSamples(4, 1, 'mono1', [0, 1, 1, 0]);
        const gray = monoToGray(mono);
        expect(gray.depth).toBe('gray8');
        expect(Array.from(gray.data)).toEqual([0, 255, 255, 0]);
    });
});
