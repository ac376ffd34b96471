// src/core/pixelBuffer/pixelBuffer.ts

import type { IPixelBuffer, PixelDepth } from '../../@types/index.ts';
import { BufferSizeMismatchError, InvalidGeometryError } from '../errors.ts';

export const WHITE = 255;
export const BLACK = 0;

function assertDimensions(width: number, height: number): void {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
        throw new InvalidGeometryError(`Pixel buffer dimensions must be positive integers, got ${width}x${height}`);
    }
}

/**
 * Allocates a buffer of the given size with every sample set to `fill`.
 */
export function createPixelBuffer(width: number, height: number, depth: PixelDepth, fill = 0): IPixelBuffer {
    assertDimensions(width, height);
    const data = new Uint8Array(width * height);
    if (fill !== 0) data.fill(fill);
    return { width, height, depth, data };
}

/**
 * Wraps existing samples in a buffer after checking length and value range.
 * The samples are copied so the caller keeps ownership of `data`.
 */
export function pixelBufferFromSamples(
    width: number,
    height: number,
    depth: PixelDepth,
    data: ArrayLike<number>,
): IPixelBuffer {
    const buffer: IPixelBuffer = { width, height, depth, data: Uint8Array.from(data) };
    assertPixelBuffer(buffer, depth);
    for (let i = 0; i < data.length; i++) {
        if (!Number.isInteger(data[i])) {
            throw new RangeError(`${depth} samples must be integers, found ${data[i]} at index ${i}`);
        }
    }
    if (depth === 'mono1') {
        for (let i = 0; i < data.length; i++) {
            if (data[i] !== 0 && data[i] !== 1) {
                throw new RangeError(`mono1 samples must be 0 or 1, found ${data[i]} at index ${i}`);
            }
        }
    } else {
        for (let i = 0; i < data.length; i++) {
            if (data[i] < 0 || data[i] > 255) {
                throw new RangeError(`gray8 samples must be within 0..255, found ${data[i]} at index ${i}`);
            }
        }
    }
    return buffer;
}

/**
 * Checks that a buffer's declared size agrees with its sample count, and optionally its depth.
 * Every transform calls this on its input.
 */
export function assertPixelBuffer(buffer: IPixelBuffer, depth?: PixelDepth): void {
    assertDimensions(buffer.width, buffer.height);
    const expected = buffer.width * buffer.height;
    if (buffer.data.length !== expected) {
        throw new BufferSizeMismatchError(
            `Buffer declares ${buffer.width}x${buffer.height} (${expected} samples) but holds ${buffer.data.length}`,
        );
    }
    if (depth && buffer.depth !== depth) {
        throw new BufferSizeMismatchError(`Expected a ${depth} buffer, got ${buffer.depth}`);
    }
}

export function getSample(buffer: IPixelBuffer, x: number, y: number): number {
    return buffer.data[y * buffer.width + x];
}

/**
 * Expands a 1-bit buffer to 8-bit samples: 0 stays black, 1 becomes 255.
 */
export function monoToGray(buffer: IPixelBuffer): IPixelBuffer {
    assertPixelBuffer(buffer, 'mono1');
    const data = new Uint8Array(buffer.data.length);
    for (let i = 0; i < data.length; i++) {
        data[i] = buffer.data[i] ? WHITE : BLACK;
    }
    return { width: buffer.width, height: buffer.height, depth: 'gray8', data };
}

export function isLandscape(width: number, height: number): boolean {
    return width > height;
}

export function isPortrait(width: number, height: number): boolean {
    return height > width;
}
