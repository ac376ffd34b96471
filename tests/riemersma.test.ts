// tests/riemersma.test.ts

import { describe, expect, it } from 'vitest';
import { gilbertOrder, walkGilbertCurve } from '../src/core/dithering/lib/gilbertCurve.ts';
import { dither } from '../src/core/dithering/dither.ts';
import {
    riemersmaDither,
    riemersmaWeights,
    validateSpaceFillingConfig,
} from '../src/core/dithering/strategies/RiemersmaDitherer.ts';
import { UnsupportedAlgorithmError } from '../src/core/errors.ts';
import { uniformGray, whiteFraction } from './helpers/buffers.ts';

describe('Generalized Hilbert curve', () => {
    it('should walk a 4x4 square as a Hilbert curve', () => {
        expect(Array.from(gilbertOrder(4, 4))).toEqual([0, 1, 5, 4, 8, 12, 13, 9, 10, 14, 15, 11, 7, 6, 2, 3]);
    });

    it('should cover non-square rectangles', () => {
        expect(Array.from(gilbertOrder(3, 2))).toEqual([0, 3, 4, 5, 2, 1]);
        expect(Array.from(gilbertOrder(2, 3))).toEqual([0, 1, 3, 5, 4, 2]);
        expect(Array.from(gilbertOrder(5, 1))).toEqual([0, 1, 2, 3, 4]);
    });

    it('should visit every cell once through neighbouring steps', () => {
        for (let width = 1; width <= 29; width += 4) {
            for (let height = 1; height <= 29; height += 3) {
                const seen = new Set<number>();
                let prev: [number, number] | null = null;
                walkGilbertCurve(width, height, (x, y) => {
                    expect(x >= 0 && x < width && y >= 0 && y < height).toBe(true);
                    seen.add(y * width + x);
                    if (prev) {
                        expect(Math.max(Math.abs(x - prev[0]), Math.abs(y - prev[1]))).toBe(1);
                    }
                    prev = [x, y];
                });
                expect(seen.size).toBe(width * height);
            }
        }
    });
});

describe('Riemersma dithering', () => {
    it('should decay weights from 1 to the ratio', () => {
        const weights = riemersmaWeights(16, 0.1);
        expect(weights[0]).toBe(1);
        expect(weights[15]).toBeCloseTo(0.1, 12);
        for (let age = 1; age < 16; age++) {
            expect(weights[age]).toBeLessThan(weights[age - 1]);
        }
    });

    it('should alternate along a mid-gray line with a single remembered error', () => {
        const out = riemersmaDither(uniformGray(8, 1, 128), 1, 0.5);
        expect(Array.from(out.data)).toEqual([1, 0, 1, 0, 1, 0, 1, 0]);
    });

    it('should preserve the average tone', () => {
        const config = { family: 'space-filling', history: 16, ratio: 0.1 } as const;
        expect(whiteFraction(dither(uniformGray(64, 64, 128), config))).toBe(0.5);
        expect(whiteFraction(dither(uniformGray(64, 64, 64), config))).toBe(0.25);
        expect(Math.abs(whiteFraction(dither(uniformGray(32, 32, 200), config)) - 200 / 255)).toBeLessThanOrEqual(0.01);
    });

    it('should keep solid black and white solid', () => {
        const config = { family: 'space-filling', history: 2, ratio: 0.9 } as const;
        expect(whiteFraction(dither(uniformGray(9, 4, 0), config))).toBe(0);
        expect(whiteFraction(dither(uniformGray(9, 4, 255), config))).toBe(1);
    });

    it('should bound the public history and ratio', () => {
        expect(() => validateSpaceFillingConfig({ family: 'space-filling', history: 2, ratio: 0.5 })).not.toThrow();
        expect(() => validateSpaceFillingConfig({ family: 'space-filling', history: 32, ratio: 0.01 })).not.toThrow();
        expect(() => dither(uniformGray(2, 2, 0), { family: 'space-filling', history: 1, ratio: 0.5 })).toThrow(
            UnsupportedAlgorithmError,
        );
        expect(() => dither(uniformGray(2, 2, 0), { family: 'space-filling', history: 16, ratio: 1.5 })).toThrow(
            UnsupportedAlgorithmError,
        );
    });
});
