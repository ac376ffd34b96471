// src/core/dithering/strategies/OrderedDitherer.ts

import type {
    DitheringStrategy,
    IOrderedConfig,
    IPixelBuffer,
    IThresholdMatrix,
    OrderedMatrixName,
} from '../../../@types/index.ts';
import { UnsupportedAlgorithmError } from '../../errors.ts';
import { assertPixelBuffer } from '../../pixelBuffer/pixelBuffer.ts';
import { BAYER_8X8, CLUSTER_8X8, toThresholds } from '../lib/matrices.ts';
import { buildYliluomaPlan } from '../lib/yliluoma.ts';

interface PreparedMatrix {
    size: number;
    /** Per-cell rank, row-major. */
    ranks: readonly number[];
    /** Per-cell 8-bit threshold, row-major. */
    thresholds: Uint8Array;
}

function prepare(matrix: IThresholdMatrix): PreparedMatrix {
    return { size: matrix.size, ranks: matrix.ranks, thresholds: toThresholds(matrix) };
}

/**
 * Ordered dithering against a repeating threshold matrix.
 *
 * For `bayer` and `cluster` a sample is white when it is at least the
 * threshold of its cell, `t[y mod m][x mod m]`. For `yliluoma` the sample's
 * level is first turned into a mixing plan (how many of the m² cells print
 * white) and the cell prints white when its Bayer rank is below that count.
 */
export class OrderedDitherer implements DitheringStrategy<IOrderedConfig> {
    private readonly matrices: Record<OrderedMatrixName, PreparedMatrix> = {
        bayer: prepare(BAYER_8X8),
        cluster: prepare(CLUSTER_8X8),
        yliluoma: prepare(BAYER_8X8),
    };
    private yliluomaPlan: Uint8Array | null = null;

    public dither(buffer: IPixelBuffer, config: IOrderedConfig): IPixelBuffer {
        assertPixelBuffer(buffer, 'gray8');
        if (!Object.hasOwn(this.matrices, config.matrix)) {
            throw new UnsupportedAlgorithmError(`Unknown ordered dither matrix "${config.matrix}"`);
        }
        const matrix = this.matrices[config.matrix];
        return config.matrix === 'yliluoma'
            ? this.ditherWithPlan(buffer, matrix, this.getYliluomaPlan(matrix))
            : this.ditherWithThresholds(buffer, matrix);
    }

    private ditherWithThresholds(buffer: IPixelBuffer, matrix: PreparedMatrix): IPixelBuffer {
        const { width, height, data } = buffer;
        const { size, thresholds } = matrix;
        const out = new Uint8Array(data.length);
        for (let y = 0; y < height; y++) {
            const rowBase = (y % size) * size;
            for (let x = 0; x < width; x++) {
                const i = y * width + x;
                out[i] = data[i] >= thresholds[rowBase + (x % size)] ? 1 : 0;
            }
        }
        return { width, height, depth: 'mono1', data: out };
    }

    private ditherWithPlan(buffer: IPixelBuffer, matrix: PreparedMatrix, plan: Uint8Array): IPixelBuffer {
        const { width, height, data } = buffer;
        const { size, ranks } = matrix;
        const out = new Uint8Array(data.length);
        for (let y = 0; y < height; y++) {
            const rowBase = (y % size) * size;
            for (let x = 0; x < width; x++) {
                const i = y * width + x;
                out[i] = ranks[rowBase + (x % size)] < plan[data[i]] ? 1 : 0;
            }
        }
        return { width, height, depth: 'mono1', data: out };
    }

    private getYliluomaPlan(matrix: PreparedMatrix): Uint8Array {
        if (!this.yliluomaPlan) {
            this.yliluomaPlan = buildYliluomaPlan(matrix.size * matrix.size);
        }
        return this.yliluomaPlan;
    }
}
