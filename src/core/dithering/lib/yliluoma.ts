// src/core/dithering/lib/yliluoma.ts

/**
 * Yliluoma's ordered dithering algorithm 1, specialised to a black/white palette.
 *
 * For every gray level a mixing plan is chosen among the candidate mixes
 * black+black, white+white and black+white at ratio r/N (r = 0..N-1), scoring
 * each with Yliluoma's psychovisual penalty:
 *
 *   compare(level, mix) + compare(black, white) * 0.1 * (|r/N - 0.5| + 0.5)
 *
 * where for grays `compare(a, b) = 1.75 * ((a - b) / 255)^2` (0.75 weighted
 * channel distance plus luma distance). The second term only applies to the
 * two-colour mixes. A plan is reduced to the number of matrix cells, out of N,
 * that print white; ties go to the lighter plan.
 */

function grayCompare(a: number, b: number): number {
    const d = (a - b) / 255;
    return 1.75 * d * d;
}

/**
 * @param {number} cells - Number of cells in the threshold matrix (N).
 * @return {Uint8Array} For each level 0..255, how many of the N ranks print white.
 */
export function buildYliluomaPlan(cells: number): Uint8Array {
    const plan = new Uint8Array(256);
    const pairPenalty = grayCompare(0, 255) * 0.1;
    for (let level = 0; level < 256; level++) {
        let bestPenalty = grayCompare(level, 0);
        let bestWhite = 0;

        const whitePenalty = grayCompare(level, 255);
        if (whitePenalty <= bestPenalty) {
            bestPenalty = whitePenalty;
            bestWhite = cells;
        }

        for (let r = 0; r < cells; r++) {
            const ratio = r / cells;
            const penalty = grayCompare(level, 255 * ratio) + pairPenalty * (Math.abs(ratio - 0.5) + 0.5);
            if (penalty < bestPenalty || (penalty === bestPenalty && r > bestWhite)) {
                bestPenalty = penalty;
                bestWhite = r;
            }
        }
        plan[level] = bestWhite;
    }
    return plan;
}
