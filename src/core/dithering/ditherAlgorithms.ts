// src/core/dithering/ditherAlgorithms.ts

import type { DitherConfig } from '../../@types/index.ts';
import { config as defaults } from '../../config/index.ts';
import { UnsupportedAlgorithmError } from '../errors.ts';
import { validateSpaceFillingConfig } from './strategies/RiemersmaDitherer.ts';

/**
 * Algorithm names accepted on the command line, in the order they are listed.
 */
export enum SupportedDitherAlgorithms {
    Floyd = 'floyd',
    Bayer = 'bayer',
    Yliluoma = 'yliluoma',
    Cluster = 'cluster',
    None = 'none',
    FloydSteinberg = 'floyd-steinberg',
    Atkinson = 'atkinson',
    JarvisJudiceNinke = 'jarvis-judice-ninke',
    Stucki = 'stucki',
    Burkes = 'burkes',
    Sierra3 = 'sierra3',
    Sierra2 = 'sierra2',
    Sierra24A = 'sierra-2-4a',
    Riemersma = 'riemersma',
}

export interface IDitherParameters {
    history?: number;
    ratio?: number;
}

/**
 * Mapping of algorithm names to the dither configuration they select.
 * `floyd` is the short name for Floyd-Steinberg; `none` is a plain threshold.
 */
export const DitherAlgorithmMap: Record<SupportedDitherAlgorithms, (params: IDitherParameters) => DitherConfig> = {
    [SupportedDitherAlgorithms.Floyd]: () => ({ family: 'error-diffusion', kernel: 'floyd-steinberg' }),
    [SupportedDitherAlgorithms.Bayer]: () => ({ family: 'ordered', matrix: 'bayer' }),
    [SupportedDitherAlgorithms.Yliluoma]: () => ({ family: 'ordered', matrix: 'yliluoma' }),
    [SupportedDitherAlgorithms.Cluster]: () => ({ family: 'ordered', matrix: 'cluster' }),
    [SupportedDitherAlgorithms.None]: () => ({ family: 'threshold' }),
    [SupportedDitherAlgorithms.FloydSteinberg]: () => ({ family: 'error-diffusion', kernel: 'floyd-steinberg' }),
    [SupportedDitherAlgorithms.Atkinson]: () => ({ family: 'error-diffusion', kernel: 'atkinson' }),
    [SupportedDitherAlgorithms.JarvisJudiceNinke]: () => ({ family: 'error-diffusion', kernel: 'jarvis-judice-ninke' }),
    [SupportedDitherAlgorithms.Stucki]: () => ({ family: 'error-diffusion', kernel: 'stucki' }),
    [SupportedDitherAlgorithms.Burkes]: () => ({ family: 'error-diffusion', kernel: 'burkes' }),
    [SupportedDitherAlgorithms.Sierra3]: () => ({ family: 'error-diffusion', kernel: 'sierra3' }),
    [SupportedDitherAlgorithms.Sierra2]: () => ({ family: 'error-diffusion', kernel: 'sierra2' }),
    [SupportedDitherAlgorithms.Sierra24A]: () => ({ family: 'error-diffusion', kernel: 'sierra-2-4a' }),
    [SupportedDitherAlgorithms.Riemersma]: ({ history, ratio }) => ({
        family: 'space-filling',
        history: history ?? defaults.riemersma.history,
        ratio: ratio ?? defaults.riemersma.ratio,
    }),
};

export function isSupportedDitherAlgorithm(name: string): name is SupportedDitherAlgorithms {
    return Object.values<string>(SupportedDitherAlgorithms).includes(name);
}

/**
 * Resolves an algorithm name to a validated dither configuration.
 *
 * @param {string} name - One of {@link SupportedDitherAlgorithms}, case-insensitive.
 * @param {IDitherParameters} params - Riemersma history depth and decay ratio; defaults apply when omitted.
 * @throws {UnsupportedAlgorithmError} for an unknown name or out-of-range parameters.
 */
export function parseDitherAlgorithm(name: string, params: IDitherParameters = {}): DitherConfig {
    const normalized = name.trim().toLowerCase();
    if (!isSupportedDitherAlgorithm(normalized)) {
        throw new UnsupportedAlgorithmError(
            `Unknown dithering algorithm "${name}". Supported: ${Object.values(SupportedDitherAlgorithms).join(', ')}`,
        );
    }
    const ditherConfig = DitherAlgorithmMap[normalized](params);
    if (ditherConfig.family === 'space-filling') {
        validateSpaceFillingConfig(ditherConfig);
    }
    return ditherConfig;
}
