// src/config/index.ts

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');

function deepFreeze<T extends object>(value: T): Readonly<T> {
    for (const nested of Object.values(value)) {
        if (typeof nested === 'object' && nested !== null) deepFreeze(nested);
    }
    return Object.freeze(value);
}

/**
 * Defaults for a print job. Read-only: the CLI copies what it needs into the
 * options of each job instead of changing these values.
 */
export const config = deepFreeze({
    imageCompression: {
        compressionLevel: 9,
        adaptiveFiltering: false,
    },
    enhancement: {
        brightness: 1.2,
        contrast: 1.0,
    },
    ditherAlgorithm: 'floyd',
    riemersma: {
        history: 16, // number of recent errors remembered, 2..32
        ratio: 0.1, // weight of the oldest error relative to the newest
    },
    labels: {
        catalogFile: path.join(projectRoot, 'data', 'labels.json'),
        defaultLabel: '4x6',
    },
    printing: {
        preferredPrinterKeywords: ['dymo', 'rx106', 'comer'],
        dymoDefaultOptions: 'DymoPrintDensity=Medium DymoPrintQuality=Graphics',
        // stop the driver from re-interpolating the raster
        scaling: 100,
    },
} as const);
