// src/utils/storage/storageUtils.ts

import { mkdirSync, statSync } from 'node:fs';
import * as path from 'node:path';

/**
 * Ensures that the specified output directory exists, creating any missing parents.
 *
 * @param {string} outputFolder - The path of the output directory to ensure.
 */
export function ensureOutputDirectory(outputFolder: string): void {
    mkdirSync(outputFolder, { recursive: true });
}

/**
 * Checks if a file or directory exists at the given path.
 */
export function filePathExists(filePath: string): boolean {
    try {
        statSync(filePath);
        return true;
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return false;
        }
        throw error;
    }
}

/**
 * Default file name for a rendered label: the input's base name with a `.png` extension,
 * placed in `outputFolder` (or next to the input).
 *
 * @example defaultOutputPath('/photos/cat.jpg') // '/photos/cat.png'
 */
export function defaultOutputPath(inputFile: string, outputFolder?: string): string {
    const base = path.basename(inputFile, path.extname(inputFile));
    return path.join(outputFolder ?? path.dirname(inputFile), `${base}.png`);
}
