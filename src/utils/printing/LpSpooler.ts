// src/utils/printing/LpSpooler.ts

import { execFile } from 'node:child_process';
import { mkdtemp, rm } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { promisify } from 'node:util';
import type { ILogger, ISpoolPayload, ISpooler } from '../../@types/index.ts';
import { config } from '../../config/index.ts';
import { writePngFile } from '../../core/imageProcessing/processor.ts';

const execFileAsync = promisify(execFile);

/**
 * Builds the `lp` argument list for a payload. The free-form options string is
 * split on whitespace and each token handed to `lp` as its own `-o`.
 */
export function buildLpArguments(payload: ISpoolPayload, printer: string, file: string): string[] {
    const args = ['-d', printer];
    if (payload.pageSize) {
        args.push('-o', `PageSize=${payload.pageSize}`);
    }
    args.push('-o', `scaling=${config.printing.scaling}`, '-o', `ppi=${payload.dpi}`);
    for (const option of payload.options.split(/\s+/).filter((o) => o.length > 0)) {
        args.push('-o', option);
    }
    args.push(file);
    return args;
}

/**
 * Submits rasters to CUPS through the `lp` command, via a temporary PNG file.
 */
export class LpSpooler implements ISpooler {
    constructor(private readonly logger: ILogger) {}

    public async submit(payload: ISpoolPayload, printer: string): Promise<void> {
        const tempDir = await mkdtemp(path.join(os.tmpdir(), 'label-dither-'));
        const file = path.join(tempDir, 'label.png');
        try {
            await writePngFile(payload.raster, file);
            const args = buildLpArguments(payload, printer, file);
            this.logger.debug(`Running: lp ${args.join(' ')}`);
            const { stdout } = await execFileAsync('lp', args);
            if (stdout.trim()) this.logger.info(stdout.trim());
        } finally {
            await rm(tempDir, { recursive: true, force: true });
        }
    }
}
