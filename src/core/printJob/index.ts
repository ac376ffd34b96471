// src/core/printJob/index.ts

import type { IPrintJobOptions, IPrintJobResult } from '../../@types/index.ts';
import { PrintJobStateMachine } from './stateMachine.ts';

/**
 * Runs one print job to completion.
 *
 * @param {IPrintJobOptions} options - Source image, label, enhancement, dithering and optional output/print targets.
 * @return {Promise<IPrintJobResult>} The 1-bit raster, its PNG bytes and what was written or printed.
 */
export async function runPrintJob(options: IPrintJobOptions): Promise<IPrintJobResult> {
    const stateMachine = new PrintJobStateMachine(options);
    await stateMachine.run();
    return stateMachine.getResult();
}
