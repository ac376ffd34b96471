// src/utils/printing/printerUtils.ts

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { ILogger, LabelBrand } from '../../@types/index.ts';
import { config } from '../../config/index.ts';

const execFileAsync = promisify(execFile);

/**
 * Splits `lpstat -e` output into printer destination names.
 */
export function parseLpstatOutput(stdout: string): string[] {
    return stdout
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
}

/**
 * Lists the CUPS print destinations known to the system.
 *
 * @return {Promise<string[]>} Destination names; empty when `lpstat` is unavailable.
 */
export async function listPrinters(logger: ILogger): Promise<string[]> {
    try {
        const { stdout } = await execFileAsync('lpstat', ['-e']);
        return parseLpstatOutput(stdout);
    } catch (error) {
        logger.warn(`Could not list printers with lpstat: ${(error instanceof Error ? error.message : String(error))}`);
        return [];
    }
}

/**
 * Picks the first printer whose name contains one of the keywords (case-insensitive).
 *
 * @return {string | null} The preferred printer, or null when nothing matches.
 */
export function selectPreferredPrinter(
    printers: readonly string[],
    keywords: readonly string[] = config.printing.preferredPrinterKeywords,
): string | null {
    const preferred = printers.find((p) => keywords.some((kw) => p.toLowerCase().includes(kw.toLowerCase())));
    return preferred ?? null;
}

export function brandForPrinter(printer: string): LabelBrand {
    return printer.toLowerCase().includes('dymo') ? 'dymo' : 'generic';
}

/**
 * Print options used when the user gives none.
 */
export function defaultPrintOptions(brand: LabelBrand): string {
    return brand === 'dymo' ? config.printing.dymoDefaultOptions : '';
}
