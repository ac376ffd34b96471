// tests/printJob.test.ts

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runPrintJob } from '../src/core/printJob/index.ts';
import { PrintJobStateMachine } from '../src/core/printJob/stateMachine.ts';
import { PrintJobStates } from '../src/stateMachine/definedStates.ts';
import { IDENTITY_ENHANCEMENT } from '../src/core/enhancement/enhancer.ts';
import { UnsupportedAlgorithmError } from '../src/core/errors.ts';
import type {
    DitherConfig,
    IPrintableLabel,
    IPrintJobOptions,
    IProgressBar,
    ISpoolPayload,
    ISpooler,
} from '../src/@types/index.ts';
import { MockLogger } from './helpers/mockLogger.ts';
import { uniformGray } from './helpers/buffers.ts';

class FakeSpooler implements ISpooler {
    submissions: Array<{ payload: ISpoolPayload; printer: string }> = [];

    constructor(private readonly failWith?: string) {}

    async submit(payload: ISpoolPayload, printer: string): Promise<void> {
        if (this.failWith) throw new Error(this.failWith);
        this.submissions.push({ payload, printer });
    }
}

class CountingProgressBar implements IProgressBar {
    increments: unknown[] = [];
    stopped = false;

    start(): void {}
    stop(): void {
        this.stopped = true;
    }
    increment(payload?: Record<string, unknown>): void {
        this.increments.push(payload?.state);
    }
}

// 1in x 0.5in at 8 dpi: 8 x 4 pixels
const label: IPrintableLabel = { code: 'tiny', width: 1, height: 0.5, unit: 'in', dpi: 8, pageSize: 'w72h36' };

describe('Print job', () => {
    let outputDir: string;
    let logger: MockLogger;

    beforeEach(async () => {
        outputDir = await mkdtemp(path.join(os.tmpdir(), 'label-dither-test-'));
        logger = new MockLogger();
    });

    afterEach(async () => {
        await rm(outputDir, { recursive: true, force: true });
    });

    function jobOptions(overrides: Partial<IPrintJobOptions> = {}): IPrintJobOptions {
        return {
            source: uniformGray(8, 4, 200),
            label,
            enhancement: IDENTITY_ENHANCEMENT,
            dither: { family: 'threshold' },
            verbose: false,
            logger,
            ...overrides,
        };
    }

    it('should render, write and submit a label', async () => {
        const spooler = new FakeSpooler();
        const outputFile = path.join(outputDir, 'nested', 'label.png');
        const result = await runPrintJob(jobOptions({
            outputFile,
            print: { printer: 'fake-printer', spooler, options: 'Darkness=5' },
        }));

        expect(result.raster.depth).toBe('mono1');
        expect(result.raster.width).toBe(8);
        expect(result.raster.height).toBe(4);
        expect(Array.from(result.raster.data).every((v) => v === 1)).toBe(true);
        expect(result.outputFile).toBe(outputFile);
        expect(result.submitted).toBe(true);

        const written = await readFile(outputFile);
        expect(written.equals(result.png)).toBe(true);

        expect(spooler.submissions.length).toBe(1);
        const [{ payload, printer }] = spooler.submissions;
        expect(printer).toBe('fake-printer');
        expect(payload.raster).toBe(result.raster);
        expect(payload.pageSize).toBe('w72h36');
        expect(payload.dpi).toBe(8);
        expect(payload.options).toBe('Darkness=5');
        expect(logger.errorMessages).toEqual([]);
    });

    it('should only render when no output or printer is given', async () => {
        const result = await runPrintJob(jobOptions({ dither: { family: 'error-diffusion', kernel: 'atkinson' } }));
        expect(result.outputFile).toBeUndefined();
        expect(result.submitted).toBe(false);
        expect(result.png.length).toBeGreaterThan(0);
    });

    it('should report every state to the progress bar', async () => {
        const progressBar = new CountingProgressBar();
        const machine = new PrintJobStateMachine(jobOptions({ progressBar }));
        await machine.run();
        expect(machine.currentState).toBe(PrintJobStates.COMPLETED);
        expect(progressBar.increments).toEqual([
            PrintJobStates.INIT,
            PrintJobStates.LOAD_IMAGE,
            PrintJobStates.ENHANCE,
            PrintJobStates.FIT_TO_LABEL,
            PrintJobStates.DITHER,
            PrintJobStates.ENCODE_OUTPUT,
            PrintJobStates.WRITE_OUTPUT,
            PrintJobStates.SUBMIT_PRINT,
            PrintJobStates.COMPLETED,
        ]);
    });

    it('should log and rethrow a failed submission', async () => {
        const progressBar = new CountingProgressBar();
        const options = jobOptions({
            progressBar,
            print: { printer: 'fake-printer', spooler: new FakeSpooler('offline') },
        });
        await expect(runPrintJob(options)).rejects.toThrow('Print submission to "fake-printer" failed: offline');
        expect(logger.errorMessages).toEqual([
            'Error occurred during "SUBMIT_PRINT": Print submission to "fake-printer" failed: offline',
        ]);
        expect(progressBar.stopped).toBe(true);
    });

    it('should keep core error kinds', async () => {
        const badConfig: DitherConfig = JSON.parse('{"family":"halftone"}');
        const machine = new PrintJobStateMachine(jobOptions({ dither: badConfig }));
        await expect(machine.run()).rejects.toThrow(UnsupportedAlgorithmError);
        expect(machine.currentState).toBe(PrintJobStates.ERROR);
        expect(() => machine.getResult()).toThrow('Print job has not completed (state: ERROR)');
    });

    it('should wrap image loading failures', async () => {
        const missing = path.join(outputDir, 'missing.jpg');
        await expect(runPrintJob(jobOptions({ source: missing }))).rejects.toThrow(`Failed to load image "${missing}"`);
    });
});
