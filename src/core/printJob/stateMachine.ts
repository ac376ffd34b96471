// src/core/printJob/stateMachine.ts

import * as path from 'node:path';
import { writeFile } from 'node:fs/promises';
import type { IPixelBuffer, IPrintJobOptions, IPrintJobResult } from '../../@types/index.ts';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine.ts';
import { PrintJobStates } from '../../stateMachine/definedStates.ts';
import { ensureOutputDirectory } from '../../utils/storage/storageUtils.ts';
import { dither } from '../dithering/dither.ts';
import { applyEnhancement } from '../enhancement/enhancer.ts';
import { loadGrayscaleImage } from '../imageProcessing/processor.ts';
import { labelPixelSize } from '../labelFitting/geometry.ts';
import { fitToLabel } from '../labelFitting/labelFitter.ts';
import { encodePng, toSpoolFormat } from '../output/outputEncoder.ts';
import { assertPixelBuffer } from '../pixelBuffer/pixelBuffer.ts';

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Takes one image through the pipeline:
 * load → enhance → fit to label → dither → encode → (write) → (print).
 * Each stage hands a fresh buffer to the next.
 */
export class PrintJobStateMachine extends AbstractStateMachine<PrintJobStates, IPrintJobOptions> {
    private source: IPixelBuffer | null = null;
    private enhanced: IPixelBuffer | null = null;
    private fitted: IPixelBuffer | null = null;
    private raster: IPixelBuffer | null = null;
    private png: Buffer | null = null;
    private writtenTo: string | undefined;
    private submitted = false;

    constructor(options: IPrintJobOptions) {
        super(PrintJobStates.INIT, options);
        this.stateTransitions = [
            { state: PrintJobStates.INIT, handler: this.init },
            { state: PrintJobStates.LOAD_IMAGE, handler: this.loadImage },
            { state: PrintJobStates.ENHANCE, handler: this.enhance },
            { state: PrintJobStates.FIT_TO_LABEL, handler: this.fitImage },
            { state: PrintJobStates.DITHER, handler: this.ditherImage },
            { state: PrintJobStates.ENCODE_OUTPUT, handler: this.encodeOutput },
            { state: PrintJobStates.WRITE_OUTPUT, handler: this.writeOutput },
            { state: PrintJobStates.SUBMIT_PRINT, handler: this.submitPrint },
        ];
    }

    protected getCompletionState(): PrintJobStates {
        return PrintJobStates.COMPLETED;
    }

    protected getErrorState(): PrintJobStates {
        return PrintJobStates.ERROR;
    }

    /**
     * Result of a completed run.
     *
     * @throws {Error} if the machine has not completed.
     */
    public getResult(): IPrintJobResult {
        if (this.state !== PrintJobStates.COMPLETED || !this.raster || !this.png) {
            throw new Error(`Print job has not completed (state: ${this.state})`);
        }
        return { raster: this.raster, png: this.png, outputFile: this.writtenTo, submitted: this.submitted };
    }

    private init(): void {
        const { logger, label, dither: ditherConfig } = this.options;
        const { widthPx, heightPx } = labelPixelSize(label);
        logger.info(`Preparing ${label.code ?? 'custom'} label at ${widthPx}x${heightPx} px (${label.dpi} dpi)`);
        logger.debug(`Dithering with ${JSON.stringify(ditherConfig)}`);
    }

    private async loadImage(): Promise<void> {
        const { logger, source } = this.options;
        if (typeof source !== 'string') {
            assertPixelBuffer(source, 'gray8');
            this.source = source;
            logger.debug(`Using in-memory image ${source.width}x${source.height}`);
            return;
        }
        logger.info(`Loading image ${source}...`);
        try {
            this.source = await loadGrayscaleImage(source);
        } catch (error) {
            throw new Error(`Failed to load image "${source}": ${describe(error)}`);
        }
        logger.debug(`Image decoded at ${this.source.width}x${this.source.height}`);
    }

    private enhance(): void {
        const { logger, enhancement } = this.options;
        logger.debug(`Applying contrast ${enhancement.contrast} then brightness ${enhancement.brightness}`);
        this.enhanced = applyEnhancement(this.requireBuffer(this.source, 'source image'), enhancement);
    }

    private fitImage(): void {
        const { logger, label } = this.options;
        this.fitted = fitToLabel(this.requireBuffer(this.enhanced, 'enhanced image'), label);
        logger.debug(`Fitted to ${this.fitted.width}x${this.fitted.height}`);
    }

    private ditherImage(): void {
        const { logger } = this.options;
        logger.info('Dithering to 1-bit...');
        this.raster = dither(this.requireBuffer(this.fitted, 'fitted image'), this.options.dither);
    }

    private async encodeOutput(): Promise<void> {
        this.png = await encodePng(this.requireBuffer(this.raster, 'raster'));
        this.options.logger.debug(`Encoded PNG (${this.png.length} bytes)`);
    }

    private async writeOutput(): Promise<void> {
        const { logger, outputFile } = this.options;
        if (!outputFile || !this.png) return;
        const target = path.resolve(outputFile);
        try {
            ensureOutputDirectory(path.dirname(target));
            await writeFile(target, this.png);
        } catch (error) {
            throw new Error(`Failed to write "${target}": ${describe(error)}`);
        }
        this.writtenTo = target;
        logger.success(`Saved ${target}`);
    }

    private async submitPrint(): Promise<void> {
        const { logger, print, label } = this.options;
        if (!print) return;
        const payload = toSpoolFormat(this.requireBuffer(this.raster, 'raster'), label, print.options ?? '');
        logger.info(`Sending to printer ${print.printer}...`);
        try {
            await print.spooler.submit(payload, print.printer);
        } catch (error) {
            throw new Error(`Print submission to "${print.printer}" failed: ${describe(error)}`);
        }
        this.submitted = true;
        logger.success(`Print job sent to ${print.printer}`);
    }

    private requireBuffer(buffer: IPixelBuffer | null, what: string): IPixelBuffer {
        if (!buffer) {
            throw new Error(`No ${what} available in state ${this.state}`);
        }
        return buffer;
    }
}
