// src/core/output/outputEncoder.ts

import type { IPixelBuffer, IPrintableLabel, ISpoolPayload } from '../../@types/index.ts';
import { BufferSizeMismatchError } from '../errors.ts';
import { encodePngBytes } from '../imageProcessing/processor.ts';
import { labelPixelSize } from '../labelFitting/geometry.ts';
import { assertPixelBuffer } from '../pixelBuffer/pixelBuffer.ts';

/**
 * Lossless PNG encoding of a raster for saving or previewing.
 */
export async function encodePng(buffer: IPixelBuffer): Promise<Buffer> {
    assertPixelBuffer(buffer);
    return await encodePngBytes(buffer);
}

/**
 * Packages a finished 1-bit raster for the print spooler.
 *
 * @param {IPixelBuffer} buffer - `mono1` raster at the label's pixel size.
 * @param {IPrintableLabel} label - The label it was fitted to.
 * @param {string} options - Printer options, passed through untouched.
 * @throws {BufferSizeMismatchError} if the raster is not 1-bit or not the label's size.
 */
export function toSpoolFormat(
    buffer: IPixelBuffer,
    label: IPrintableLabel,
    options = '',
): ISpoolPayload {
    assertPixelBuffer(buffer, 'mono1');
    const { widthPx, heightPx } = labelPixelSize(label);
    if (buffer.width !== widthPx || buffer.height !== heightPx) {
        throw new BufferSizeMismatchError(
            `Raster is ${buffer.width}x${buffer.height} but the label needs ${widthPx}x${heightPx}`,
        );
    }
    return {
        raster: buffer,
        widthPx,
        heightPx,
        dpi: label.dpi,
        pageSize: label.pageSize,
        options,
    };
}
