// src/core/imageProcessing/processor.ts

import type { IPixelBuffer } from '../../@types/index.ts';
import { SharpImageProcessor } from './strategies/SharpImageProcessor.ts';

const processor = new SharpImageProcessor();

/**
 * Decodes an image file or encoded bytes into an 8-bit grayscale buffer.
 *
 * @param {string | Uint8Array} input - The file path or bytes of a JPEG, PNG, GIF, TIFF, WebP or similar.
 * @return {Promise<IPixelBuffer>} A promise that resolves to the decoded grayscale buffer.
 */
export async function loadGrayscaleImage(input: string | Uint8Array): Promise<IPixelBuffer> {
    return await processor.loadGrayscale(input);
}

/**
 * Encodes a grayscale or 1-bit buffer as PNG bytes.
 */
export async function encodePngBytes(buffer: IPixelBuffer): Promise<Buffer> {
    return await processor.encodePng(buffer);
}

/**
 * Writes a grayscale or 1-bit buffer to a PNG file.
 *
 * @param {IPixelBuffer} buffer - The raster to write.
 * @param {string} outputPngPath - The path where the PNG file will be saved.
 */
export async function writePngFile(buffer: IPixelBuffer, outputPngPath: string): Promise<void> {
    await processor.writePng(buffer, outputPngPath);
}
