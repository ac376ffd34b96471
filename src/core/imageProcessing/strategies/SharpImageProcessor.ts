// src/core/imageProcessing/strategies/SharpImageProcessor.ts

import { writeFile } from 'node:fs/promises';
import sharp from 'sharp';
import type { ImageProcessor, IPixelBuffer } from '../../../@types/index.ts';
import { config } from '../../../config/index.ts';
import { assertPixelBuffer, monoToGray } from '../../pixelBuffer/pixelBuffer.ts';

export class SharpImageProcessor implements ImageProcessor {
    /**
     * Decodes an image file (or its bytes) to 8-bit grayscale. EXIF orientation is
     * applied and any transparency is flattened onto white, the colour of the label stock.
     *
     * @param {string | Uint8Array} input - File path or encoded image bytes.
     * @return {Promise<IPixelBuffer>} The decoded `gray8` buffer.
     */
    public async loadGrayscale(input: string | Uint8Array): Promise<IPixelBuffer> {
        const { data, info } = await sharp(input)
            .rotate()
            .flatten({ background: '#ffffff' })
            .greyscale()
            .raw()
            .toBuffer({ resolveWithObject: true });

        const pixels = info.width * info.height;
        if (info.channels === 1) {
            return { width: info.width, height: info.height, depth: 'gray8', data: new Uint8Array(data) };
        }
        // keep the first channel when libvips hands back more than one
        const gray = new Uint8Array(pixels);
        for (let i = 0; i < pixels; i++) {
            gray[i] = data[i * info.channels];
        }
        return { width: info.width, height: info.height, depth: 'gray8', data: gray };
    }

    /**
     * Encodes a buffer as a lossless single-channel PNG. 1-bit buffers are
     * written as 0/255 samples.
     */
    public async encodePng(buffer: IPixelBuffer): Promise<Buffer> {
        assertPixelBuffer(buffer);
        const gray = buffer.depth === 'mono1' ? monoToGray(buffer) : buffer;
        return await sharp(gray.data, {
            raw: {
                width: gray.width,
                height: gray.height,
                channels: 1,
            },
        })
            .toColourspace('b-w')
            .png({
                compressionLevel: config.imageCompression.compressionLevel,
                adaptiveFiltering: config.imageCompression.adaptiveFiltering,
                palette: false,
            })
            .toBuffer();
    }

    /**
     * Writes a buffer to a PNG file.
     */
    public async writePng(buffer: IPixelBuffer, outputPngPath: string): Promise<void> {
        const png = await this.encodePng(buffer);
        await writeFile(outputPngPath, png);
    }
}
