// src/core/labelFitting/labelFitter.ts

import type { ILabelGeometry, IPixelBuffer } from '../../@types/index.ts';
import { assertPixelBuffer, createPixelBuffer, isLandscape, isPortrait, WHITE } from '../pixelBuffer/pixelBuffer.ts';
import { labelPixelSize } from './geometry.ts';
import { resample } from './resample.ts';
import { rotate90 } from './rotate.ts';

/**
 * Whether the source must be turned 90° so its long side runs along the label's long side.
 * Square sources and square labels are never rotated.
 */
export function needsRotation(srcW: number, srcH: number, targetW: number, targetH: number): boolean {
    return (isLandscape(srcW, srcH) && isPortrait(targetW, targetH)) ||
        (isPortrait(srcW, srcH) && isLandscape(targetW, targetH));
}

/**
 * Largest size with the source's aspect ratio that fits inside the target.
 */
export function fitWithin(
    srcW: number,
    srcH: number,
    targetW: number,
    targetH: number,
): { width: number; height: number } {
    const scale = Math.min(targetW / srcW, targetH / srcH);
    return {
        width: Math.min(targetW, Math.max(1, Math.round(srcW * scale))),
        height: Math.min(targetH, Math.max(1, Math.round(srcH * scale))),
    };
}

/**
 * Produces a grayscale buffer exactly the label's pixel size: the source is
 * auto-oriented, scaled to fit within the label and centred on white.
 *
 * @param {IPixelBuffer} buffer - 8-bit grayscale source.
 * @param {ILabelGeometry} label - Target label.
 * @return {IPixelBuffer} A new buffer of the label's pixel width and height.
 * @throws {InvalidGeometryError} if the label resolves to less than one pixel on an axis.
 */
export function fitToLabel(buffer: IPixelBuffer, label: ILabelGeometry): IPixelBuffer {
    assertPixelBuffer(buffer, 'gray8');
    const { widthPx, heightPx } = labelPixelSize(label);

    const oriented = needsRotation(buffer.width, buffer.height, widthPx, heightPx) ? rotate90(buffer) : buffer;
    const size = fitWithin(oriented.width, oriented.height, widthPx, heightPx);
    const scaled = resample(oriented, size.width, size.height);

    if (scaled.width === widthPx && scaled.height === heightPx) {
        return scaled;
    }

    const canvas = createPixelBuffer(widthPx, heightPx, 'gray8', WHITE);
    const offsetX = Math.floor((widthPx - scaled.width) / 2);
    const offsetY = Math.floor((heightPx - scaled.height) / 2);
    for (let y = 0; y < scaled.height; y++) {
        const row = scaled.data.subarray(y * scaled.width, (y + 1) * scaled.width);
        canvas.data.set(row, (y + offsetY) * widthPx + offsetX);
    }
    return canvas;
}
