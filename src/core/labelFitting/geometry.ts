// src/core/labelFitting/geometry.ts

import type { ILabelGeometry, ILabelPixelSize, LengthUnit } from '../../@types/index.ts';
import { InvalidGeometryError } from '../errors.ts';

const MM_PER_INCH = 25.4;

export function toInches(value: number, unit: LengthUnit): number {
    return unit === 'mm' ? value / MM_PER_INCH : value;
}

/**
 * Resolves a label's physical size to print-head pixels, rounding each axis to
 * the nearest integer.
 *
 * @throws {InvalidGeometryError} when either axis comes out below one pixel.
 */
export function labelPixelSize(label: ILabelGeometry): ILabelPixelSize {
    const widthPx = Math.round(toInches(label.width, label.unit) * label.dpi);
    const heightPx = Math.round(toInches(label.height, label.unit) * label.dpi);
    if (!(widthPx >= 1) || !(heightPx >= 1)) {
        throw new InvalidGeometryError(
            `Label ${label.code ?? ''} ${label.width}x${label.height}${label.unit} @ ${label.dpi}dpi ` +
                `resolves to ${widthPx}x${heightPx} pixels`,
        );
    }
    return { widthPx, heightPx };
}
