import type { IPixelBuffer } from '../../src/@types/index.ts';

export function uniformGray(width: number, height: number, value: number): IPixelBuffer {
    return { width, height, depth: 'gray8', data: new Uint8Array(width * height).fill(value) };
}

export function grayFromRows(rows: number[][]): IPixelBuffer {
    return { width: rows[0].length, height: rows.length, depth: 'gray8', data: Uint8Array.from(rows.flat()) };
}

export function toRows(buffer: IPixelBuffer): number[][] {
    const rows: number[][] = [];
    for (let y = 0; y < buffer.height; y++) {
        rows.push(Array.from(buffer.data.subarray(y * buffer.width, (y + 1) * buffer.width)));
    }
    return rows;
}

export function whiteFraction(buffer: IPixelBuffer): number {
    let white = 0;
    for (const v of buffer.data) white += v;
    return white / buffer.data.length;
}
