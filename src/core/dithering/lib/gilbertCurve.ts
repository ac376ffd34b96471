// src/core/dithering/lib/gilbertCurve.ts

/**
 * Generalized Hilbert ("gilbert") curve over an arbitrary `width x height`
 * rectangle. Every cell is visited exactly once and consecutive cells are
 * 8-neighbours, so the walk costs O(width * height) regardless of aspect ratio.
 *
 * @param {(x: number, y: number) => void} visit - Called once per cell, in curve order.
 */
export function walkGilbertCurve(width: number, height: number, visit: (x: number, y: number) => void): void {
    if (width >= height) {
        generate(0, 0, width, 0, 0, height, visit);
    } else {
        generate(0, 0, 0, height, width, 0, visit);
    }
}

/**
 * Collects the curve as an array of linear indices (`y * width + x`).
 */
export function gilbertOrder(width: number, height: number): Uint32Array {
    const order = new Uint32Array(width * height);
    let n = 0;
    walkGilbertCurve(width, height, (x, y) => {
        order[n++] = y * width + x;
    });
    return order;
}

/**
 * Fills the rectangle spanned from (x, y) by the major axis (ax, ay) and the
 * minor axis (bx, by).
 */
function generate(
    x: number,
    y: number,
    ax: number,
    ay: number,
    bx: number,
    by: number,
    visit: (x: number, y: number) => void,
): void {
    const w = Math.abs(ax + ay);
    const h = Math.abs(bx + by);
    const dax = Math.sign(ax);
    const day = Math.sign(ay);
    const dbx = Math.sign(bx);
    const dby = Math.sign(by);

    if (h === 1) {
        for (let i = 0; i < w; i++) {
            visit(x, y);
            x += dax;
            y += day;
        }
        return;
    }
    if (w === 1) {
        for (let i = 0; i < h; i++) {
            visit(x, y);
            x += dbx;
            y += dby;
        }
        return;
    }

    let ax2 = Math.floor(ax / 2);
    let ay2 = Math.floor(ay / 2);
    let bx2 = Math.floor(bx / 2);
    let by2 = Math.floor(by / 2);
    const w2 = Math.abs(ax2 + ay2);
    const h2 = Math.abs(bx2 + by2);

    if (2 * w > 3 * h) {
        // long case: split the major axis in two halves
        if (w2 % 2 === 1 && w > 2) {
            ax2 += dax;
            ay2 += day;
        }
        generate(x, y, ax2, ay2, bx, by, visit);
        generate(x + ax2, y + ay2, ax - ax2, ay - ay2, bx, by, visit);
    } else {
        // standard case: one step up, one long horizontal, one step down
        if (h2 % 2 === 1 && h > 2) {
            bx2 += dbx;
            by2 += dby;
        }
        generate(x, y, bx2, by2, ax2, ay2, visit);
        generate(x + bx2, y + by2, ax, ay, bx - bx2, by - by2, visit);
        generate(
            x + (ax - dax) + (bx2 - dbx),
            y + (ay - day) + (by2 - dby),
            -bx2,
            -by2,
            -(ax - ax2),
            -(ay - ay2),
            visit,
        );
    }
}
