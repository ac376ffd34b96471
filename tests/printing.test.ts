// tests/printing.test.ts

import { describe, expect, it } from 'vitest';
import { buildLpArguments } from '../src/utils/printing/LpSpooler.ts';
import {
    brandForPrinter,
    defaultPrintOptions,
    parseLpstatOutput,
    selectPreferredPrinter,
} from '../src/utils/printing/printerUtils.ts';
import { createPixelBuffer } from '../src/core/pixelBuffer/pixelBuffer.ts';
import type { ISpoolPayload } from '../src/@types/index.ts';

describe('Printer utilities', () => {
    it('should read one destination per lpstat line', () => {
        expect(parseLpstatOutput('Office_Laser\n  DYMO_LabelWriter_450  \n\n')).toEqual([
            'Office_Laser',
            'DYMO_LabelWriter_450',
        ]);
    });

    it('should prefer label printers by keyword', () => {
        expect(selectPreferredPrinter(['Office_Laser', 'DYMO_LabelWriter_450'])).toBe('DYMO_LabelWriter_450');
        expect(selectPreferredPrinter(['Office_Laser', 'Rollo_RX106HD'])).toBe('Rollo_RX106HD');
        expect(selectPreferredPrinter(['Office_Laser', 'Inkjet'])).toBeNull();
        expect(selectPreferredPrinter([])).toBeNull();
    });

    it('should accept custom keywords', () => {
        expect(selectPreferredPrinter(['a-zebra', 'b-dymo'], ['zebra'])).toBe('a-zebra');
    });

    it('should default Dymo printers to graphics quality', () => {
        expect(brandForPrinter('DYMO_LabelWriter_450')).toBe('dymo');
        expect(brandForPrinter('Rollo_RX106HD')).toBe('generic');
        expect(defaultPrintOptions('dymo')).toBe('DymoPrintDensity=Medium DymoPrintQuality=Graphics');
        expect(defaultPrintOptions('generic')).toBe('');
    });
});

describe('buildLpArguments', () => {
    const payload: ISpoolPayload = {
        raster: createPixelBuffer(72, 72, 'mono1', 1),
        widthPx: 72,
        heightPx: 72,
        dpi: 300,
        pageSize: 'w72h72',
        options: ' DymoPrintDensity=Medium  DymoPrintQuality=Graphics ',
    };

    it('should pass page size, scaling, resolution and each option', () => {
        expect(buildLpArguments(payload, 'DYMO', '/tmp/label.png')).toEqual([
            '-d', 'DYMO',
            '-o', 'PageSize=w72h72',
            '-o', 'scaling=100',
            '-o', 'ppi=300',
            '-o', 'DymoPrintDensity=Medium',
            '-o', 'DymoPrintQuality=Graphics',
            '/tmp/label.png',
        ]);
    });

    it('should leave out the page size and options when there are none', () => {
        expect(buildLpArguments({ ...payload, pageSize: undefined, options: '' }, 'Rollo', 'out.png')).toEqual([
            '-d', 'Rollo',
            '-o', 'scaling=100',
            '-o', 'ppi=300',
            'out.png',
        ]);
    });
});
