// src/core/labels/labelCatalog.ts

import { readFileSync } from 'node:fs';
import type { ILabelSpec, LabelBrand, LengthUnit } from '../../@types/index.ts';
import { config } from '../../config/index.ts';

const UNITS: readonly LengthUnit[] = ['in', 'mm'];
const BRANDS: readonly LabelBrand[] = ['dymo', 'generic'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(entry: Record<string, unknown>, key: string, where: string): string {
    const value = entry[key];
    if (typeof value !== 'string' || value.length === 0) {
        throw new Error(`${where}: "${key}" must be a non-empty string`);
    }
    return value;
}

function requirePositive(entry: Record<string, unknown>, key: string, where: string): number {
    const value = entry[key];
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
        throw new Error(`${where}: "${key}" must be a positive number`);
    }
    return value;
}

/**
 * Validates one catalog entry.
 *
 * @param {unknown} entry - Parsed JSON value.
 * @param {number} index - Position in the catalog, for error messages.
 * @return {ILabelSpec} The label specification.
 */
export function parseLabelSpec(entry: unknown, index: number): ILabelSpec {
    const where = `label catalog entry #${index}`;
    if (!isRecord(entry)) {
        throw new Error(`${where}: expected an object`);
    }
    const unit = entry.unit ?? 'in';
    const unitMatch = UNITS.find((u) => u === unit);
    if (!unitMatch) {
        throw new Error(`${where}: "unit" must be one of ${UNITS.join(', ')}`);
    }
    const brand = entry.brand ?? 'generic';
    const brandMatch = BRANDS.find((b) => b === brand);
    if (!brandMatch) {
        throw new Error(`${where}: "brand" must be one of ${BRANDS.join(', ')}`);
    }
    const pageSize = entry.pageSize;
    if (pageSize !== undefined && typeof pageSize !== 'string') {
        throw new Error(`${where}: "pageSize" must be a string`);
    }
    return {
        code: requireString(entry, 'code', where),
        name: requireString(entry, 'name', where),
        brand: brandMatch,
        width: requirePositive(entry, 'width', where),
        height: requirePositive(entry, 'height', where),
        unit: unitMatch,
        dpi: requirePositive(entry, 'dpi', where),
        pageSize,
    };
}

/**
 * Parses catalog JSON text of the form `{ "labels": [ ... ] }`.
 */
export function parseLabelCatalog(json: string): ILabelSpec[] {
    const parsed: unknown = JSON.parse(json);
    if (!isRecord(parsed) || !Array.isArray(parsed.labels)) {
        throw new Error('Label catalog must be an object with a "labels" array');
    }
    const labels = parsed.labels.map((entry: unknown, index: number) => parseLabelSpec(entry, index));
    const seen = new Set<string>();
    for (const label of labels) {
        if (seen.has(label.code)) {
            throw new Error(`Label catalog lists "${label.code}" more than once`);
        }
        seen.add(label.code);
    }
    return labels;
}

/**
 * Reads the label catalog from disk.
 *
 * @param {string} catalogFile - Path to the catalog JSON; defaults to the bundled `data/labels.json`.
 */
export function loadLabelCatalog(catalogFile: string = config.labels.catalogFile): ILabelSpec[] {
    return parseLabelCatalog(readFileSync(catalogFile, 'utf8'));
}

/**
 * Looks up a label by its code.
 *
 * @throws {Error} if no label has that code.
 */
export function getLabel(catalog: readonly ILabelSpec[], code: string): ILabelSpec {
    const label = catalog.find((l) => l.code === code);
    if (!label) {
        throw new Error(`Unknown label "${code}". Available: ${catalog.map((l) => l.code).join(', ')}`);
    }
    return label;
}

export function labelsForBrand(catalog: readonly ILabelSpec[], brand: LabelBrand): ILabelSpec[] {
    return catalog.filter((l) => l.brand === brand);
}
