// src/cli/optionParsers.ts

import { InvalidArgumentError } from 'commander';

/**
 * Commander parser for numeric factors such as brightness and contrast.
 * Any finite number is accepted; the range is left to the consumer.
 */
export function parseFactor(value: string): number {
    const parsed = Number(value.trim());
    if (value.trim().length === 0 || !Number.isFinite(parsed)) {
        throw new InvalidArgumentError(`"${value}" is not a number.`);
    }
    return parsed;
}

export function parseInteger(value: string): number {
    const parsed = parseFactor(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError(`"${value}" is not an integer.`);
    }
    return parsed;
}
