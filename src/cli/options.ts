import { InvalidArgumentError } from "commander";

export function parseNonNegativeInt(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 0) {
        throw new InvalidArgumentError(`expected a non-negative integer, got "${value}"`);
    }
    return n;
}

export function parsePositiveInt(value: string): number {
    const n = parseNonNegativeInt(value);
    if (n === 0) {
        throw new InvalidArgumentError(`expected a positive integer, got "${value}"`);
    }
    return n;
}

export function printJson(value: unknown) {
    console.log(JSON.stringify(value, null, 2));
}
