/**
 * CLI Flag Validation Utilities
 *
 * Each validator prints an error and exits when the value is unusable.
 * Pass exitOnError = false to get the result back instead.
 *
 * ```typescript
 * validateMutualExclusion(['--specifier', '--identity'], [options.specifier, options.identity]);
 * const lifetime = validatePositiveNumber(options.lifetime, '--lifetime');
 * ```
 */

import chalk from 'chalk';

const SPECIFIER_PATTERN = /^\d{3}\.\d{4}\.(\d{3}|xxx)$/;

/**
 * Validate that mutually exclusive flags aren't used together.
 *
 * @param flagValues - Corresponding values (truthy means flag is set)
 * @returns true if valid, false if invalid (only when exitOnError is false)
 */
export function validateMutualExclusion(
    flagNames: string[],
    flagValues: (boolean | string | undefined)[],
    exitOnError = true
): boolean {
    const setFlags = flagNames.filter((_, i) => flagValues[i]);

    if (setFlags.length > 1) {
        console.error(chalk.red('Error:'), `Flags ${setFlags.join(' and ')} cannot be used together`);
        console.error('These flags are mutually exclusive. Use only one.');
        if (exitOnError) {
            process.exit(1);
        }
        return false;
    }

    return true;
}

/**
 * Validate that a numeric value is a whole number within range.
 *
 * @param min - Minimum allowed value (default: 1)
 * @param max - Maximum allowed value (optional)
 * @returns The parsed number if valid, undefined if not provided or invalid
 */
export function validatePositiveNumber(
    value: string | number | undefined,
    flagName: string,
    min = 1,
    max?: number,
    exitOnError = true
): number | undefined {
    if (value === undefined) {
        return undefined;
    }

    const num = typeof value === 'string'
        ? (/^\d+$/.test(value.trim()) ? parseInt(value, 10) : NaN)
        : value;

    if (!Number.isInteger(num)) {
        console.error(chalk.red('Error:'), `${flagName} must be a whole number`);
        if (exitOnError) {
            process.exit(1);
        }
        return undefined;
    }

    if (num < min) {
        console.error(chalk.red('Error:'), `${flagName} must be at least ${min}`);
        if (exitOnError) {
            process.exit(1);
        }
        return undefined;
    }

    if (max !== undefined && num > max) {
        console.error(chalk.red('Error:'), `${flagName} must be at most ${max}`);
        if (exitOnError) {
            process.exit(1);
        }
        return undefined;
    }

    return num;
}

/**
 * Validate the shape of an agent specifier (ddd.dddd.ddd, or ddd.dddd.xxx
 * for an agent this tool did not start).
 */
export function validateSpecifier(
    value: string | undefined,
    flagName: string,
    exitOnError = true
): boolean {
    if (value === undefined || SPECIFIER_PATTERN.test(value)) {
        return true;
    }

    console.error(chalk.red('Error:'), `Invalid value for ${flagName}: "${value}"`);
    console.error('Expected a specifier such as 123.4567.890 or 123.4567.xxx');
    if (exitOnError) {
        process.exit(1);
    }
    return false;
}
