/**
 * Tests for CLI flag validation utilities
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { validateMutualExclusion, validatePositiveNumber, validateSpecifier } from './validation.js';
import { selectorFromOptions } from './commands/select.js';

// Capture console output
let consoleOutput: string[] = [];

beforeEach(() => {
    consoleOutput = [];
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
        consoleOutput.push(args.join(' '));
    });
    vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
        throw new Error(`exit(${code})`);
    });
});

afterEach(() => {
    vi.restoreAllMocks();
});

function printed(text: string): boolean {
    return consoleOutput.some(line => line.includes(text));
}

describe('validateMutualExclusion', () => {
    it('should accept a single flag', () => {
        expect(validateMutualExclusion(['--specifier', '--identity'], ['123.4567.890', undefined])).toBe(true);
    });

    it('should accept no flags', () => {
        expect(validateMutualExclusion(['--specifier', '--identity'], [undefined, undefined])).toBe(true);
    });

    it('should exit when two flags are set', () => {
        expect(() => validateMutualExclusion(['--specifier', '--identity'], ['123.4567.890', 'id_ed25519'])).toThrow(
            'exit(1)'
        );
        expect(printed('Flags --specifier and --identity cannot be used together')).toBe(true);
    });

    it('should return false instead of exiting when asked', () => {
        expect(validateMutualExclusion(['--all', '--identity'], [true, 'id_ed25519'], false)).toBe(false);
        expect(process.exit).not.toHaveBeenCalled();
    });
});

describe('validatePositiveNumber', () => {
    it('should return undefined when not provided', () => {
        expect(validatePositiveNumber(undefined, '--lifetime')).toBeUndefined();
    });

    it('should parse whole numbers', () => {
        expect(validatePositiveNumber('3600', '--lifetime')).toBe(3600);
        expect(validatePositiveNumber(60, '--lifetime')).toBe(60);
    });

    it('should reject trailing garbage', () => {
        expect(() => validatePositiveNumber('60s', '--lifetime')).toThrow('exit(1)');
        expect(printed('--lifetime must be a whole number')).toBe(true);
    });

    it('should enforce the minimum', () => {
        expect(validatePositiveNumber('0', '--lifetime', 1, undefined, false)).toBeUndefined();
        expect(printed('--lifetime must be at least 1')).toBe(true);
    });

    it('should enforce the maximum', () => {
        expect(validatePositiveNumber('100', '--lifetime', 1, 10, false)).toBeUndefined();
        expect(printed('--lifetime must be at most 10')).toBe(true);
    });
});

describe('validateSpecifier', () => {
    it('should accept managed and foreign specifiers', () => {
        expect(validateSpecifier('123.4567.890', '--specifier')).toBe(true);
        expect(validateSpecifier('000.0000.xxx', '--specifier')).toBe(true);
        expect(validateSpecifier(undefined, '--specifier')).toBe(true);
    });

    it('should reject anything else', () => {
        expect(validateSpecifier('12.4567.890', '--specifier', false)).toBe(false);
        expect(validateSpecifier('123.4567.89x', '--specifier', false)).toBe(false);
        expect(() => validateSpecifier('ssh-agent-123.4567.890', '--specifier')).toThrow('exit(1)');
    });
});

describe('selectorFromOptions', () => {
    it('builds a specifier selector', () => {
        expect(selectorFromOptions({ specifier: '123.4567.890' })).toEqual({ kind: 'specifier', specifier: '123.4567.890' });
    });

    it('builds an identity selector', () => {
        expect(selectorFromOptions({ identity: 'id_ed25519' })).toEqual({ kind: 'identity', identity: 'id_ed25519' });
    });

    it('defaults to the only agent', () => {
        expect(selectorFromOptions({})).toEqual({ kind: 'default' });
    });

    it('refuses both selectors at once', () => {
        expect(() => selectorFromOptions({ specifier: '123.4567.890', identity: 'id_ed25519' })).toThrow('exit(1)');
    });
});
