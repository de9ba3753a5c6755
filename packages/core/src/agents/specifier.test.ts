import { describe, it, expect } from 'vitest';
import {
    SENTINEL_SPECIFIER,
    allocateSpecifier,
    foreignSpecifier,
    isForeignSpecifier,
    isManagedDirectoryName,
    managedDirectoryName,
    parseSpecifier,
} from './specifier.js';

describe('allocateSpecifier', () => {
    it('takes the last seven integer digits and three fractional digits of the clock', () => {
        expect(allocateSpecifier(1_712_345_678_123)).toBe('234.5678.123');
    });

    it('pads milliseconds to three digits', () => {
        expect(allocateSpecifier(1_712_345_678_005)).toBe('234.5678.005');
    });

    it('orders by time', () => {
        const earlier = allocateSpecifier(1_712_345_678_123);
        const later = allocateSpecifier(1_712_345_679_001);
        expect(earlier < later).toBe(true);
    });

    it('falls back to the sentinel when the clock is too small', () => {
        expect(allocateSpecifier(1_000)).toBe(SENTINEL_SPECIFIER);
    });
});

describe('parseSpecifier', () => {
    it('reads the specifier from a managed directory name', () => {
        expect(parseSpecifier('ssh-agent-111.2222.333')).toBe('111.2222.333');
    });

    it('returns the sentinel when the name has no specifier', () => {
        expect(parseSpecifier('ssh-agent-abc')).toBe('000.0000.000');
    });
});

describe('foreignSpecifier', () => {
    it('uses the earliest timestamp and marks the last group', () => {
        const processStart = new Date(1_712_345_600_000);
        const socketModified = new Date(1_712_345_678_123);
        expect(foreignSpecifier([socketModified, processStart])).toBe('234.5600.xxx');
    });

    it('ignores missing timestamps', () => {
        expect(foreignSpecifier([null, new Date(1_712_345_678_123)])).toBe('234.5678.xxx');
    });

    it('uses the sentinel shape when no timestamp is known', () => {
        expect(foreignSpecifier([null, null])).toBe('000.0000.xxx');
    });

    it('never produces a managed directory specifier', () => {
        const specifier = foreignSpecifier([new Date(1_712_345_678_123)]);
        expect(isManagedDirectoryName(managedDirectoryName(specifier))).toBe(false);
        expect(isForeignSpecifier(specifier)).toBe(true);
        expect(isForeignSpecifier('234.5678.123')).toBe(false);
    });
});

describe('isManagedDirectoryName', () => {
    it('accepts exactly the ssh-agent-ddd.dddd.ddd pattern', () => {
        expect(isManagedDirectoryName('ssh-agent-111.2222.333')).toBe(true);
        expect(isManagedDirectoryName(managedDirectoryName('234.5678.123'))).toBe(true);
    });

    it('rejects other names', () => {
        expect(isManagedDirectoryName('ssh-agent-111.2222.3333')).toBe(false);
        expect(isManagedDirectoryName('ssh-XXXXabcd')).toBe(false);
        expect(isManagedDirectoryName('xssh-agent-111.2222.333')).toBe(false);
        expect(isManagedDirectoryName('ssh-agent-111.2222.xxx')).toBe(false);
    });
});
