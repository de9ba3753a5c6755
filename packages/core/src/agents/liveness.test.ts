import { describe, it, expect } from 'vitest';
import {
    isForeignRecordValid,
    isManagedRecordValid,
    isPidValid,
    isSocketValid,
    parsePid,
    parseStartTicks,
    processStartTime,
    socketModifiedTime,
} from './liveness.js';
import { BOOT_TIME_SECONDS, FakeHost, OTHER_UID, TEST_UID } from '../testing/fake-host.js';

describe('parsePid', () => {
    it('accepts positive integers', () => {
        expect(parsePid('4242')).toBe(4242);
    });

    it('rejects zero, signs, whitespace and text', () => {
        expect(parsePid('0')).toBeNull();
        expect(parsePid('-1')).toBeNull();
        expect(parsePid(' 12')).toBeNull();
        expect(parsePid('12; rm')).toBeNull();
        expect(parsePid('')).toBeNull();
    });
});

describe('isPidValid', () => {
    it('is true for a live process', () => {
        const host = new FakeHost().addProcess(4242);
        expect(isPidValid(host, '4242')).toBe(true);
    });

    it('is false when the process is gone', () => {
        expect(isPidValid(new FakeHost(), '4242')).toBe(false);
    });

    it('is false when the probe is refused', () => {
        const host = new FakeHost().addProcess(4242);
        host.foreignPids.add(4242);
        expect(isPidValid(host, '4242')).toBe(false);
    });

    it('does not probe malformed pids', () => {
        const host = new FakeHost().addProcess(4242);
        expect(isPidValid(host, '4242x')).toBe(false);
    });
});

describe('isSocketValid', () => {
    it('accepts a socket owned by the user', async () => {
        const host = new FakeHost().addSocket('/tmp/agent.sock');
        expect(await isSocketValid(host, '/tmp/agent.sock', TEST_UID)).toBe(true);
    });

    it('rejects a socket owned by another user', async () => {
        const host = new FakeHost().addSocket('/tmp/agent.sock', { uid: OTHER_UID });
        expect(await isSocketValid(host, '/tmp/agent.sock', TEST_UID)).toBe(false);
    });

    it('rejects regular files, symlinks and missing paths', async () => {
        const host = new FakeHost()
            .addFile('/tmp/file', '')
            .addSymlink('/tmp/link');
        expect(await isSocketValid(host, '/tmp/file', TEST_UID)).toBe(false);
        expect(await isSocketValid(host, '/tmp/link', TEST_UID)).toBe(false);
        expect(await isSocketValid(host, '/tmp/missing', TEST_UID)).toBe(false);
        expect(await isSocketValid(host, '', TEST_UID)).toBe(false);
    });
});

describe('parseStartTicks', () => {
    it('reads field 22 of a stat line', () => {
        const line = '4242 (ssh-agent) S 1 4242 4242 0 -1 4194624 100 0 0 0 0 0 0 0 20 0 1 0 98765 1000 200';
        expect(parseStartTicks(line)).toBe(98765);
    });

    it('handles command names with spaces and parentheses', () => {
        const line = '4242 (odd (name) here) S 1 4242 4242 0 -1 4194624 100 0 0 0 0 0 0 0 20 0 1 0 555 1000';
        expect(parseStartTicks(line)).toBe(555);
    });

    it('returns null for truncated lines', () => {
        expect(parseStartTicks('4242 (ssh-agent) S 1')).toBeNull();
        expect(parseStartTicks('garbage')).toBeNull();
    });
});

describe('processStartTime', () => {
    it('adds ticks over the clock rate to the boot time', async () => {
        const host = new FakeHost().addProcess(4242, { startTicks: 12_300 });
        const started = await processStartTime(host, '4242');
        expect(started?.getTime()).toBe((BOOT_TIME_SECONDS + 123) * 1000);
    });

    it('is null for unknown processes', async () => {
        expect(await processStartTime(new FakeHost(), '4242')).toBeNull();
        expect(await processStartTime(new FakeHost(), '')).toBeNull();
    });
});

describe('socketModifiedTime', () => {
    it('returns the modification time', async () => {
        const host = new FakeHost().addSocket('/tmp/agent.sock', { mtimeMs: 1_712_345_000_000 });
        expect((await socketModifiedTime(host, '/tmp/agent.sock'))?.getTime()).toBe(1_712_345_000_000);
    });

    it('is null for missing sockets', async () => {
        expect(await socketModifiedTime(new FakeHost(), '/tmp/agent.sock')).toBeNull();
    });
});

describe('composite validity', () => {
    const future = new Date(2_000_000_000_000);

    it('requires pid, socket and an unexpired managed record', () => {
        expect(isManagedRecordValid(true, true, future, 1_000)).toBe(true);
        expect(isManagedRecordValid(false, true, future, 1_000)).toBe(false);
        expect(isManagedRecordValid(true, false, future, 1_000)).toBe(false);
        expect(isManagedRecordValid(true, true, future, future.getTime())).toBe(false);
        expect(isManagedRecordValid(true, true, null, 1_000)).toBe(false);
    });

    it('checks only pid and socket for foreign records', () => {
        expect(isForeignRecordValid(true, true)).toBe(true);
        expect(isForeignRecordValid(true, false)).toBe(false);
        expect(isForeignRecordValid(false, true)).toBe(false);
    });
});
