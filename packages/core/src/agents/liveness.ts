/**
 * Liveness checks for agent pids and sockets.
 *
 * Pid validity and socket validity are independent predicates. A valid pid
 * only proves some process with that id is alive: a recycled pid belonging to
 * an unrelated process is reported valid.
 */

import type { AgentHost } from './host.js';

const PID_PATTERN = /^\d+$/;

// Index of starttime (field 22) among the fields following the ")" of comm
const START_TIME_FIELD = 19;

export function parsePid(pid: string): number | null {
    if (!PID_PATTERN.test(pid)) {
        return null;
    }
    const value = parseInt(pid, 10);
    return value > 0 ? value : null;
}

/**
 * A positive integer pid that accepts a zero signal
 */
export function isPidValid(host: AgentHost, pid: string): boolean {
    const value = parsePid(pid);
    return value !== null && host.probeProcess(value);
}

/**
 * A socket special file owned by uid. Symlinks are not followed.
 */
export async function isSocketValid(host: AgentHost, path: string, uid: number): Promise<boolean> {
    if (!path) {
        return false;
    }
    const stat = await host.lstat(path);
    return stat !== null && stat.kind === 'socket' && stat.uid === uid;
}

/**
 * Extract starttime in clock ticks from a /proc/<pid>/stat line
 */
export function parseStartTicks(statLine: string): number | null {
    // comm may contain spaces and parentheses; fields resume after the last ")"
    const end = statLine.lastIndexOf(')');
    if (end === -1) {
        return null;
    }
    const fields = statLine.slice(end + 1).trim().split(/\s+/);
    const ticks = Number(fields[START_TIME_FIELD]);
    return Number.isFinite(ticks) && ticks >= 0 ? ticks : null;
}

/**
 * Wall-clock start time of a process: boot time plus starttime ticks / CLK_TCK
 */
export async function processStartTime(host: AgentHost, pid: string): Promise<Date | null> {
    const value = parsePid(pid);
    if (value === null) {
        return null;
    }

    const [statLine, bootTime] = await Promise.all([
        host.readProcessStat(value),
        host.bootTimeSeconds(),
    ]);
    if (statLine === null || bootTime === null) {
        return null;
    }

    const ticks = parseStartTicks(statLine);
    if (ticks === null) {
        return null;
    }
    return new Date((bootTime + ticks / host.clockTicksPerSecond()) * 1000);
}

export async function socketModifiedTime(host: AgentHost, path: string): Promise<Date | null> {
    if (!path) {
        return null;
    }
    const stat = await host.lstat(path);
    return stat ? new Date(stat.mtimeMs) : null;
}

/**
 * Managed agents are valid only before their expiration.
 * An unreadable expiration (null) is never valid.
 */
export function isManagedRecordValid(
    pidValid: boolean,
    socketValid: boolean,
    expiresAt: Date | null,
    nowMs: number
): boolean {
    return pidValid && socketValid && expiresAt !== null && nowMs < expiresAt.getTime();
}

/**
 * Foreign agents carry no expiration; there is nothing beyond pid and socket to check.
 */
export function isForeignRecordValid(pidValid: boolean, socketValid: boolean): boolean {
    return pidValid && socketValid;
}
