/**
 * Host access for the agent engine.
 *
 * Every filesystem call, signal and /proc read the engine performs goes
 * through an AgentHost, so discovery is a function of its inputs and can be
 * exercised against an in-memory host in tests.
 */

import { promises as fs, constants as fsConstants, type Stats } from 'fs';
import { execFileSync } from 'child_process';

export type FileKind = 'file' | 'directory' | 'socket' | 'symlink' | 'other';

/**
 * The subset of lstat the engine cares about
 */
export interface FileStat {
    kind: FileKind;
    uid: number;
    mtimeMs: number;
}

export interface AgentHost {
    /** Entry names of a directory; throws if it cannot be listed */
    readdir(path: string): Promise<string[]>;

    /** lstat of a path, or null if it does not exist or cannot be stat'ed */
    lstat(path: string): Promise<FileStat | null>;

    /** File contents, or null if missing or unreadable */
    readFile(path: string): Promise<string | null>;

    writeFile(path: string, content: string, mode: number): Promise<void>;

    /** Create a single directory; rejects with code EEXIST if it exists */
    mkdir(path: string, mode: number): Promise<void>;

    /** Remove a file or a directory tree; missing paths are not an error */
    rm(path: string): Promise<void>;

    /** Remove an empty directory */
    rmdir(path: string): Promise<void>;

    /** Whether the path is accessible with read, write and execute permission */
    isAccessible(path: string): Promise<boolean>;

    /** Zero-signal probe: true if a signal could be delivered to pid */
    probeProcess(pid: number): boolean;

    /** Send a signal; throws with a code (ESRCH, EPERM) on failure */
    signal(pid: number, signal: NodeJS.Signals): void;

    /** Raw /proc/<pid>/stat line, or null */
    readProcessStat(pid: number): Promise<string | null>;

    /** System boot time in epoch seconds, or null */
    bootTimeSeconds(): Promise<number | null>;

    /** Kernel clock ticks per second (CLK_TCK) */
    clockTicksPerSecond(): number;
}

const DEFAULT_CLOCK_TICKS = 100;

function toFileKind(stats: Stats): FileKind {
    if (stats.isSocket()) return 'socket';
    if (stats.isDirectory()) return 'directory';
    if (stats.isSymbolicLink()) return 'symlink';
    if (stats.isFile()) return 'file';
    return 'other';
}

async function readOrNull(path: string): Promise<string | null> {
    try {
        return await fs.readFile(path, 'utf-8');
    } catch {
        return null;
    }
}

/**
 * Production host backed by fs/promises, process.kill and /proc
 */
export function createNodeHost(): AgentHost {
    let clockTicks: number | undefined;

    return {
        readdir: (path) => fs.readdir(path),

        async lstat(path) {
            try {
                const stats = await fs.lstat(path);
                return { kind: toFileKind(stats), uid: stats.uid, mtimeMs: stats.mtimeMs };
            } catch {
                return null;
            }
        },

        readFile: readOrNull,

        async writeFile(path, content, mode) {
            await fs.writeFile(path, content, { mode });
            // writeFile's mode is filtered through the umask
            await fs.chmod(path, mode);
        },

        async mkdir(path, mode) {
            await fs.mkdir(path, { mode });
            await fs.chmod(path, mode);
        },

        rm: (path) => fs.rm(path, { recursive: true, force: true }),

        rmdir: (path) => fs.rmdir(path),

        async isAccessible(path) {
            try {
                await fs.access(path, fsConstants.R_OK | fsConstants.W_OK | fsConstants.X_OK);
                return true;
            } catch {
                return false;
            }
        },

        probeProcess(pid) {
            try {
                process.kill(pid, 0);
                return true;
            } catch {
                return false;
            }
        },

        signal(pid, signal) {
            process.kill(pid, signal);
        },

        readProcessStat: (pid) => readOrNull(`/proc/${pid}/stat`),

        async bootTimeSeconds() {
            const stat = await readOrNull('/proc/stat');
            const match = stat?.match(/^btime\s+(\d+)$/m);
            return match ? parseInt(match[1], 10) : null;
        },

        clockTicksPerSecond() {
            if (clockTicks === undefined) {
                try {
                    const output = execFileSync('getconf', ['CLK_TCK'], { encoding: 'utf-8' }).trim();
                    const parsed = parseInt(output, 10);
                    clockTicks = parsed > 0 ? parsed : DEFAULT_CLOCK_TICKS;
                } catch {
                    clockTicks = DEFAULT_CLOCK_TICKS;
                }
            }
            return clockTicks;
        },
    };
}
