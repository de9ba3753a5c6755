/**
 * In-memory AgentHost and AgentTools for tests.
 */

import { dirname, basename } from 'path';
import type { AgentHost, FileKind, FileStat } from '../agents/host.js';
import type { AgentEndpoint, AgentTools, ToolResult } from '../agents/tools.js';
import type { AgentContext, AgentEnvironment } from '../agents/types.js';

export const TEST_UID = 1000;
export const OTHER_UID = 2000;
export const BOOT_TIME_SECONDS = 1_700_000_000;
export const CLOCK_TICKS = 100;
export const TMP_DIR = '/tmp';
export const KEY_DIR = '/home/test/.ssh';
/** 2024-04-05T19:34:38.123Z */
export const NOW_MS = 1_712_345_678_123;

interface FakeNode {
    kind: FileKind;
    uid: number;
    mode: number;
    mtimeMs: number;
    content: string;
    /** Path a symlink points at */
    target?: string;
}

interface FakeProcess {
    alive: boolean;
    startTicks: number;
    /** Socket the process removes when it receives SIGHUP */
    socketPath?: string;
}

function codedError(code: string, message: string): Error & { code: string } {
    return Object.assign(new Error(`${code}: ${message}`), { code });
}

export class FakeHost implements AgentHost {
    readonly nodes = new Map<string, FakeNode>();
    readonly processes = new Map<number, FakeProcess>();
    readonly signals: Array<{ pid: number; signal: NodeJS.Signals }> = [];
    /** Pids that reject signals with EPERM */
    readonly foreignPids = new Set<number>();
    /** Paths whose removal fails */
    readonly undeletable = new Set<string>();
    /** Paths whose writes fail */
    readonly unwritable = new Set<string>();

    constructor(public uid: number = TEST_UID) {}

    addDirectory(path: string, options: { uid?: number; mode?: number } = {}): this {
        this.nodes.set(path, {
            kind: 'directory',
            uid: options.uid ?? this.uid,
            mode: options.mode ?? 0o700,
            mtimeMs: 0,
            content: '',
        });
        return this;
    }

    addFile(path: string, content: string, options: { uid?: number; mode?: number } = {}): this {
        this.nodes.set(path, {
            kind: 'file',
            uid: options.uid ?? this.uid,
            mode: options.mode ?? 0o600,
            mtimeMs: 0,
            content,
        });
        return this;
    }

    addSocket(path: string, options: { uid?: number; mtimeMs?: number } = {}): this {
        this.nodes.set(path, {
            kind: 'socket',
            uid: options.uid ?? this.uid,
            mode: 0o600,
            mtimeMs: options.mtimeMs ?? 0,
            content: '',
        });
        return this;
    }

    addSymlink(path: string, options: { uid?: number; target?: string } = {}): this {
        this.nodes.set(path, {
            kind: 'symlink',
            uid: options.uid ?? this.uid,
            mode: 0o777,
            mtimeMs: 0,
            content: '',
            target: options.target,
        });
        return this;
    }

    addProcess(pid: number, options: { startTicks?: number; socketPath?: string } = {}): this {
        this.processes.set(pid, {
            alive: true,
            startTicks: options.startTicks ?? 0,
            socketPath: options.socketPath,
        });
        return this;
    }

    has(path: string): boolean {
        return this.nodes.has(path);
    }

    content(path: string): string | undefined {
        return this.nodes.get(path)?.content;
    }

    modeOf(path: string): number | undefined {
        return this.nodes.get(path)?.mode;
    }

    async readdir(path: string): Promise<string[]> {
        const node = this.nodes.get(path);
        if (node?.kind !== 'directory') {
            throw codedError('ENOENT', path);
        }
        return [...this.nodes.keys()]
            .filter(p => p !== path && dirname(p) === path)
            .map(p => basename(p));
    }

    async lstat(path: string): Promise<FileStat | null> {
        const node = this.nodes.get(path);
        return node ? { kind: node.kind, uid: node.uid, mtimeMs: node.mtimeMs } : null;
    }

    /** Follows symlinks, like fs.readFile */
    async readFile(path: string): Promise<string | null> {
        let node = this.nodes.get(path);
        for (let hops = 0; node?.kind === 'symlink' && hops < 8; hops++) {
            node = node.target === undefined ? undefined : this.nodes.get(node.target);
        }
        return node?.kind === 'file' ? node.content : null;
    }

    async writeFile(path: string, content: string, mode: number): Promise<void> {
        if (this.unwritable.has(path)) {
            throw codedError('ENOSPC', path);
        }
        this.addFile(path, content, { mode });
    }

    async mkdir(path: string, mode: number): Promise<void> {
        if (this.nodes.has(path)) {
            throw codedError('EEXIST', path);
        }
        this.addDirectory(path, { mode });
    }

    async rm(path: string): Promise<void> {
        if (this.undeletable.has(path)) {
            throw codedError('EACCES', path);
        }
        for (const key of [...this.nodes.keys()]) {
            if (key === path || key.startsWith(`${path}/`)) {
                this.nodes.delete(key);
            }
        }
    }

    async rmdir(path: string): Promise<void> {
        if ((await this.readdir(path)).length > 0) {
            throw codedError('ENOTEMPTY', path);
        }
        this.nodes.delete(path);
    }

    async isAccessible(path: string): Promise<boolean> {
        const node = this.nodes.get(path);
        return node?.kind === 'directory' && node.uid === this.uid;
    }

    probeProcess(pid: number): boolean {
        return this.processes.get(pid)?.alive === true && !this.foreignPids.has(pid);
    }

    signal(pid: number, signal: NodeJS.Signals): void {
        if (this.foreignPids.has(pid)) {
            throw codedError('EPERM', `kill ${pid}`);
        }
        const proc = this.processes.get(pid);
        if (!proc?.alive) {
            throw codedError('ESRCH', `kill ${pid}`);
        }
        this.signals.push({ pid, signal });
        if (signal === 'SIGHUP') {
            proc.alive = false;
            if (proc.socketPath) {
                this.nodes.delete(proc.socketPath);
            }
        }
    }

    async readProcessStat(pid: number): Promise<string | null> {
        const proc = this.processes.get(pid);
        if (!proc?.alive) {
            return null;
        }
        const fields = ['S', ...Array.from({ length: 18 }, () => '0'), String(proc.startTicks), '0'];
        return `${pid} (ssh-agent) ${fields.join(' ')}`;
    }

    async bootTimeSeconds(): Promise<number | null> {
        return BOOT_TIME_SECONDS;
    }

    clockTicksPerSecond(): number {
        return CLOCK_TICKS;
    }
}

/**
 * AgentTools fake that "spawns" agents into a FakeHost
 */
export class FakeTools implements AgentTools {
    /** Fingerprints held per socket path */
    readonly held = new Map<string, string[]>();
    /** Fingerprint per key file path */
    readonly keyFingerprints = new Map<string, string>();
    readonly spawned: Array<{ socketPath: string; lifetimeSeconds: number; pid: string }> = [];
    readonly added: Array<{ agent: AgentEndpoint; keyPath: string }> = [];
    readonly fingerprinted: string[] = [];

    spawnError: string | null = null;
    addError: string | null = null;
    listError: string | null = null;
    /** Spawned agents exit before creating their socket */
    spawnWithoutSocket = false;
    nextPid = 4000;

    constructor(private readonly host: FakeHost) {}

    async spawnAgent(socketPath: string, lifetimeSeconds: number): Promise<ToolResult<string>> {
        if (this.spawnError !== null) {
            return { success: false, error: this.spawnError };
        }
        const pid = this.nextPid++;
        if (!this.spawnWithoutSocket) {
            this.host.addSocket(socketPath);
            this.host.addProcess(pid, { socketPath });
        }
        this.spawned.push({ socketPath, lifetimeSeconds, pid: String(pid) });
        return { success: true, value: String(pid) };
    }

    async addIdentity(agent: AgentEndpoint, keyPath: string): Promise<ToolResult<null>> {
        this.added.push({ agent, keyPath });
        if (this.addError !== null) {
            return { success: false, error: this.addError };
        }
        const fingerprint = this.keyFingerprints.get(keyPath);
        if (fingerprint) {
            this.held.set(agent.socketPath, [...(this.held.get(agent.socketPath) ?? []), fingerprint]);
        }
        return { success: true, value: null };
    }

    async fingerprintKey(keyPath: string): Promise<ToolResult<string>> {
        this.fingerprinted.push(keyPath);
        const fingerprint = this.keyFingerprints.get(keyPath);
        return fingerprint
            ? { success: true, value: fingerprint }
            : { success: false, error: `${keyPath} is not a key` };
    }

    async listFingerprints(agent: AgentEndpoint): Promise<ToolResult<string[]>> {
        if (this.listError !== null) {
            return { success: false, error: this.listError };
        }
        return { success: true, value: [...(this.held.get(agent.socketPath) ?? [])] };
    }
}

export interface FakeSetup {
    host: FakeHost;
    tools: FakeTools;
    context: AgentContext;
    /** Move the context clock */
    setNow(epochMs: number): void;
}

/**
 * A context over an empty temp root and key directory
 */
export function createFakeSetup(env: AgentEnvironment = {}): FakeSetup {
    const host = new FakeHost().addDirectory(TMP_DIR).addDirectory(KEY_DIR);
    const tools = new FakeTools(host);
    let now = NOW_MS;

    return {
        host,
        tools,
        context: {
            uid: TEST_UID,
            tmpDir: TMP_DIR,
            keyDir: KEY_DIR,
            lifetimeSeconds: 3600,
            env,
            now: () => now,
            host,
            tools,
        },
        setNow(epochMs) {
            now = epochMs;
        },
    };
}

export interface ManagedAgentFixture {
    /** Pid written to agent.pid; omit for no pidfile */
    pid?: number;
    /** Whether the pid is a live process (default true) */
    alive?: boolean;
    /** Whether agent.sock exists (default true) */
    socket?: boolean;
    socketUid?: number;
    /** Expiration in epoch ms; null writes an unparsable marker, omit for no marker */
    expiresAt?: number | null;
    directoryUid?: number;
}

/**
 * Lay out an ssh-agent-<specifier> directory under TMP_DIR
 * @returns the directory path
 */
export function addManagedAgent(host: FakeHost, specifier: string, fixture: ManagedAgentFixture = {}): string {
    const directory = `${TMP_DIR}/ssh-agent-${specifier}`;
    const socketPath = `${directory}/agent.sock`;
    host.addDirectory(directory, { uid: fixture.directoryUid });

    if (fixture.pid !== undefined) {
        host.addFile(`${directory}/agent.pid`, `${fixture.pid}\n`);
        if (fixture.alive ?? true) {
            host.addProcess(fixture.pid, { socketPath });
        }
    }
    if (fixture.socket ?? true) {
        host.addSocket(socketPath, { uid: fixture.socketUid });
    }
    if (fixture.expiresAt !== undefined) {
        const marker = fixture.expiresAt === null ? 'garbage' : (fixture.expiresAt / 1000).toFixed(3);
        host.addFile(`${directory}/agent.expiration`, `${marker}\n`);
    }
    return directory;
}
