/**
 * External tool collaborators: the OpenSSH executables the engine drives.
 *
 * Each operation returns a structured ToolResult instead of exit codes and
 * byte streams. The output parsers are exported for testing.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export type ToolResult<T> =
    | { success: true; value: T }
    | { success: false; error: string };

/**
 * Where a running agent can be reached
 */
export interface AgentEndpoint {
    processId: string;
    socketPath: string;
}

export interface AgentTools {
    /** Start an agent bound to socketPath; resolves to its pid */
    spawnAgent(socketPath: string, lifetimeSeconds: number): Promise<ToolResult<string>>;

    /** Add the private key at keyPath to the agent */
    addIdentity(agent: AgentEndpoint, keyPath: string): Promise<ToolResult<null>>;

    /** Fingerprint of the key at keyPath */
    fingerprintKey(keyPath: string): Promise<ToolResult<string>>;

    /** Fingerprints the agent currently holds; empty when it holds none */
    listFingerprints(agent: AgentEndpoint): Promise<ToolResult<string[]>>;
}

/**
 * Error shape from child_process.execFile
 */
interface ExecError extends Error {
    code?: number | string;
    stderr?: string;
    stdout?: string;
}

function toExecError(error: unknown): ExecError {
    return error instanceof Error ? error : new Error(String(error));
}

function describeFailure(error: ExecError): string {
    return (error.stderr ?? '').trim() || error.message;
}

// ssh-add exits 1 when the agent is reachable but holds no identities
const NO_IDENTITIES_EXIT_CODE = 1;

/**
 * Pid printed by `ssh-agent -s` (or a bare pid on its own line)
 */
export function parseAgentPid(output: string): string | null {
    const exported = output.match(/SSH_AGENT_PID=(\d+)/);
    if (exported) {
        return exported[1];
    }
    const bare = output.trim().match(/^(\d+)$/);
    return bare ? bare[1] : null;
}

/**
 * Fingerprint field of a `bits fingerprint comment (type)` line
 */
export function parseFingerprintLine(line: string): string | null {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 2 || !/^[A-Za-z0-9]+:\S+$/.test(fields[1])) {
        return null;
    }
    return fields[1];
}

export function parseFingerprintList(output: string): string[] {
    return output
        .split('\n')
        .map(parseFingerprintLine)
        .filter((fp): fp is string => fp !== null);
}

/**
 * Process environment pointing the ssh-add family at one agent
 */
export function agentEnvironment(
    agent: AgentEndpoint,
    base: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...base };
    delete env.SSH_AGENT_PID;
    delete env.SSH_AUTH_SOCK;
    if (agent.processId) {
        env.SSH_AGENT_PID = agent.processId;
    }
    if (agent.socketPath) {
        env.SSH_AUTH_SOCK = agent.socketPath;
    }
    return env;
}

export interface OpenSshToolsOptions {
    sshAgent?: string;
    sshAdd?: string;
    sshKeygen?: string;
}

/**
 * AgentTools backed by ssh-agent, ssh-add and ssh-keygen on PATH
 */
export function createOpenSshTools(options: OpenSshToolsOptions = {}): AgentTools {
    const sshAgent = options.sshAgent ?? 'ssh-agent';
    const sshAdd = options.sshAdd ?? 'ssh-add';
    const sshKeygen = options.sshKeygen ?? 'ssh-keygen';

    return {
        async spawnAgent(socketPath, lifetimeSeconds) {
            try {
                const { stdout } = await execFileAsync(
                    sshAgent,
                    ['-a', socketPath, '-t', String(lifetimeSeconds), '-s'],
                    { encoding: 'utf-8' }
                );
                const pid = parseAgentPid(stdout);
                return pid
                    ? { success: true, value: pid }
                    : { success: false, error: `${sshAgent} printed no process id` };
            } catch (error) {
                return { success: false, error: describeFailure(toExecError(error)) };
            }
        },

        async addIdentity(agent, keyPath) {
            try {
                await execFileAsync(sshAdd, [keyPath], { encoding: 'utf-8', env: agentEnvironment(agent) });
                return { success: true, value: null };
            } catch (error) {
                return { success: false, error: describeFailure(toExecError(error)) };
            }
        },

        async fingerprintKey(keyPath) {
            try {
                const { stdout } = await execFileAsync(
                    sshKeygen,
                    ['-l', '-E', 'sha256', '-f', keyPath],
                    { encoding: 'utf-8' }
                );
                const fingerprint = parseFingerprintLine(stdout.split('\n')[0] ?? '');
                return fingerprint
                    ? { success: true, value: fingerprint }
                    : { success: false, error: `Unrecognized ${sshKeygen} output for ${keyPath}` };
            } catch (error) {
                return { success: false, error: describeFailure(toExecError(error)) };
            }
        },

        async listFingerprints(agent) {
            try {
                const { stdout } = await execFileAsync(
                    sshAdd,
                    ['-l', '-E', 'sha256'],
                    { encoding: 'utf-8', env: agentEnvironment(agent) }
                );
                return { success: true, value: parseFingerprintList(stdout) };
            } catch (error) {
                const execError = toExecError(error);
                if (execError.code === NO_IDENTITIES_EXIT_CODE) {
                    return { success: true, value: [] };
                }
                return { success: false, error: describeFailure(execError) };
            }
        },
    };
}
