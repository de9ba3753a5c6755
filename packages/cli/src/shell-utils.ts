/**
 * Shell Utilities - lines meant for `eval "$(ssh-agent-manager ...)"`
 */

import type { AgentEndpoint } from '@ssh-agent-manager/core';

/**
 * Escape a string for safe use in shell commands.
 *
 * Wraps the string in single quotes and escapes embedded single quotes
 * as '\'' (end quote, escaped quote, start quote).
 *
 * @example
 * ```typescript
 * shellEscape("hello world")     // "'hello world'"
 * shellEscape("it's fine")       // "'it'\\''s fine'"
 * shellEscape("$(rm -rf /)")     // "'$(rm -rf /)'"
 * ```
 */
export function shellEscape(str: string): string {
    return "'" + str.replace(/'/g, "'\\''") + "'";
}

function assignment(name: string, value: string): string {
    return value ? `${name}=${shellEscape(value)}; export ${name};` : `unset ${name};`;
}

/**
 * Bourne shell lines pointing SSH_AUTH_SOCK and SSH_AGENT_PID at an agent.
 * A field the agent lacks unsets the variable instead.
 */
export function exportLines(agent: AgentEndpoint): string[] {
    return [
        assignment('SSH_AUTH_SOCK', agent.socketPath),
        assignment('SSH_AGENT_PID', agent.processId),
    ];
}

export function unsetLines(): string[] {
    return ['unset SSH_AUTH_SOCK;', 'unset SSH_AGENT_PID;'];
}
