/**
 * @ssh-agent-manager/core
 *
 * Discovery, validation and reconciliation engine for ssh-agent processes.
 *
 * @example Basic usage:
 * ```typescript
 * import { createNodeHost, createOpenSshTools, discover } from '@ssh-agent-manager/core';
 *
 * const registry = await discover({
 *   uid: process.getuid?.() ?? 0,
 *   tmpDir: '/tmp',
 *   keyDir: `${process.env.HOME}/.ssh`,
 *   lifetimeSeconds: 14400,
 *   env: { SSH_AGENT_PID: process.env.SSH_AGENT_PID, SSH_AUTH_SOCK: process.env.SSH_AUTH_SOCK },
 *   now: Date.now,
 *   host: createNodeHost(),
 *   tools: createOpenSshTools(),
 * });
 * ```
 */

export * from './agents/index.js';
