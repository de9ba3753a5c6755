/**
 * Error types raised by the agent engine.
 *
 * Validation-level problems (missing files, failed probes) never surface as
 * errors; they degrade to empty or invalid fields on a record. These classes
 * cover the failures that end the current command.
 */

import type { AgentRecord, AgentSelector } from './types.js';

export type AgentErrorKind =
    | 'NotFound'
    | 'StartFailure'
    | 'IdentityAddFailure'
    | 'StopFailure'
    | 'ConfigurationError';

export class AgentManagerError extends Error {
    public readonly kind: AgentErrorKind;
    /** Diagnostic text from a collaborator, if any */
    public readonly detail: string;

    constructor(kind: AgentErrorKind, message: string, detail = '') {
        super(message);
        this.name = 'AgentManagerError';
        this.kind = kind;
        this.detail = detail;
    }

    /**
     * Multi-line description including collaborator output
     */
    toDetailedString(): string {
        const lines = [`${this.name}: ${this.message}`, `Kind: ${this.kind}`];
        if (this.detail.trim()) {
            lines.push(`Detail: ${this.detail.trim()}`);
        }
        return lines.join('\n');
    }
}

function describeSelector(selector: AgentSelector, ambiguous: boolean): string {
    switch (selector.kind) {
        case 'specifier':
            return `No agent with specifier ${selector.specifier}`;
        case 'identity':
            return ambiguous
                ? `More than one valid agent holds identity ${selector.identity} (exclusivity violated)`
                : `No valid agent holds identity ${selector.identity}`;
        case 'default':
            return ambiguous
                ? 'More than one agent found; select one with --specifier or --identity'
                : 'No agents found';
    }
}

/**
 * No record matches a selector, or an identity match is not exclusive
 */
export class AgentNotFoundError extends AgentManagerError {
    public readonly selector: AgentSelector;
    public readonly ambiguous: boolean;

    constructor(selector: AgentSelector, ambiguous = false) {
        super('NotFound', describeSelector(selector, ambiguous));
        this.name = 'AgentNotFoundError';
        this.selector = selector;
        this.ambiguous = ambiguous;
    }
}

/**
 * The agent process could not be spawned, or printed no usable pid
 */
export class AgentStartError extends AgentManagerError {
    constructor(message: string, detail = '') {
        super('StartFailure', message, detail);
        this.name = 'AgentStartError';
    }
}

/**
 * The agent was started but the identity could not be added.
 * The agent keeps running; the started record is attached.
 */
export class IdentityAddError extends AgentManagerError {
    public readonly identity: string;
    public readonly record: AgentRecord;

    constructor(identity: string, record: AgentRecord, detail = '') {
        super('IdentityAddFailure', `Agent ${record.specifier} started but identity ${identity} could not be added`, detail);
        this.name = 'IdentityAddError';
        this.identity = identity;
        this.record = record;
    }
}

export class AgentStopError extends AgentManagerError {
    constructor(message: string, detail = '') {
        super('StopFailure', message, detail);
        this.name = 'AgentStopError';
    }
}

/**
 * A configured directory is missing or not accessible
 */
export class ConfigurationError extends AgentManagerError {
    public readonly path: string;

    constructor(setting: string, path: string) {
        super('ConfigurationError', `${setting} ${path} does not exist or is not readable, writable and searchable`);
        this.name = 'ConfigurationError';
        this.path = path;
    }
}
