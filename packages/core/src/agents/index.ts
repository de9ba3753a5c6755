/**
 * Agent Registry Module
 *
 * Discovers, validates and reconciles ssh-agent processes.
 */

// Types
export type {
    PidSocketFlags,
    ManagedAgentRecord,
    ForeignAgentRecord,
    AgentRecord,
    AgentRegistry,
    AgentEnvironment,
    AgentContext,
    AgentSelector,
    StartResult,
} from './types.js';

// Registry
export {
    MAX_ALLOCATION_ATTEMPTS,
    validateContext,
    discover,
    holdsExactly,
    findReusableAgent,
    start,
    stop,
    selectAgent,
} from './registry.js';

// Store
export {
    PID_FILE,
    SOCKET_FILE,
    EXPIRATION_FILE,
    DIRECTORY_MODE,
    STATE_FILE_MODE,
    parseExpiration,
    formatExpiration,
    loadManagedAgent,
    scanManagedAgents,
} from './store.js';

export { resolveForeignAgent } from './foreign.js';

export { buildFingerprintMap, matchIdentities } from './identity.js';
export type { IdentityMatch } from './identity.js';

export {
    parsePid,
    isPidValid,
    isSocketValid,
    parseStartTicks,
    processStartTime,
    socketModifiedTime,
    isManagedRecordValid,
    isForeignRecordValid,
} from './liveness.js';

export {
    SENTINEL_SPECIFIER,
    FOREIGN_SPECIFIER_SUFFIX,
    MANAGED_DIRECTORY_PREFIX,
    allocateSpecifier,
    parseSpecifier,
    foreignSpecifier,
    isForeignSpecifier,
    managedDirectoryName,
    isManagedDirectoryName,
} from './specifier.js';

// Errors
export {
    AgentManagerError,
    AgentNotFoundError,
    AgentStartError,
    IdentityAddError,
    AgentStopError,
    ConfigurationError,
} from './errors.js';
export type { AgentErrorKind } from './errors.js';

// Collaborators
export { createNodeHost } from './host.js';
export type { AgentHost, FileStat, FileKind } from './host.js';

export {
    createOpenSshTools,
    parseAgentPid,
    parseFingerprintLine,
    parseFingerprintList,
    agentEnvironment,
} from './tools.js';
export type { AgentTools, AgentEndpoint, ToolResult, OpenSshToolsOptions } from './tools.js';
