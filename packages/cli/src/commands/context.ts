import { validateContext, type AgentContext } from '@ssh-agent-manager/core';
import { createContext, expandPath, loadConfig, stripSources, type Config } from '../config.js';
import { warn } from '../output.js';

/** Options registered on the root program */
export type GlobalOptions = {
    keyDir?: string;
    tmpDir?: string;
};

export function flagsFrom(global: GlobalOptions): Partial<Config> {
    const flags: Partial<Config> = {};
    if (global.keyDir) flags.keyDir = expandPath(global.keyDir);
    if (global.tmpDir) flags.tmpDir = expandPath(global.tmpDir);
    return flags;
}

/**
 * Resolve configuration and check both directories before any agent work
 *
 * @throws {ConfigurationError} If a directory is missing or not usable
 */
export async function openContext(global: GlobalOptions, overrides: Partial<Config> = {}): Promise<AgentContext> {
    const { config, warnings } = loadConfig({ ...flagsFrom(global), ...overrides });
    for (const warning of warnings) {
        warn(warning);
    }

    const context = createContext(stripSources(config));
    await validateContext(context);
    return context;
}
