import { readFileSync, existsSync } from 'fs';
import { homedir, tmpdir } from 'os';
import { join, resolve } from 'path';
import {
    createNodeHost,
    createOpenSshTools,
    type AgentContext,
    type AgentEnvironment,
} from '@ssh-agent-manager/core';

// User config (personal overrides)
const USER_CONFIG_DIR = join(homedir(), '.config', 'ssh-agent-manager');
const USER_CONFIG_FILE = join(USER_CONFIG_DIR, 'config.json');

/** Environment variables that override the config file */
export const KEY_DIR_ENV = 'SSH_AGENT_MANAGER_KEY_DIR';
export const TMP_DIR_ENV = 'SSH_AGENT_MANAGER_TMP_DIR';

/** Four hours, the lifetime given to agents when nothing else is configured */
export const DEFAULT_LIFETIME_SECONDS = 14_400;

export interface Config {
    /** Directory holding private key files */
    keyDir: string;
    /** Root under which ssh-agent-<specifier> directories are created */
    tmpDir: string;
    /** Lifetime passed to ssh-agent -t for new agents */
    lifetimeSeconds: number;
}

export type ConfigSource = 'default' | 'user' | 'env' | 'flag';

export interface ConfigValueWithSource<T> {
    value: T;
    source: ConfigSource;
}

export type ConfigWithSources = {
    [K in keyof Config]: ConfigValueWithSource<Config[K]>;
};

export interface LoadedUserConfig {
    config: Partial<Config>;
    /** Problems found while reading the file; the affected settings fall back */
    warnings: string[];
}

export function defaultConfig(home: string = homedir()): Config {
    return {
        keyDir: join(home, '.ssh'),
        tmpDir: tmpdir(),
        lifetimeSeconds: DEFAULT_LIFETIME_SECONDS,
    };
}

export function getUserConfigPath(): string {
    return USER_CONFIG_FILE;
}

/**
 * Check if a value is a plain object (not null, not an array)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Expand a leading ~ and make the path absolute
 */
export function expandPath(path: string, home: string = homedir()): string {
    if (path === '~') {
        return home;
    }
    if (path.startsWith('~/')) {
        return join(home, path.slice(2));
    }
    return resolve(path);
}

/**
 * Validate the contents of a user config file. Unknown keys are ignored,
 * known keys with the wrong type are dropped with a warning.
 */
export function parseUserConfig(data: string, source: string, home: string = homedir()): LoadedUserConfig {
    let parsed: unknown;
    try {
        parsed = JSON.parse(data);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return { config: {}, warnings: [`Ignoring ${source}: ${message}`] };
    }

    if (!isPlainObject(parsed)) {
        return { config: {}, warnings: [`Ignoring ${source}: expected a JSON object`] };
    }

    const config: Partial<Config> = {};
    const warnings: string[] = [];

    for (const key of ['keyDir', 'tmpDir'] as const) {
        const value = parsed[key];
        if (value === undefined) continue;
        if (typeof value === 'string' && value.trim() !== '') {
            config[key] = expandPath(value, home);
        } else {
            warnings.push(`Ignoring ${key} in ${source}: expected a path`);
        }
    }

    const lifetime = parsed.lifetimeSeconds;
    if (lifetime !== undefined) {
        if (typeof lifetime === 'number' && Number.isInteger(lifetime) && lifetime > 0) {
            config.lifetimeSeconds = lifetime;
        } else {
            warnings.push(`Ignoring lifetimeSeconds in ${source}: expected a positive integer`);
        }
    }

    return { config, warnings };
}

/**
 * Load user config from ~/.config/ssh-agent-manager/config.json
 */
export function loadUserConfig(path: string = USER_CONFIG_FILE): LoadedUserConfig {
    if (!existsSync(path)) {
        return { config: {}, warnings: [] };
    }
    try {
        return parseUserConfig(readFileSync(path, 'utf-8'), path);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return { config: {}, warnings: [`Could not read ${path}: ${message}`] };
    }
}

/**
 * Directory overrides from SSH_AGENT_MANAGER_* variables. Empty values are ignored.
 */
export function configFromEnv(env: NodeJS.ProcessEnv, home: string = homedir()): Partial<Config> {
    const config: Partial<Config> = {};
    const keyDir = env[KEY_DIR_ENV];
    const tmpDir = env[TMP_DIR_ENV];
    if (keyDir) {
        config.keyDir = expandPath(keyDir, home);
    }
    if (tmpDir) {
        config.tmpDir = expandPath(tmpDir, home);
    }
    return config;
}

export interface ConfigLayers {
    defaults: Config;
    user?: Partial<Config>;
    env?: Partial<Config>;
    flags?: Partial<Config>;
}

/**
 * Merge config layers: defaults → user → env → flags, keeping track of
 * which layer each value came from
 */
export function resolveConfigWithSources(layers: ConfigLayers): ConfigWithSources {
    const ordered: Array<[ConfigSource, Partial<Config> | undefined]> = [
        ['user', layers.user],
        ['env', layers.env],
        ['flag', layers.flags],
    ];

    function pick<K extends keyof Config>(key: K): ConfigValueWithSource<Config[K]> {
        let result: ConfigValueWithSource<Config[K]> = { value: layers.defaults[key], source: 'default' };
        for (const [source, layer] of ordered) {
            const value = layer?.[key];
            if (value !== undefined) {
                result = { value, source };
            }
        }
        return result;
    }

    return {
        keyDir: pick('keyDir'),
        tmpDir: pick('tmpDir'),
        lifetimeSeconds: pick('lifetimeSeconds'),
    };
}

export function stripSources(config: ConfigWithSources): Config {
    return {
        keyDir: config.keyDir.value,
        tmpDir: config.tmpDir.value,
        lifetimeSeconds: config.lifetimeSeconds.value,
    };
}

/**
 * Load the effective configuration for this process
 */
export function loadConfig(flags: Partial<Config> = {}): { config: ConfigWithSources; warnings: string[] } {
    const user = loadUserConfig();
    const config = resolveConfigWithSources({
        defaults: defaultConfig(),
        user: user.config,
        env: configFromEnv(process.env),
        flags,
    });
    return { config, warnings: user.warnings };
}

/**
 * Effective user id of this process
 */
export function currentUid(): number {
    const uid = process.geteuid?.() ?? process.getuid?.();
    if (uid === undefined) {
        throw new Error('Cannot determine the user id on this platform');
    }
    return uid;
}

/**
 * The agent variables of an environment, with empty values treated as unset
 */
export function agentEnvironmentOf(env: NodeJS.ProcessEnv): AgentEnvironment {
    const snapshot: AgentEnvironment = {};
    if (env.SSH_AGENT_PID) {
        snapshot.SSH_AGENT_PID = env.SSH_AGENT_PID;
    }
    if (env.SSH_AUTH_SOCK) {
        snapshot.SSH_AUTH_SOCK = env.SSH_AUTH_SOCK;
    }
    return snapshot;
}

/**
 * Context for the agent engine running against the real system
 */
export function createContext(config: Config): AgentContext {
    return {
        uid: currentUid(),
        tmpDir: config.tmpDir,
        keyDir: config.keyDir,
        lifetimeSeconds: config.lifetimeSeconds,
        env: agentEnvironmentOf(process.env),
        now: () => Date.now(),
        host: createNodeHost(),
        tools: createOpenSshTools(),
    };
}
