/**
 * Identity matching: turns the fingerprints an agent holds into key file names.
 */

import { join } from 'path';
import type { AgentHost } from './host.js';
import type { AgentEndpoint, AgentTools } from './tools.js';

const PRIVATE_KEY_HEADER = /^-----BEGIN [A-Z0-9 ]*PRIVATE KEY-----/;

export interface IdentityMatch {
    /** One resolved key name, the raw fingerprints, or nothing */
    identities: string[];
    warnings: string[];
}

/**
 * Map fingerprint -> file name for every PEM private key in keyDir,
 * including symlinked keys. Entries that cannot be read or fingerprinted
 * are skipped; when two files
 * share a fingerprint the first in name order wins.
 */
export async function buildFingerprintMap(
    host: AgentHost,
    tools: AgentTools,
    keyDir: string
): Promise<Map<string, string>> {
    const map = new Map<string, string>();

    let entries: string[];
    try {
        entries = (await host.readdir(keyDir)).sort();
    } catch {
        return map;
    }

    for (const name of entries) {
        const path = join(keyDir, name);
        // Follows symlinks; directories and unreadable entries come back null
        const content = await host.readFile(path);
        if (content === null || !PRIVATE_KEY_HEADER.test(content)) continue;

        const result = await tools.fingerprintKey(path);
        if (result.success && !map.has(result.value)) {
            map.set(result.value, name);
        }
    }

    return map;
}

/**
 * Resolve the identities a live agent holds.
 *
 * Only the first fingerprint that resolves to a local key file is reported,
 * even when the agent holds several. If the agent holds fingerprints and none
 * resolve, the raw fingerprints are returned with a warning.
 */
export async function matchIdentities(
    host: AgentHost,
    tools: AgentTools,
    agent: AgentEndpoint,
    keyDir: string
): Promise<IdentityMatch> {
    const held = await tools.listFingerprints(agent);
    if (!held.success) {
        return {
            identities: [],
            warnings: [`Could not list identities of agent ${agent.processId || agent.socketPath}: ${held.error}`],
        };
    }
    if (held.value.length === 0) {
        return { identities: [], warnings: [] };
    }

    const fingerprints = await buildFingerprintMap(host, tools, keyDir);
    for (const fingerprint of held.value) {
        const name = fingerprints.get(fingerprint);
        if (name !== undefined) {
            return { identities: [name], warnings: [] };
        }
    }

    return {
        identities: [...held.value],
        warnings: [`No key file in ${keyDir} matches the fingerprints held by agent ${agent.processId || agent.socketPath}`],
    };
}
