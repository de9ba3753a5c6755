import type { AgentSelector } from '@ssh-agent-manager/core';
import { validateMutualExclusion, validateSpecifier } from '../validation.js';

export interface SelectorOptions {
    specifier?: string;
    identity?: string;
}

/**
 * Turn --specifier / --identity into a registry selector, exiting on misuse
 */
export function selectorFromOptions(options: SelectorOptions): AgentSelector {
    validateMutualExclusion(['--specifier', '--identity'], [options.specifier, options.identity]);
    validateSpecifier(options.specifier, '--specifier');

    if (options.specifier) {
        return { kind: 'specifier', specifier: options.specifier };
    }
    if (options.identity) {
        return { kind: 'identity', identity: options.identity };
    }
    return { kind: 'default' };
}
