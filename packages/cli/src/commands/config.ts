import chalk from 'chalk';
import { getUserConfigPath, loadConfig, type ConfigSource } from '../config.js';
import { flagsFrom, type GlobalOptions } from './context.js';
import { warn } from '../output.js';

const SOURCE_LABELS: Record<ConfigSource, string> = {
    'default': chalk.dim('(default)'),
    'user': chalk.green('(user)'),
    'env': chalk.cyan('(env)'),
    'flag': chalk.magenta('(flag)'),
};

interface ConfigOptions {
    json?: boolean;
}

/**
 * Show the effective configuration and where each value came from
 */
export function configCommand(options: ConfigOptions, global: GlobalOptions): void {
    const { config, warnings } = loadConfig(flagsFrom(global));
    for (const warning of warnings) {
        warn(warning);
    }

    if (options.json) {
        console.log(JSON.stringify(config, null, 2));
        return;
    }

    console.error(chalk.bold('Configuration'), chalk.dim(getUserConfigPath()));
    console.error(`  keyDir: ${config.keyDir.value} ${SOURCE_LABELS[config.keyDir.source]}`);
    console.error(`  tmpDir: ${config.tmpDir.value} ${SOURCE_LABELS[config.tmpDir.source]}`);
    console.error(`  lifetimeSeconds: ${config.lifetimeSeconds.value} ${SOURCE_LABELS[config.lifetimeSeconds.source]}`);
}
