#!/usr/bin/env node
/**
 * @file NetInstall Groups CLI
 *
 * Runs one load attempt for a netinstall module configuration and prints
 * the groups it produced, or why it failed.
 *
 * Usage:
 *   npx tsx src/cli/netinstall-groups.ts netinstall.conf
 *   npx tsx src/cli/netinstall-groups.ts netinstall.conf --locale de --timeout 5000
 *
 * Exits 1 when the configuration cannot be read, or when loading failed
 * and the configuration marks the step `required`.
 *
 * @module
 */

import fs from 'fs';
import yaml from 'js-yaml';
import chalk from 'chalk';
import { SettingsService } from '../config/settings.js';
import { ConsoleLogger } from '../logging/logger.js';
import { GroupListModel, MemoryStorage } from '../netinstall/collaborators.js';
import { HttpTransport } from '../netinstall/fetch/HttpTransport.js';
import { NetInstallConfig } from '../netinstall/NetInstallConfig.js';
import type { NetInstallEvent } from '../netinstall/types.js';

interface CliOptions {
    configPath: string | null;
    locale: string;
    timeout: string | null;
}

function args_parse(args: string[]): CliOptions {
    const options: CliOptions = { configPath: null, locale: 'en', timeout: null };
    for (let i = 0; i < args.length; i++) {
        if (args[i] === '--locale' && args[i + 1]) {
            options.locale = args[++i];
        } else if (args[i] === '--timeout' && args[i + 1]) {
            options.timeout = args[++i];
        } else if (!args[i].startsWith('--')) {
            options.configPath = args[i];
        }
    }
    return options;
}

function main(): void {
    const options: CliOptions = args_parse(process.argv.slice(2));
    if (!options.configPath) {
        console.error('Usage: netinstall-groups <config.yaml> [--locale <code>] [--timeout <ms>]');
        process.exit(1);
    }

    const settings = new SettingsService();
    if (options.timeout !== null) {
        const result = settings.set('timeout_ms', options.timeout);
        if (!result.ok) {
            console.error(result.error);
            process.exit(1);
        }
    }

    const configMap: unknown = yaml.load(fs.readFileSync(options.configPath, 'utf-8'));
    const model = new GroupListModel();
    const logger = new ConsoleLogger('netinstall', settings.logLevel_resolve());
    const loader = new NetInstallConfig({
        model,
        storage: new MemoryStorage(),
        transport: new HttpTransport(logger.child('transport')),
        fetchOptions: settings.fetchOptions_resolve(),
        logger,
        locale: options.locale,
    });

    loader.subscribe((event: NetInstallEvent): void => {
        switch (event.type) {
            case 'status_changed':
                if (loader.failed_is()) {
                    console.log(chalk.red(event.description));
                    if (loader.required_is()) process.exitCode = 1;
                }
                break;
            case 'status_ready':
                console.log(chalk.bold(`${loader.titleLabel_get() || loader.sidebarLabel_get()}: ${model.rowCount()} group(s)`));
                for (const name of model.names_list()) {
                    console.log(`  ${chalk.cyan('●')} ${name}`);
                }
                break;
            default:
                break;
        }
    });

    loader.configure(configMap);
    if (loader.sources_get().length === 0) {
        console.log(chalk.yellow('No groupsUrl configured; nothing to load.'));
    }
}

try {
    main();
} catch (e: unknown) {
    console.error(`Fatal error: ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
}
