/**
 * CLI `encdetect config` command
 *
 * Displays environment variable configuration and validation status.
 */

import type { Command } from 'commander';
import { ENV_CATEGORIES, getEnvSummary, validateEnv, type EnvCategory } from '../../config/env-schema.js';

function isEnvCategory(value: string): value is EnvCategory {
  return (ENV_CATEGORIES as readonly string[]).includes(value);
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Show environment variable configuration and validation');

  config
    .command('show')
    .description('Show all environment variables and their values')
    .option('--category <cat>', `Filter by category (${ENV_CATEGORIES.join(', ')})`)
    .action((opts: { category?: string }) => {
      let category: EnvCategory | undefined;
      if (opts.category !== undefined) {
        if (!isEnvCategory(opts.category)) {
          console.error(`Unknown category: ${opts.category}`);
          console.error(`Valid categories: ${ENV_CATEGORIES.join(', ')}`);
          process.exitCode = 1;
          return;
        }
        category = opts.category;
      }

      console.log('\n' + getEnvSummary(process.env, category) + '\n');
    });

  config
    .command('validate')
    .description('Validate current environment configuration')
    .action(() => {
      const result = validateEnv();

      if (result.valid) {
        console.log('\nEnvironment configuration is valid.\n');
        return;
      }

      console.log('\nWarnings:');
      for (const warn of result.warnings) {
        console.log(`  ? ${warn}`);
      }
      console.log('');
      process.exitCode = 1;
    });
}
