#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { applyCommand, type ApplyCommandOptions } from './commands/apply.js';
import { destroyCommand, type DestroyCommandOptions } from './commands/destroy.js';
import { outputCommand, type OutputCommandOptions } from './commands/output.js';
import { planCommand, type PlanCommandOptions } from './commands/plan.js';
import { collect, parseConcurrency } from './commands/shared.js';
import { stateCommand, type StateCommandOptions } from './commands/state.js';
import { validateCommand, type ValidateCommandOptions } from './commands/validate.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packagePath, 'utf-8')) as { version: string };

const VERBOSE_DESC = 'Print az commands before execution';

program
  .name('vmforge')
  .description('Declarative Azure VM provisioning with a planned, dependency-ordered apply')
  .version(packageJson.version)
  .option('--verbose', VERBOSE_DESC);

/**
 * Merge the global --verbose flag into command-level options.
 * Supports both positions:
 *   vmforge --verbose apply file    (parent parses --verbose)
 *   vmforge apply file --verbose    (subcommand parses --verbose)
 */
function withGlobalOpts<T extends { verbose?: boolean }>(opts: T): T {
  const globalOpts = program.opts<{ verbose?: boolean }>();
  return { ...opts, verbose: opts.verbose === true || globalOpts.verbose === true };
}

program
  .command('validate <file>')
  .description('Validate a declaration without contacting Azure')
  .option('--var-file <path>', 'Load variable values from a YAML or JSON file (repeatable)', collect, [])
  .option('--var <name=value>', 'Set a variable value (repeatable)', collect, [])
  .option('--json', 'Output as JSON')
  .action((file: string, opts: ValidateCommandOptions) => validateCommand(file, withGlobalOpts(opts)));

program
  .command('plan <file>')
  .description('Show the changes apply would make')
  .option('--var-file <path>', 'Load variable values from a YAML or JSON file (repeatable)', collect, [])
  .option('--var <name=value>', 'Set a variable value (repeatable)', collect, [])
  .option('--refresh', 'Read live resources before planning')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, opts: PlanCommandOptions) => planCommand(file, withGlobalOpts(opts)));

program
  .command('apply <file>')
  .description('Create, update and delete resources to match the declaration')
  .option('--var-file <path>', 'Load variable values from a YAML or JSON file (repeatable)', collect, [])
  .option('--var <name=value>', 'Set a variable value (repeatable)', collect, [])
  .option('--refresh', 'Read live resources before planning')
  .option('--concurrency <n>', 'Maximum operations in flight', parseConcurrency)
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, opts: ApplyCommandOptions) => applyCommand(file, withGlobalOpts(opts)));

program
  .command('destroy <file>')
  .description('Delete every resource recorded for the workspace')
  .option('--var-file <path>', 'Load variable values from a YAML or JSON file (repeatable)', collect, [])
  .option('--var <name=value>', 'Set a variable value (repeatable)', collect, [])
  .option('--yes', 'Confirm deletion')
  .option('--concurrency <n>', 'Maximum operations in flight', parseConcurrency)
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, opts: DestroyCommandOptions) => destroyCommand(file, withGlobalOpts(opts)));

program
  .command('output <file> [name]')
  .description('Print declared outputs from recorded state')
  .option('--var-file <path>', 'Load variable values from a YAML or JSON file (repeatable)', collect, [])
  .option('--var <name=value>', 'Set a variable value (repeatable)', collect, [])
  .option('--show-sensitive', 'Print sensitive values')
  .option('--json', 'Output as JSON')
  .action((file: string, name: string | undefined, opts: OutputCommandOptions) =>
    outputCommand(file, name, withGlobalOpts(opts))
  );

program
  .command('state <file>')
  .description('List resources recorded for the workspace')
  .option('--var-file <path>', 'Load variable values from a YAML or JSON file (repeatable)', collect, [])
  .option('--var <name=value>', 'Set a variable value (repeatable)', collect, [])
  .option('--json', 'Output as JSON')
  .action((file: string, opts: StateCommandOptions) => stateCommand(file, withGlobalOpts(opts)));

await program.parseAsync();
