/**
 * CLI Commands Registry
 *
 * Builds the root program and registers every command. Command modules load
 * lazily so `--help` never touches the database driver.
 *
 * @module packages/cli/commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createContext, type CommandContext, type GlobalOptions } from './context.js';
import {
  collect,
  findSimilarCommands,
  handleError,
  parseInteger,
  shouldUseColor,
  type ExitCode,
} from './utils.js';
import type { SyncCommandOptions } from './sync.js';
import type { TestCommandOptions } from './test.js';

/**
 * Run a command body, turning its result into the exit status and any
 * thrown error into a report on stderr
 */
async function runAction(
  command: Command,
  json: boolean | undefined,
  body: (context: CommandContext) => Promise<ExitCode>
): Promise<void> {
  try {
    const globals: GlobalOptions = command.optsWithGlobals();
    process.exitCode = await body(createContext(globals));
  } catch (error) {
    handleError(error, json);
  }
}

function registerSetupCommand(program: Command): void {
  program
    .command('setup')
    .description('Define the tracking tables and run database/setup.surql')
    .option('--json', 'Output result as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      await runAction(command, options.json, async (context) => {
        const { setupCommand } = await import('./setup.js');
        return setupCommand(options, context);
      });
    });
}

function registerMigrateCommand(program: Command): void {
  program
    .command('migrate')
    .description('Apply migration files not yet recorded in the ledger')
    .option('--dry-run', 'List migration files without applying them')
    .option('--fail-fast', 'Stop at the first failing file')
    .option('--json', 'Output result as JSON')
    .action(async (options: { dryRun?: boolean; failFast?: boolean; json?: boolean }, command: Command) => {
      await runAction(command, options.json, async (context) => {
        const { migrateCommand } = await import('./migrate.js');
        return migrateCommand(options, context);
      });
    });
}

function registerApplyCommand(program: Command): void {
  program
    .command('apply')
    .description('Run one schema file directly')
    .argument('<path>', 'File to execute')
    .option('--track', 'Record the file in the migration ledger')
    .option('--json', 'Output result as JSON')
    .action(async (file: string, options: { track?: boolean; json?: boolean }, command: Command) => {
      await runAction(command, options.json, async (context) => {
        const { applyCommand } = await import('./apply.js');
        return applyCommand(file, options, context);
      });
    });
}

function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('List applied migrations')
    .option('--json', 'Output result as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      await runAction(command, options.json, async (context) => {
        const { statusCommand } = await import('./status.js');
        return statusCommand(options, context);
      });
    });
}

function registerSeedCommand(program: Command): void {
  program
    .command('seed')
    .description('Execute database/seed.surql')
    .option('--json', 'Output result as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      await runAction(command, options.json, async (context) => {
        const { seedCommand } = await import('./seed.js');
        return seedCommand(options, context);
      });
    });
}

function registerSyncCommand(program: Command): void {
  program
    .command('sync')
    .description('Apply changed schema files and prune removed entities')
    .option('--watch', 'Repeat the sync until interrupted')
    .option('--debounce <ms>', 'Interval between watch passes', parseInteger)
    .option('--dry-run', 'Report what would change without executing')
    .option('--fail-fast', 'Stop at the first failing file')
    .option('--no-prune', 'Keep entities removed from the schema')
    .option('--allow-shared-prune', 'Prune even when the database is marked shared')
    .option('--json', 'Output result as JSON')
    .action(async (options: SyncCommandOptions, command: Command) => {
      await runAction(command, options.json, async (context) => {
        const { syncCommand } = await import('./sync.js');
        return syncCommand(options, context);
      });
    });
}

function registerDiffCommand(program: Command): void {
  program
    .command('diff')
    .description('Compare the schema directory with the last sync')
    .option('--json', 'Output diff as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      await runAction(command, options.json, async (context) => {
        const { diffCommand } = await import('./diff.js');
        return diffCommand(options, context);
      });
    });
}

function registerTestCommand(program: Command): void {
  program
    .command('test')
    .description('Run declarative test suites against isolated databases')
    .option('--suite <glob>', 'Only suites whose name or path matches')
    .option('--case <glob>', 'Only cases whose name matches')
    .option('--tag <tag>', 'Only cases carrying the tag (repeatable)', collect, [])
    .option('--fail-fast', 'Stop at the first failing case')
    .option('--parallel <n>', 'Suites to run at once', parseInteger, 1)
    .option('--json-out <path>', 'Write the JSON report to a file')
    .option('--no-setup', 'Skip the bootstrap schema')
    .option('--no-sync', 'Skip schema sync')
    .option('--no-seed', 'Skip the seed script')
    .option('--keep-db', 'Keep each suite database after the run')
    .option('--base-url <url>', 'Base URL for api_request cases')
    .option('--timeout-ms <ms>', 'Default api_request timeout', parseInteger)
    .option('--json', 'Print the report as JSON')
    .action(async (options: TestCommandOptions, command: Command) => {
      await runAction(command, options.json, async (context) => {
        const { testCommand } = await import('./test.js');
        return testCommand(options, context);
      });
    });
}

/**
 * Registers all commands with the program
 */
export function registerCommands(program: Command): void {
  registerSetupCommand(program);
  registerMigrateCommand(program);
  registerApplyCommand(program);
  registerStatusCommand(program);
  registerSeedCommand(program);
  registerSyncCommand(program);
  registerDiffCommand(program);
  registerTestCommand(program);
}

/**
 * Root program with global options and unknown-command suggestions
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('quarry')
    .description('Schema lifecycle and declarative testing for SurrealDB')
    .version('0.1.0')
    .option('-C, --root <dir>', 'Project root containing the database/ directory')
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.optsWithGlobals();
      if (opts.color === false || !shouldUseColor()) {
        chalk.level = 0;
      }
    })
    .addHelpText(
      'after',
      `
Examples:
  $ quarry setup                       Define tracking tables
  $ quarry migrate --dry-run           List migration files
  $ quarry sync --watch                Keep the database in step with database/schema
  $ quarry diff                        Show changes since the last sync
  $ quarry test --tag smoke --parallel 4
`
    );

  registerCommands(program);

  program.on('command:*', (operands: string[]) => {
    const unknownCommand = operands[0] ?? '';
    const suggestions = findSimilarCommands(
      unknownCommand,
      program.commands.map((cmd) => cmd.name())
    );

    console.error(chalk.red(`error: unknown command '${unknownCommand}'`));
    if (suggestions.length > 0) {
      console.error();
      console.error(chalk.yellow('Did you mean one of these?'));
      for (const cmd of suggestions) {
        console.error(`  ${chalk.cyan(cmd)}`);
      }
    }
    console.error();
    console.error(`Run ${chalk.cyan('quarry --help')} for a list of available commands.`);
    process.exit(1);
  });

  return program;
}
