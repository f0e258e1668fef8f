#!/usr/bin/env node
/**
 * corpus-filter CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Loads configuration and wires dependencies for each command
 * 2. Interprets CliResult into process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/corpus and src/cli/commands.
 */

import 'dotenv/config';
import { Command, CommanderError } from 'commander';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ConfigOverrides, FilterConfig } from './config/filter-config.js';
import type { CorpusFileSystemPort } from './ports/corpus-fs.port.js';
import type { LoggerFactory } from './core/logging/types.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from './runtime/adapters/node-process-terminator.js';
import { runFilter, projectFilter } from './corpus/filter-pipeline.js';
import { cleanStagingRoot } from './corpus/staging-cleanup.js';

import type { CliResult } from './cli/types/cli-result.js';
import { interpretCliResult } from './cli/interpret-result.js';
import { errorResult } from './cli/error-result.js';
import { executeFilterCommand, executeReportCommand, executeCleanStagingCommand } from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════

interface CommandContext {
  readonly config: FilterConfig;
  readonly fs: CorpusFileSystemPort;
  readonly loggers: LoggerFactory;
}

interface PathOptions {
  readonly base?: string;
  readonly manifest?: string;
  readonly sourceLang?: string;
  readonly targetLang?: string;
  readonly staging?: string;
}

interface FilterOptions extends PathOptions {
  readonly keepStagingOnFailure?: boolean;
}

function toOverrides(options: FilterOptions): ConfigOverrides {
  return {
    baseDir: options.base,
    manifest: options.manifest,
    sourceLang: options.sourceLang,
    targetLang: options.targetLang,
    stagingDir: options.staging,
    keepStagingOnFailure: options.keepStagingOnFailure,
  };
}

/**
 * Initialize the container with the command's overrides, run the command and
 * interpret its result. Configuration errors never reach the command.
 */
async function runCommand(
  overrides: ConfigOverrides,
  execute: (ctx: CommandContext) => Promise<CliResult>
): Promise<void> {
  const init = initializeContainer({ runtimeMode: { kind: 'cli' }, overrides });
  if (init.isErr()) {
    interpretCliResult(errorResult(init.error), new NodeProcessTerminator());
    return;
  }

  const ctx: CommandContext = {
    config: container.resolve<FilterConfig>(DI.Config.Filter),
    fs: container.resolve<CorpusFileSystemPort>(DI.Infra.FileSystem),
    loggers: container.resolve<LoggerFactory>(DI.Infra.LoggerFactory),
  };

  const result = await execute(ctx);
  interpretCliResult(result, container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator));
}

function withPathOptions(command: Command): Command {
  return command
    .option('--base <dir>', 'directory holding xml/ and the manifest (default: current directory)')
    .option('--manifest <file>', 'alignment manifest, plain or gzip (default: en-zh_cn.xml.gz.tmp)')
    .option('--source-lang <code>', 'source language subtree (default: en)')
    .option('--target-lang <code>', 'target language subtree (default: zh_cn)')
    .option('--staging <dir>', 'staging directory relative to the base (default: tmp)');
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('corpus-filter')
  .description('Prune a parallel subtitle corpus to the documents referenced by its alignment manifest')
  .version('0.1.0')
  // Subcommands inherit this; usage errors exit with the misuse status instead of commander's 1.
  .exitOverride();

withPathOptions(program.command('filter', { isDefault: true }))
  .description('Copy referenced documents to staging, report sizes, then replace the corpus tree')
  .option('--keep-staging-on-failure', 'leave the staging root in place when the run aborts')
  .action(async (options: FilterOptions) => {
    await runCommand(toOverrides(options), ({ config, fs, loggers }) =>
      executeFilterCommand({
        runFilter: () => runFilter(config, { fs, logger: loggers.create('filter') }),
      })
    );
  });

withPathOptions(program.command('report'))
  .description('Dry run: verify the manifest against the corpus and project the filtered sizes')
  .action(async (options: PathOptions) => {
    await runCommand(toOverrides(options), ({ config, fs, loggers }) =>
      executeReportCommand({
        projectFilter: () => projectFilter(config, { fs, logger: loggers.create('report') }),
      })
    );
  });

program
  .command('clean-staging')
  .description('Remove a leftover staging root, restoring the corpus tree if a swap was interrupted')
  .option('--base <dir>', 'directory holding xml/ (default: current directory)')
  .option('--staging <dir>', 'staging directory relative to the base (default: tmp)')
  .action(async (options: Pick<PathOptions, 'base' | 'staging'>) => {
    await runCommand({ baseDir: options.base, stagingDir: options.staging }, ({ config, fs, loggers }) =>
      executeCleanStagingCommand({
        cleanStaging: () => cleanStagingRoot(fs, config.layout, loggers.create('clean-staging')),
      })
    );
  });

// ═══════════════════════════════════════════════════════════════════════════
// RUN
// ═══════════════════════════════════════════════════════════════════════════

try {
  await program.parseAsync(process.argv);
} catch (e) {
  if (!(e instanceof CommanderError)) throw e;
  // Commander has already printed help, the version or the usage error.
  new NodeProcessTerminator().terminate(e.exitCode === 0 ? { kind: 'success' } : { kind: 'failure', status: 2 });
}
