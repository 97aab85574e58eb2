/**
 * relay - command-line wrapper around the FallbackExecutor
 *
 * Prints a SUCCESS/FAILED banner and maps the result to an exit code:
 * 0 on success, 1 on any failure, 2 on an invalid configuration.
 */

import { createInterface } from 'node:readline/promises';
import chalk from 'chalk';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import pino from 'pino';
import { loadConfig, errorMessage, MAX_TIMER_DELAY_MS, type RelayConfig } from '@relay/core';
import {
  FallbackExecutor,
  createQuotaClassifier,
  formatHandoffNotice,
  type BackendInvoker,
  type ExecutionFailure,
  type HandoffCause,
} from '@relay/fallback';
import { CommandInvoker } from './backends/command-invoker.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
  /** Ask a question on the terminal and return the answer. */
  ask: (question: string) => Promise<string>;
}

export interface CliDeps {
  io?: Partial<CliIO>;
  /** Used instead of the CommandInvoker built from config. */
  invoker?: BackendInvoker;
  /** Used instead of loading relay.json. */
  config?: RelayConfig;
  logger?: pino.Logger;
  now?: () => Date;
}

type Mode = 'auto' | 'master';

interface CliOptions {
  mode: Mode;
  verbose?: boolean;
  backend?: string[];
  retries?: number;
  cycles?: number;
  timeout?: number;
  config?: string;
}

export const RETRY_QUESTION = "\nPress Enter to exit or type 'retry' to start over: ";

const RULE = '='.repeat(60);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);

function parseTimeoutSeconds(value: string): number {
  const parsed = parsePositiveInt(value);
  if (parsed > MAX_TIMEOUT_SECONDS) {
    throw new InvalidArgumentError(`Expected at most ${MAX_TIMEOUT_SECONDS} seconds, got "${value}"`);
  }
  return parsed;
}

async function askOnTerminal(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

function isMode(value: string): value is Mode {
  return value === 'auto' || value === 'master';
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

async function relay(
  prompt: string,
  options: CliOptions,
  deps: CliDeps,
  io: CliIO,
): Promise<number> {
  let config: RelayConfig;
  if (deps.config) {
    config = deps.config;
  } else {
    const loaded = loadConfig({ path: options.config });
    for (const warn of loaded.validation.warnings) {
      io.err(`Config warning: ${warn.path}: ${warn.message}`);
    }
    if (!loaded.validation.valid) {
      io.err(`Config validation errors in ${loaded.path}:`);
      for (const err of loaded.validation.errors) {
        io.err(`  ${err.path}: ${err.message}`);
      }
      return 2;
    }
    config = loaded.config;
  }

  const log =
    deps.logger ??
    pino({ name: 'relay:cli', level: options.verbose ? 'debug' : config.log.level }, pino.destination(2));

  const backends = options.backend && options.backend.length > 0 ? options.backend : config.backends;
  const invoker =
    deps.invoker ??
    new CommandInvoker({
      command: config.command.command,
      args: config.command.args,
      env: config.command.env,
      cwd: config.command.cwd,
      logger: log,
    });

  const executor = new FallbackExecutor({
    backends,
    invoker,
    classifier: createQuotaClassifier(config.quotaIndicators),
    retryBackoffMs: config.fallback.retryBackoffMs,
    cycleBackoffMs: config.fallback.cycleBackoffMs,
    logger: log,
    write: io.out,
  });

  const maxRetriesPerBackend = options.retries ?? config.fallback.maxRetriesPerBackend;
  const maxCycles = options.cycles ?? config.fallback.maxCycles;
  const deadlineMs =
    options.timeout !== undefined ? options.timeout * 1000 : config.fallback.deadlineMs;

  for (;;) {
    const result = await executor.execute(prompt, {
      maxRetriesPerBackend,
      maxCycles,
      deadlineMs,
      verbose: options.verbose ?? false,
    });

    if (result.success) {
      io.out(`\n${RULE}`);
      io.out(chalk.green('SUCCESS'));
      io.out(RULE);
      io.out(result.output);
      return 0;
    }

    if (result.kind === 'exhausted' || result.kind === 'backend_error') {
      io.out(handoffNotice(result, result.kind, backends, maxRetriesPerBackend, deps.now?.() ?? new Date()));

      if (result.kind === 'exhausted' && options.mode === 'master') {
        const answer = await io.ask(RETRY_QUESTION);
        if (answer.trim().toLowerCase() === 'retry') {
          log.info('Starting a fresh fallback run on request');
          continue;
        }
      }
    }

    io.out(`\n${RULE}`);
    io.out(chalk.red('FAILED'));
    io.out(RULE);
    io.out(`Error: ${result.reason}`);
    return 1;
  }
}

function handoffNotice(
  result: ExecutionFailure,
  cause: HandoffCause,
  backends: readonly string[],
  maxRetriesPerBackend: number,
  now: Date,
): string {
  return formatHandoffNotice({
    cause,
    backends,
    lastBackend: result.backendId ?? backends[backends.length - 1] ?? 'unknown',
    cycles: result.cycles,
    maxRetriesPerBackend,
    lastError: result.lastError ?? '',
    now,
  });
}

// ---------------------------------------------------------------------------
// Entry
// ---------------------------------------------------------------------------

/**
 * Parse `argv` (node-style, including the executable and script) and run.
 * Resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const io: CliIO = {
    out: deps.io?.out ?? ((text) => process.stdout.write(`${text}\n`)),
    err: deps.io?.err ?? ((text) => process.stderr.write(`${text}\n`)),
    ask: deps.io?.ask ?? askOnTerminal,
  };

  let exitCode = 0;

  const program = new Command()
    .name('relay')
    .description('Run a prompt across model backends, falling back on quota errors')
    .argument('<prompt>', 'Prompt to send')
    .addOption(
      new Option('-m, --mode <mode>', 'auto (fallback only) or master (offer a retry on exhaustion)')
        .choices(['auto', 'master'])
        .default('auto'),
    )
    .option('-v, --verbose', 'Print progress for every attempt')
    .option('-b, --backend <id...>', 'Backends to use instead of the configured list')
    .option('--retries <n>', 'Attempts per backend per cycle', parsePositiveInt)
    .option('--cycles <n>', 'Passes over the backend list', parsePositiveInt)
    .option('--timeout <seconds>', 'Deadline for a single attempt', parseTimeoutSeconds)
    .option('-c, --config <path>', 'Read configuration from this file')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    })
    .action(async (prompt: string, raw: Record<string, unknown>) => {
      const mode = typeof raw['mode'] === 'string' && isMode(raw['mode']) ? raw['mode'] : 'auto';
      const options: CliOptions = {
        mode,
        verbose: raw['verbose'] === true,
        backend: Array.isArray(raw['backend'])
          ? raw['backend'].filter((b): b is string => typeof b === 'string')
          : undefined,
        retries: typeof raw['retries'] === 'number' ? raw['retries'] : undefined,
        cycles: typeof raw['cycles'] === 'number' ? raw['cycles'] : undefined,
        timeout: typeof raw['timeout'] === 'number' ? raw['timeout'] : undefined,
        config: typeof raw['config'] === 'string' ? raw['config'] : undefined,
      };
      exitCode = await relay(prompt, options, deps, io);
    });

  try {
    await program.parseAsync([...argv]);
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    io.err(`relay: ${errorMessage(err)}`);
    return 1;
  }

  return exitCode;
}
