/**
 * Backend invoker that runs a model CLI once per attempt.
 *
 *   - Argument template with {backend} and {prompt} placeholders (no shell)
 *   - ANSI code stripping from output
 *   - Process kill on deadline or abort
 */

import { spawn } from 'node:child_process';
import pino from 'pino';
import { requireTimerDelay } from '@relay/core';
import type { BackendInvoker, InvocationOutcome, InvocationRequest } from '@relay/fallback';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CommandInvokerConfig {
  /** Executable, resolved through PATH. */
  command: string;
  /** Argument template. */
  args: readonly string[];
  /** Extra environment variables layered over process.env. */
  env?: Record<string, string>;
  cwd?: string;
  logger?: pino.Logger;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

// eslint-disable-next-line no-control-regex
const ANSI_RE = /\x1B(?:[@-Z\\-_]|\[[0-?]*[ -/]*[@-~])/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_RE, '');
}

/**
 * Substitute placeholders in every argument. The prompt is inserted last and
 * verbatim, so placeholder-like text inside it is left alone.
 */
export function renderArgs(template: readonly string[], backendId: string, prompt: string): string[] {
  return template.map((arg) =>
    arg.replaceAll('{backend}', () => backendId).replaceAll('{prompt}', () => prompt),
  );
}

// ---------------------------------------------------------------------------
// CommandInvoker
// ---------------------------------------------------------------------------

export class CommandInvoker implements BackendInvoker {
  private readonly config: CommandInvokerConfig;
  private readonly log: pino.Logger;

  constructor(config: CommandInvokerConfig) {
    this.config = config;
    this.log = config.logger ?? pino({ name: 'relay:invoker' });
  }

  async invoke(request: InvocationRequest): Promise<InvocationOutcome> {
    const { backendId, prompt, deadlineMs, signal } = request;
    requireTimerDelay('deadlineMs', deadlineMs, 1);
    const args = renderArgs(this.config.args, backendId, prompt);

    if (signal.aborted) {
      this.log.debug({ backendId }, 'Signal already aborted; not spawning');
      return {
        success: false,
        backendId,
        output: '',
        error: `Timeout after ${deadlineMs}ms`,
        statusCode: -1,
        timedOut: true,
      };
    }

    return new Promise<InvocationOutcome>((resolve) => {
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let settled = false;

      const finish = (outcome: InvocationOutcome): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        resolve(outcome);
      };

      const collected = (): { output: string; error: string } => ({
        output: stripAnsi(Buffer.concat(stdoutChunks).toString('utf-8')),
        error: stripAnsi(Buffer.concat(stderrChunks).toString('utf-8')),
      });

      const proc = spawn(this.config.command, args, {
        cwd: this.config.cwd ?? process.cwd(),
        env: { ...process.env, ...this.config.env },
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      proc.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
      proc.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

      const kill = (why: string): void => {
        this.log.warn({ backendId, deadlineMs, why }, 'Killing backend process');
        proc.kill('SIGKILL');
        finish({
          success: false,
          backendId,
          output: collected().output,
          error: `Timeout after ${deadlineMs}ms`,
          statusCode: -1,
          timedOut: true,
        });
      };

      proc.on('close', (code) => {
        const { output, error } = collected();
        const exitCode = code ?? 1;
        this.log.debug({ backendId, exitCode }, 'Backend process exited');
        finish({
          success: exitCode === 0,
          backendId,
          output,
          error,
          statusCode: exitCode,
          timedOut: false,
        });
      });

      proc.on('error', (err) => {
        this.log.error({ backendId, command: this.config.command, error: err.message }, 'Failed to spawn backend');
        finish({
          success: false,
          backendId,
          output: '',
          error: err.message,
          statusCode: -1,
          timedOut: false,
        });
      });

      const timer = setTimeout(() => kill('deadline'), deadlineMs);
      const onAbort = (): void => kill('aborted');
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
