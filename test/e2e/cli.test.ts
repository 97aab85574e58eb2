/**
 * E2E Tests for the relay command line
 *
 * Runs the CLI in process with a scripted invoker and captured output.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { DEFAULT_CONFIG, type RelayConfig } from '@relay/core';
import type { BackendInvoker, InvocationOutcome, InvocationRequest } from '@relay/fallback';
import { RETRY_QUESTION, runCli } from '../../src/cli.js';

// Suppress pino logging in tests
vi.mock('pino', () => {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
  return { default: Object.assign(() => logger, { destination: vi.fn() }) };
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function testConfig(): RelayConfig {
  const config = structuredClone(DEFAULT_CONFIG);
  config.backends = ['alpha', 'bravo'];
  config.fallback.retryBackoffMs = 0;
  config.fallback.cycleBackoffMs = 0;
  return config;
}

function ok(backendId: string): InvocationOutcome {
  return { success: true, backendId, output: `${backendId}-answer`, error: '', statusCode: 0, timedOut: false };
}

function failed(backendId: string, error: string): InvocationOutcome {
  return { success: false, backendId, output: '', error, statusCode: 1, timedOut: false };
}

function scripted(respond: (request: InvocationRequest, call: number) => InvocationOutcome) {
  const calls: InvocationRequest[] = [];
  const invoker: BackendInvoker = {
    invoke: async (request) => {
      calls.push(request);
      return respond(request, calls.length);
    },
  };
  return { invoker, calls };
}

describe('relay CLI', () => {
  let out: string[];
  let err: string[];
  let ask: Mock<(question: string) => Promise<string>>;

  beforeEach(() => {
    out = [];
    err = [];
    ask = vi.fn<(question: string) => Promise<string>>().mockResolvedValue('');
  });

  function run(args: string[], invoker: BackendInvoker, config: RelayConfig = testConfig()) {
    return runCli(['node', 'relay', ...args], {
      invoker,
      config,
      io: { out: (t) => out.push(t), err: (t) => err.push(t), ask },
      now: () => new Date(2025, 0, 15, 20, 0),
    });
  }

  // ---------------------------------------------------------------------------
  // Success
  // ---------------------------------------------------------------------------
  describe('Success', () => {
    it('prints the banner and output, exits 0', async () => {
      const { invoker, calls } = scripted((req) => ok(req.backendId));

      const code = await run(['hello'], invoker);

      expect(code).toBe(0);
      expect(calls.map((c) => c.prompt)).toEqual(['hello']);
      expect(out.some((line) => line.includes('SUCCESS'))).toBe(true);
      expect(out[out.length - 1]).toBe('alpha-answer');
    });

    it('uses the configured backends unless --backend is given', async () => {
      const { invoker, calls } = scripted((req) => ok(req.backendId));

      await run(['hello', '--backend', 'zulu', 'yankee'], invoker);

      expect(calls[0]?.backendId).toBe('zulu');
    });

    it('converts --timeout seconds to a per-attempt deadline', async () => {
      const { invoker, calls } = scripted((req) => ok(req.backendId));

      await run(['hello', '--timeout', '5'], invoker);

      expect(calls[0]?.deadlineMs).toBe(5000);
    });

    it('prints progress lines with --verbose', async () => {
      const { invoker } = scripted((req) => ok(req.backendId));

      await run(['hello', '--verbose'], invoker);

      expect(out[0]).toBe('Attempting backend: alpha (backend 1/2, cycle 1/3, retry 1/3)');
    });
  });

  // ---------------------------------------------------------------------------
  // Failure
  // ---------------------------------------------------------------------------
  describe('Failure', () => {
    it('prints the escalation notice and exits 1 when exhausted', async () => {
      const { invoker, calls } = scripted((req) => failed(req.backendId, 'quota exceeded'));

      const code = await run(['hello', '--retries', '1', '--cycles', '1'], invoker);

      expect(code).toBe(1);
      expect(calls.map((c) => c.backendId)).toEqual(['alpha', 'bravo']);
      const text = out.join('\n').split('\n');
      expect(text).toContain('  - Last attempted backend: bravo');
      expect(text).toContain('Time until reset: approximately 4 hours');
      expect(out[out.length - 1]).toBe('Error: all backends exhausted after 1 cycles; escalate to caller');
      expect(ask).not.toHaveBeenCalled();
    });

    it('exits 1 on a non-quota error after the non-quota notice', async () => {
      const { invoker, calls } = scripted((req) => failed(req.backendId, 'Invalid API key'));

      const code = await run(['hello', '-m', 'master'], invoker);

      expect(code).toBe(1);
      expect(calls.length).toBe(1);
      const text = out.join('\n').split('\n');
      expect(text).toContain('Backend alpha failed with an error that is not quota related.');
      expect(text).toContain('  - Last error: Invalid API key');
      expect(text.some((line) => line.startsWith('Time until reset'))).toBe(false);
      expect(out[out.length - 1]).toBe('Error: non-quota error on backend alpha: Invalid API key');
      expect(ask).not.toHaveBeenCalled();
    });

    it('prints no notice on a timeout', async () => {
      const { invoker } = scripted((req) => ({ ...failed(req.backendId, 'Timeout after 5000ms'), timedOut: true }));

      const code = await run(['hello'], invoker);

      expect(code).toBe(1);
      expect(out.some((line) => line.includes('ESCALATION REQUIRED'))).toBe(false);
      expect(out[out.length - 1]).toBe('Error: timeout');
    });

    it('rejects invalid numeric options', async () => {
      const { invoker, calls } = scripted((req) => ok(req.backendId));

      const code = await run(['hello', '--retries', '0'], invoker);

      expect(code).toBe(1);
      expect(calls.length).toBe(0);
      expect(err.join('\n')).toContain('Expected a positive integer');
    });

    it('rejects a timeout longer than a timer can wait', async () => {
      const { invoker, calls } = scripted((req) => ok(req.backendId));

      const code = await run(['hello', '--timeout', '3000000'], invoker);

      expect(code).toBe(1);
      expect(calls.length).toBe(0);
      expect(err.join('\n')).toContain('Expected at most 2147483 seconds');
    });

    it('accepts the longest timeout a timer can wait', async () => {
      const { invoker, calls } = scripted((req) => ok(req.backendId));

      expect(await run(['hello', '--timeout', '2147483'], invoker)).toBe(0);
      expect(calls[0]?.deadlineMs).toBe(2_147_483_000);
    });

        it('requires a prompt', async () => {
      const { invoker } = scripted((req) => ok(req.backendId));
      expect(await run([], invoker)).toBe(1);
    });
  });

  // ---------------------------------------------------------------------------
  // Master mode
  // ---------------------------------------------------------------------------
  describe('Master mode', () => {
    it('starts a fresh run when the user types retry', async () => {
      ask.mockResolvedValueOnce('retry').mockResolvedValueOnce('');
      const { invoker, calls } = scripted((req) => failed(req.backendId, '429'));

      const code = await run(['hello', '-m', 'master', '--retries', '1', '--cycles', '1'], invoker);

      expect(code).toBe(1);
      expect(calls.map((c) => c.backendId)).toEqual(['alpha', 'bravo', 'alpha', 'bravo']);
      expect(ask).toHaveBeenCalledTimes(2);
      expect(ask).toHaveBeenCalledWith(RETRY_QUESTION);
    });

    it('exits 0 when the retried run succeeds', async () => {
      ask.mockResolvedValueOnce(' RETRY ');
      const { invoker } = scripted((req, n) => (n <= 2 ? failed(req.backendId, '429') : ok(req.backendId)));

      const code = await run(['hello', '--mode', 'master', '--retries', '1', '--cycles', '1'], invoker);

      expect(code).toBe(0);
      expect(ask).toHaveBeenCalledTimes(1);
      expect(out[out.length - 1]).toBe('alpha-answer');
    });

    it('rejects an unknown mode', async () => {
      const { invoker } = scripted((req) => ok(req.backendId));
      expect(await run(['hello', '--mode', 'turbo'], invoker)).toBe(1);
    });
  });

  // ---------------------------------------------------------------------------
  // Configuration file
  // ---------------------------------------------------------------------------
  describe('Configuration file', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await mkdtemp(join(tmpdir(), 'relay-cli-test-'));
    });

    afterEach(async () => {
      await rm(tempDir, { recursive: true, force: true });
    });

    it('exits 2 when the configuration is invalid', async () => {
      const path = join(tempDir, 'relay.json');
      await writeFile(path, JSON.stringify({ backends: [] }));
      const { invoker, calls } = scripted((req) => ok(req.backendId));

      const code = await runCli(['node', 'relay', 'hello', '--config', path], {
        invoker,
        io: { out: (t) => out.push(t), err: (t) => err.push(t), ask },
      });

      expect(code).toBe(2);
      expect(calls.length).toBe(0);
      expect(err).toContain('  /backends: At least one backend must be configured');
    });

    it('exits 1 when the configuration file is missing', async () => {
      const { invoker } = scripted((req) => ok(req.backendId));

      const code = await runCli(['node', 'relay', 'hello', '-c', join(tempDir, 'missing.json')], {
        invoker,
        io: { out: (t) => out.push(t), err: (t) => err.push(t), ask },
      });

      expect(code).toBe(1);
      expect(err[err.length - 1]).toBe(`relay: Config file ${join(tempDir, 'missing.json')} does not exist`);
    });

    it('runs with a valid configuration file', async () => {
      const path = join(tempDir, 'relay.json');
      await writeFile(path, JSON.stringify({ backends: ['xray'] }));
      const { invoker, calls } = scripted((req) => ok(req.backendId));

      const code = await runCli(['node', 'relay', 'hello', '--config', path], {
        invoker,
        io: { out: (t) => out.push(t), err: (t) => err.push(t), ask },
      });

      expect(code).toBe(0);
      expect(calls[0]?.backendId).toBe('xray');
    });
  });
});
