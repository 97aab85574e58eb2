/**
 * @relay/core - Path resolution
 *
 * Resolves RELAY_HOME and the location of relay.json.
 */

import { mkdirSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

export const CONFIG_FILE_NAME = 'relay.json';

/**
 * Resolve the relay home directory.
 * Priority: RELAY_HOME env var > ~/.model-relay
 */
export function resolveRelayHome(): string {
  const fromEnv = process.env['RELAY_HOME'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return join(homedir(), '.model-relay');
}

/**
 * Resolve the config file path.
 * Priority: explicit path > RELAY_CONFIG env var > RELAY_HOME/relay.json
 */
export function resolveConfigPath(explicit?: string): string {
  if (explicit) {
    return resolve(explicit);
  }
  const fromEnv = process.env['RELAY_CONFIG'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return join(resolveRelayHome(), CONFIG_FILE_NAME);
}

/** Create RELAY_HOME if it is missing and return it. */
export function ensureRelayHome(): string {
  const home = resolveRelayHome();
  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }
  return home;
}
