/**
 * relay - process entry point
 */

import { runCli } from './cli.js';

const LOG_PREFIX = '[relay]';

runCli(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`${LOG_PREFIX} Fatal error:`, err);
    process.exit(1);
  },
);
