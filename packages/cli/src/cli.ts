#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   rowshift --config ./migrations.yaml
 */

import { config as loadDotenv } from 'dotenv';
import { runCli } from './command.js';

loadDotenv();

const controller = new AbortController();
const onSigint = () => {
  process.stderr.write('Cancelling after the current batch...\n');
  controller.abort();
};
process.once('SIGINT', onSigint);

try {
  process.exitCode = await runCli(process.argv.slice(2), {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
    signal: controller.signal,
  });
} finally {
  process.off('SIGINT', onSigint);
}
