#!/usr/bin/env node
import { ConfigError } from '../../domain/index.js';
import { createLogger, loadRuntimeConfig } from '../../infrastructure/index.js';
import type { RuntimeConfig } from '../../infrastructure/index.js';
import { buildProgram } from './program.js';

/**
 * Entry point of the `cblog` binary.
 *
 * Any error escaping a command (grammar violation, peer mismatch, bad
 * configuration, unreadable file) is logged as fatal and exits with status 1.
 */
async function main(config: RuntimeConfig): Promise<void> {
  const program = buildProgram({
    config,
    createLogger,
    stdout: (line) => process.stdout.write(line + '\n'),
  });
  await program.parseAsync(process.argv);
}

function loadConfigOrExit(): RuntimeConfig {
  try {
    return loadRuntimeConfig();
  } catch (err: unknown) {
    const message = err instanceof ConfigError ? err.message : String(err);
    process.stderr.write(`${message}\n`);
    process.exit(1);
  }
}

const config = loadConfigOrExit();

main(config).catch((err: unknown) => {
  createLogger({ level: config.logLevel }).fatal({ err }, 'cblog failed');
  process.exitCode = 1;
});
