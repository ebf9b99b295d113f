#!/usr/bin/env node
import { loadConfig } from './core/config.js';
import { createLogger } from './core/logger.js';
import { createContext } from './cli/context.js';
import { run } from './cli/run.js';

const log = createLogger('cli');

async function main(): Promise<void> {
  const ctx = createContext(loadConfig(), log);
  process.exitCode = await run(process.argv.slice(2), ctx);
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'fo crashed');
  process.stderr.write(`fo: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
});
