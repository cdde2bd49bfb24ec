#!/usr/bin/env tsx

import { join } from 'path';
import { runCli } from './cli';
import { THERMO_DIR, loadEnvFile } from './config';
import { defaultContext } from './context';

async function main(): Promise<void> {
  loadEnvFile(join(THERMO_DIR, 'thermo.env'));
  process.exitCode = await runCli(process.argv.slice(2), (output) => defaultContext(output));
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
