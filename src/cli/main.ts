#!/usr/bin/env node
import { runCli, systemDeps } from './program.js';

try {
  process.exitCode = await runCli(process.argv, systemDeps());
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(message);
  process.exitCode = 1;
}
