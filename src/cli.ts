#!/usr/bin/env node
/**
 * CLI entrypoint for scan-tasks.
 *
 * Usage:
 *   npm run cli -- list
 *   npm run cli -- convert scan.scan cloud.ply --step 4
 */
import { runCli } from './commands';

const code = await runCli(process.argv.slice(2));
process.exit(code);
