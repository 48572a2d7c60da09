#!/usr/bin/env node
/**
 * trace-digest entry point.
 *
 * Run: node dist/main.js summary runs/2025-11-28_08-31-02_a1c0
 */

import { runCli } from './cli.js';

process.exitCode = await runCli(process.argv.slice(2));
