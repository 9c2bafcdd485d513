#!/usr/bin/env npx tsx
/**
 * Executable entry point.
 *
 * Usage:
 *   npm start
 *
 * Reads `1.txt` from the current working directory.
 */

import { runCli } from '../src/cli/run'

process.exitCode = await runCli()
