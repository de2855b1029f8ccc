#!/usr/bin/env -S node --import tsx
/**
 * bin/kiln.ts: entry point for the `kiln` command.
 *
 * kiln make -j 4        → build everything with four concurrent rules
 * kiln status           → what would rebuild
 */

import { runCli } from '../commands/index.js'

process.exitCode = await runCli(process.argv.slice(2))
