#!/usr/bin/env node
// ============================================================================
// @freqtable/cli — Entry Point
// ============================================================================

import process from 'node:process';
import { runCli } from './commands.js';
import { createUi, detectUiOptions } from './ui.js';

const args = process.argv.slice(2);
const ui = createUi(detectUiOptions(args, process.env, process.stdout.isTTY === true));

process.exitCode = runCli(args, {
  ui,
  out: {
    log: (line) => console.log(line),
    error: (line) => console.error(line),
  },
});
