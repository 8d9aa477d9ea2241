#!/usr/bin/env node
/**
 * `resolc` entry point - runs the selected Resolc version
 *
 * Usage:
 *   resolc [+<version>] [args...]
 */

import { runLauncher } from './launcher.js'

void runLauncher(process.argv.slice(2)).then((code) => {
  process.exit(code)
})
