#!/usr/bin/env node
/**
 * rvm CLI - Main entry point
 * Provides the `rvm` command-line interface for managing Resolc versions
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerInstallCommand } from './commands/install.js'
import { registerRemoveCommand } from './commands/remove.js'
import { registerWhichCommand } from './commands/which.js'
import { registerUseCommand } from './commands/use.js'
import { registerListCommand } from './commands/list.js'

const logger = createLogger('cli')

/** Read the version from package.json, searching upward from dist/ or src/ */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  const candidates = [resolve(here, '../../package.json'), resolve(here, '../package.json')]

  for (const pkgPath of candidates) {
    let content: string
    try {
      content = await readFile(pkgPath, 'utf-8')
    } catch (err) {
      logger.debug({ pkgPath, err }, 'package.json not found here')
      continue
    }
    const pkg: unknown = JSON.parse(content)
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('rvm')
    .description('Resolc version manager')
    .version(version, '-V, --version', 'Output the current version')
    .option('-o, --offline', 'Run in offline mode', false)

  registerInstallCommand(program)
  registerRemoveCommand(program)
  registerWhichCommand(program)
  registerUseCommand(program)
  registerListCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
