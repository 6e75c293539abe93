#!/usr/bin/env node
/**
 * deptrack CLI - Main entry point
 * Provides the `deptrack` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'node:url'
import { dirname, resolve } from 'node:path'
import { readFile } from 'node:fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerGraphCommand } from './commands/graph.js'
import { registerPlanCommand } from './commands/plan.js'

const logger = createLogger('cli')

/** Resolve the package.json path relative to this file */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  // Run from dist/cli or src/cli
  const paths = [resolve(here, '../../package.json'), resolve(here, '../package.json')]

  for (const pkgPath of paths) {
    try {
      const content = await readFile(pkgPath, 'utf-8')
      const pkg: unknown = JSON.parse(content)
      if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version
      }
    } catch {
      // Try next path
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('deptrack')
    .description('deptrack - dependency graph readiness tracking')
    .version(version, '-v, --version', 'Output the current version')

  registerGraphCommand(program)
  registerPlanCommand(program)

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

void main()
