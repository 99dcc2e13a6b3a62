#!/usr/bin/env node
/**
 * Pipewright CLI - Main entry point
 * Provides the `pipewright` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'node:url'
import { dirname, resolve } from 'node:path'
import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { createLogger } from '../utils/logger.js'
import { registerConfigCommand } from './commands/config.js'
import { registerGenerateCommand } from './commands/generate.js'
import { registerServeCommand } from './commands/serve.js'
import { registerTemplatesCommand } from './commands/templates.js'

const logger = createLogger('cli')

const PackageJsonSchema = z.object({ name: z.string().optional(), version: z.string().optional() })

/** Resolve the package version from package.json next to src/ or dist/ */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  // src/cli and dist/cli are both two levels below the package root
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../package.json')]) {
    try {
      const parsed = PackageJsonSchema.safeParse(JSON.parse(await readFile(pkgPath, 'utf-8')))
      if (parsed.success && parsed.data.name === 'pipewright') {
        return parsed.data.version ?? '0.0.0'
      }
    } catch (err) {
      logger.debug({ pkgPath, err }, 'package.json not readable here')
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('pipewright')
    .description('Pipewright - generate, commit and self-heal CI/CD pipelines')
    .version(version, '-v, --version', 'Output the current version')

  registerGenerateCommand(program)
  registerTemplatesCommand(program)
  registerConfigCommand(program)
  registerServeCommand(program, version)

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
