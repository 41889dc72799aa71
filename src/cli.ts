import { Command, CommanderError } from 'commander'
import { clearCache } from './cache.js'
import {
  DEFAULT_BINARIES_FILE,
  DEFAULT_EXTRACT_DIR,
  DEFAULT_OUTPUT_DIR,
  LAYOUTS,
  resolveCachePaths,
  resolveConfig,
  type CliOptions,
} from './config.js'
import { createProgressLogger, type FetchLike } from './download.js'
import { getErrorMessage } from './errors.js'
import { createLogger, type Logger } from './logger.js'
import { harvest } from './packager.js'
import { DEFAULT_PRODUCT } from './platform.js'
import type { CommandRunner } from './publish.js'
import { createFileCommandProbe, type ContentProbe } from './scan.js'

export const VERSION = '0.1.0'

export function createProgram(): Command {
  return new Command()
    .name('binharvest')
    .description('Extract binaries from compiler toolchain release archives')
    .version(VERSION)
    .argument('[url]', 'URL to the release archive (.tar.gz, .tar.xz, ...)')
    .option(
      '-o, --output-dir <dir>',
      'Directory to save extracted binaries',
      DEFAULT_OUTPUT_DIR,
    )
    .option(
      '-c, --cache-dir <dir>',
      'Directory to cache downloaded archives (default: ~/.cache/binharvest)',
    )
    .option(
      '-e, --extract-dir <dir>',
      'Directory for extracted files cache',
      DEFAULT_EXTRACT_DIR,
    )
    .option(
      '-f, --binaries-file <file>',
      'File containing the binaries to extract, one per line',
      DEFAULT_BINARIES_FILE,
    )
    .option(
      '-b, --binaries <names>',
      'Comma-separated binaries to extract (overrides --binaries-file)',
    )
    .option(
      '--list-binaries',
      'List all available binaries in the archive and exit',
      false,
    )
    .option('--clean-cache', 'Clean the cache directories and exit', false)
    .option('--no-cache', 'Disable caching, always download and extract fresh')
    .option(
      '--layout <layout>',
      `Output layout (${LAYOUTS.join(', ')})`,
      'per-binary',
    )
    .option(
      '--publish',
      'Create a GitHub release per staged release (needs GITHUB_TOKEN)',
      false,
    )
    .option('--repo <owner/name>', 'Repository to publish releases to')
    .option(
      '--product <marker>',
      'Name preceding the version number in the URL',
      DEFAULT_PRODUCT,
    )
    .option('-v, --verbose', 'Enable verbose logging', false)
}

export type ParsedArgs = {
  url: string | undefined
  options: CliOptions
}

export function parseArgs(
  argv: string[],
  program = createProgram(),
): ParsedArgs {
  program.exitOverride()
  program.parse(argv, { from: 'user' })

  return {
    url: program.args[0],
    options: program.opts<CliOptions>(),
  }
}

export type MainDeps = {
  env: NodeJS.ProcessEnv
  cwd: string
  logger?: Logger
  probe?: ContentProbe
  fetch?: FetchLike
  runner?: CommandRunner
  isTTY?: boolean
}

async function cleanCache(
  options: CliOptions,
  deps: MainDeps,
  logger: Logger,
): Promise<void> {
  const paths = resolveCachePaths(options, deps)
  logger.info('Cleaning cache directories:')
  const removed = await clearCache(paths)
  if (removed.cacheDir) {
    logger.info(`Cleaned download cache: ${paths.cacheDir}`)
  }
  if (removed.extractDir) {
    logger.info(`Cleaned extract cache: ${paths.extractDir}`)
  }
  logger.success('Cache cleaned successfully')
}

/**
 * Runs the command line and resolves to the process exit code.
 */
export async function main(argv: string[], deps: MainDeps): Promise<number> {
  let parsed: ParsedArgs
  try {
    parsed = parseArgs(argv)
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    throw error
  }

  const { url, options } = parsed
  const logger = deps.logger ?? createLogger({ verbose: options.verbose })

  try {
    if (options.cleanCache) {
      await cleanCache(options, deps, logger)
      return 0
    }

    const config = await resolveConfig(url, options, {
      env: deps.env,
      cwd: deps.cwd,
      logger,
    })
    await harvest(config, {
      logger,
      probe: deps.probe ?? createFileCommandProbe(),
      fetch: deps.fetch,
      runner: deps.runner,
      onProgress: deps.isTTY ? createProgressLogger() : undefined,
    })
    return 0
  } catch (error) {
    logger.error(`Error: ${getErrorMessage(error)}`)
    return 1
  }
}
