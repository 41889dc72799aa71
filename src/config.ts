import { existsSync } from 'node:fs'
import { resolve } from 'node:path'
import { getCacheDir } from './cache.js'
import { ConfigError } from './errors.js'
import { loadBinaryFilter, type BinaryFilter } from './filter.js'
import type { Logger } from './logger.js'
import { DEFAULT_PRODUCT } from './platform.js'

export const LAYOUTS = ['per-binary', 'flat'] as const

export type Layout = (typeof LAYOUTS)[number]

export const DEFAULT_OUTPUT_DIR = './output'
export const DEFAULT_EXTRACT_DIR = './extract-cache'
export const DEFAULT_BINARIES_FILE = './binaries.txt'

/**
 * Options as parsed from the command line.
 */
export type CliOptions = {
  outputDir: string
  cacheDir?: string
  extractDir: string
  binariesFile: string
  binaries?: string
  listBinaries: boolean
  cleanCache: boolean
  cache: boolean
  layout: string
  publish: boolean
  repo?: string
  product: string
  verbose: boolean
}

export type CachePaths = {
  cacheDir: string
  extractDir: string
}

export type HarvestConfig = CachePaths & {
  url: string
  outputDir: string
  filter: BinaryFilter | null
  listOnly: boolean
  noCache: boolean
  layout: Layout
  publish: boolean
  repo?: string
  product: string
  token: string | null
  env: NodeJS.ProcessEnv
}

export type ResolveContext = {
  env: NodeJS.ProcessEnv
  cwd: string
  logger: Logger
}

export function isLayout(value: string): value is Layout {
  return LAYOUTS.some((layout) => layout === value)
}

export function resolveCachePaths(
  options: Pick<CliOptions, 'cacheDir' | 'extractDir'>,
  context: Pick<ResolveContext, 'env' | 'cwd'>,
): CachePaths {
  const { env, cwd } = context
  return {
    cacheDir: resolve(cwd, getCacheDir({ cacheDir: options.cacheDir, env })),
    extractDir: resolve(cwd, options.extractDir),
  }
}

export function getPublishToken(env: NodeJS.ProcessEnv): string | null {
  return env['GITHUB_TOKEN'] || env['GH_TOKEN'] || null
}

export async function resolveConfig(
  url: string | undefined,
  options: CliOptions,
  context: ResolveContext,
): Promise<HarvestConfig> {
  const { env, cwd, logger } = context

  if (!url) {
    throw new ConfigError('An archive URL is required')
  }
  if (!isLayout(options.layout)) {
    throw new ConfigError(
      `Invalid layout '${options.layout}'. Expected one of: ${LAYOUTS.join(', ')}`,
    )
  }

  const binariesFile = resolve(cwd, options.binariesFile)
  if (options.binaries === undefined && !existsSync(binariesFile)) {
    logger.warn(`Binaries file not found: ${binariesFile}`)
    logger.info(
      'Will process all binary files unless --list-binaries is specified',
    )
  }

  const filter = await loadBinaryFilter({
    inline: options.binaries,
    file: binariesFile,
  })

  return {
    ...resolveCachePaths(options, context),
    url,
    outputDir: resolve(cwd, options.outputDir),
    filter,
    listOnly: options.listBinaries,
    noCache: !options.cache,
    layout: options.layout,
    publish: options.publish,
    repo: options.repo,
    product: options.product || DEFAULT_PRODUCT,
    token: getPublishToken(env),
    env,
  }
}
