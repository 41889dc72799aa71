import { cp, mkdir } from 'node:fs/promises'
import { join } from 'node:path'
import type { HarvestConfig, Layout } from './config.js'
import {
  fetchArchive,
  type FetchLike,
  type ProgressCallback,
} from './download.js'
import { extractArchiveCached, makeExecutable } from './extract.js'
import {
  getMissingNames,
  getRequestedNames,
  isExeName,
  type BinaryFilter,
} from './filter.js'
import type { Logger } from './logger.js'
import {
  buildBinaryMetadata,
  buildReleaseMetadata,
  formatReleaseNotes,
  METADATA_FILE,
  writeMetadata,
  type BinaryMetadata,
  type ProbedBinary,
  type ReleaseMetadata,
} from './metadata.js'
import { getReleaseInfo, type ReleaseInfo } from './platform.js'
import {
  publishRelease,
  type CommandRunner,
  type PublishResult,
} from './publish.js'
import {
  findBinaries,
  type ContentProbe,
  type DiscoveredBinary,
} from './scan.js'

export type HarvestDeps = {
  logger: Logger
  probe: ContentProbe
  fetch?: FetchLike
  runner?: CommandRunner
  onProgress?: ProgressCallback
  now?: () => Date
}

export type StagedRelease = {
  tag: string
  directory: string
  files: string[]
  metadata: BinaryMetadata | ReleaseMetadata
}

export type HarvestOutcome =
  | { kind: 'listed'; binaries: DiscoveredBinary[] }
  | { kind: 'empty'; missing: string[] }
  | { kind: 'staged'; releases: StagedRelease[] }
  | { kind: 'published'; releases: StagedRelease[]; results: PublishResult[] }

/**
 * Download, extract, scan and stage one release archive.
 */
export async function harvest(
  config: HarvestConfig,
  deps: HarvestDeps,
): Promise<HarvestOutcome> {
  const { logger, probe, now = () => new Date() } = deps

  await mkdir(config.cacheDir, { recursive: true })
  await mkdir(config.extractDir, { recursive: true })
  await mkdir(config.outputDir, { recursive: true })

  const archive = await fetchArchive({
    url: config.url,
    cacheDir: config.cacheDir,
    noCache: config.noCache,
    logger,
    fetch: deps.fetch,
    onProgress: deps.onProgress,
  })
  const extracted = await extractArchiveCached({
    url: config.url,
    archivePath: archive.path,
    extractDir: config.extractDir,
    noCache: config.noCache,
    logger,
  })

  if (config.listOnly) {
    const binaries = await findBinaries({
      directory: extracted.path,
      filter: null,
      probe,
    })
    reportAvailable(binaries, config.filter, logger)
    return { kind: 'listed', binaries }
  }

  logger.step('Processing binaries...')
  const binaries = await findBinaries({
    directory: extracted.path,
    filter: config.filter,
    probe,
  })

  if (binaries.length === 0) {
    logger.warn('No matching binaries found!')
    const missing = config.filter ? getRequestedNames(config.filter) : []
    if (config.filter) {
      logger.info(`\nRequested binaries (from ${config.filter.source}):`)
      for (const name of missing) {
        logger.info(`  ✗ ${name}`)
      }
    }
    return { kind: 'empty', missing }
  }

  if (config.filter) {
    const missing = getMissingNames(
      config.filter,
      binaries.map((binary) => binary.fileName),
    )
    if (missing.length > 0) {
      logger.warn(`Requested binaries not found: ${missing.join(', ')}`)
    }
  }

  const probed = await probeAll(dropDuplicates(binaries, config.layout, logger), probe)
  const info = getReleaseInfo({ url: config.url, product: config.product })
  const extractedAt = now()

  const stageOptions = { binaries: probed, info, extractedAt, config, logger }
  const releases =
    config.layout === 'flat'
      ? [await stageFlat(stageOptions)]
      : await stagePerBinary(stageOptions)

  logger.success(`Extraction complete! Files saved in ${config.outputDir}`)
  for (const release of releases) {
    logger.info(`Release tag will be: ${release.tag}`)
  }
  logger.info('\nCache locations:')
  logger.info(`  Downloaded tarballs: ${config.cacheDir}`)
  logger.info(`  Extracted files: ${config.extractDir}`)

  if (!config.publish) {
    return { kind: 'staged', releases }
  }

  logger.step('Publishing releases...')
  const notes = formatReleaseNotes({
    info,
    extractedAt: extractedAt.toISOString(),
  })
  const results: PublishResult[] = []
  for (const release of releases) {
    results.push(
      await publishRelease({
        release: { tag: release.tag, files: release.files, notes },
        token: config.token,
        repo: config.repo,
        env: config.env,
        runner: deps.runner,
        logger,
      }),
    )
  }

  return { kind: 'published', releases, results }
}

function reportAvailable(
  binaries: DiscoveredBinary[],
  filter: BinaryFilter | null,
  logger: Logger,
): void {
  logger.info('Available binaries:')
  const names = [...new Set(binaries.map((binary) => binary.name))].sort()
  for (const name of names) {
    logger.info(`  ${name}`)
  }

  if (filter) {
    const available = new Set(names)
    logger.info(`\nFiltered binaries (from ${filter.source}):`)
    for (const name of getRequestedNames(filter)) {
      logger.info(`  ${available.has(name) ? '✓' : '✗'} ${name}`)
    }
  }
}

// Flat copies share one directory and per-binary releases are tagged by name,
// so only the first binary of each key is staged.
function dropDuplicates(
  binaries: DiscoveredBinary[],
  layout: Layout,
  logger: Logger,
): DiscoveredBinary[] {
  const seen = new Map<string, string>()
  const unique: DiscoveredBinary[] = []
  for (const binary of binaries) {
    const key = layout === 'flat' ? binary.fileName : binary.name
    const first = seen.get(key)
    if (first !== undefined) {
      logger.warn(`Skipping ${binary.path}: ${key} already staged from ${first}`)
      continue
    }
    seen.set(key, binary.path)
    unique.push(binary)
  }
  return unique
}

async function probeAll(
  binaries: DiscoveredBinary[],
  probe: ContentProbe,
): Promise<ProbedBinary[]> {
  const probed: ProbedBinary[] = []
  for (const binary of binaries) {
    const contentType =
      binary.contentType ?? (await probe.describe(binary.path))
    probed.push({ ...binary, contentType })
  }
  return probed
}

type StageOptions = {
  binaries: ProbedBinary[]
  info: ReleaseInfo
  extractedAt: Date
  config: HarvestConfig
  logger: Logger
}

async function copyBinary(source: string, destination: string): Promise<void> {
  await cp(source, destination, {
    dereference: true,
    preserveTimestamps: true,
    force: true,
  })
  if (!isExeName(destination)) {
    await makeExecutable(destination)
  }
}

async function stagePerBinary(
  options: StageOptions,
): Promise<StagedRelease[]> {
  const { binaries, info, extractedAt, config, logger } = options
  const releases: StagedRelease[] = []

  for (const binary of binaries) {
    const metadata = buildBinaryMetadata({ binary, info, extractedAt })
    const directory = join(config.outputDir, metadata.release_tag)
    await mkdir(directory, { recursive: true })

    const binaryPath = join(directory, binary.fileName)
    await copyBinary(binary.path, binaryPath)
    const metadataPath = join(directory, METADATA_FILE)
    await writeMetadata(metadataPath, metadata)
    logger.info(`Copied ${binary.fileName} to ${binaryPath}`)

    releases.push({
      tag: metadata.release_tag,
      directory,
      files: [binaryPath, metadataPath],
      metadata,
    })
  }

  return releases
}

async function stageFlat(options: StageOptions): Promise<StagedRelease> {
  const { binaries, info, extractedAt, config, logger } = options
  const metadata = buildReleaseMetadata({ binaries, info, extractedAt })
  const files: string[] = []

  for (const binary of binaries) {
    const binaryPath = join(config.outputDir, binary.fileName)
    await copyBinary(binary.path, binaryPath)
    logger.info(`Copied ${binary.fileName} to ${binaryPath}`)
    files.push(binaryPath)
  }

  const metadataPath = join(config.outputDir, METADATA_FILE)
  await writeMetadata(metadataPath, metadata)
  files.push(metadataPath)

  return {
    tag: metadata.release_tag,
    directory: config.outputDir,
    files,
    metadata,
  }
}
