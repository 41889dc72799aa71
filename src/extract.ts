import { createWriteStream } from 'node:fs'
import { chmod, mkdir, mkdtemp, rm } from 'node:fs/promises'
import { spawn } from 'node:child_process'
import { tmpdir } from 'node:os'
import { basename, join } from 'node:path'
import { pipeline } from 'node:stream/promises'
import { extract as tarExtract, list as tarList } from 'tar'
import {
  getExtractCachePath,
  lookupCacheEntry,
  removeCacheEntry,
  writeCacheSource,
} from './cache.js'
import { ExtractError, getErrorMessage } from './errors.js'
import type { Logger } from './logger.js'

export type ArchiveType =
  | 'tar'
  | 'tar.gz'
  | 'tar.xz'
  | 'tar.bz2'
  | 'tar.zst'
  | 'unknown'

const SUFFIXES: Array<[string, ArchiveType]> = [
  ['.tar.gz', 'tar.gz'],
  ['.tgz', 'tar.gz'],
  ['.tar.xz', 'tar.xz'],
  ['.txz', 'tar.xz'],
  ['.tar.bz2', 'tar.bz2'],
  ['.tbz2', 'tar.bz2'],
  ['.tar.zst', 'tar.zst'],
  ['.tar', 'tar'],
]

// Formats the tar library cannot read on its own; piped through these first.
const DECOMPRESSORS: Record<'tar.xz' | 'tar.bz2' | 'tar.zst', string[]> = {
  'tar.xz': ['xz', '-dc'],
  'tar.bz2': ['bzip2', '-dc'],
  'tar.zst': ['zstd', '-dc'],
}

export const SCRATCH_PREFIX = 'binharvest-scratch-'

export function getArchiveType(filename: string): ArchiveType {
  const lower = filename.toLowerCase()
  for (const [suffix, type] of SUFFIXES) {
    if (lower.endsWith(suffix)) {
      return type
    }
  }
  return 'unknown'
}

export async function listArchiveMembers(tarPath: string): Promise<string[]> {
  const members: string[] = []
  await tarList({
    file: tarPath,
    strict: true,
    onReadEntry: (entry) => {
      members.push(entry.path)
    },
  })
  return members
}

function countLeadingDots(member: string): number {
  const parts = member.split('/')
  let count = 0
  while (parts[count] === '.') {
    count += 1
  }
  return count
}

/**
 * Member path without leading `./` components or trailing slashes, so
 * `./LLVM-19/bin/` becomes `LLVM-19/bin`.
 */
export function normalizeMember(member: string): string {
  return member
    .split('/')
    .slice(countLeadingDots(member))
    .join('/')
    .replace(/\/+$/, '')
}

/**
 * True when any member sits below a directory, i.e. the archive wraps its
 * content in a top-level folder that should be dropped.
 */
export function hasNestedMembers(members: string[]): boolean {
  return members.some((member) => normalizeMember(member).includes('/'))
}

/**
 * Number of leading components `tar` must drop: every `.` component the
 * members share, plus the root folder when the archive has one.
 */
export function getStripCount(members: string[]): number {
  if (members.length === 0) {
    return 0
  }
  const dots = Math.min(...members.map(countLeadingDots))
  return dots + (hasNestedMembers(members) ? 1 : 0)
}

export type ExtractOptions = {
  archivePath: string
  destination: string
}

export type ExtractResult = {
  members: number
  strippedRoot: boolean
}

export async function extractTar(
  options: ExtractOptions,
): Promise<ExtractResult> {
  const { archivePath, destination } = options
  const archiveType = getArchiveType(basename(archivePath))

  if (archiveType === 'unknown') {
    throw new ExtractError(
      `Unknown archive type for ${archivePath}. ` +
        `Supported formats: .tar, .tar.gz, .tgz, .tar.xz, .txz, .tar.bz2, .tbz2, .tar.zst`,
    )
  }

  let scratchDir: string | null = null
  try {
    let tarPath = archivePath
    if (
      archiveType === 'tar.xz' ||
      archiveType === 'tar.bz2' ||
      archiveType === 'tar.zst'
    ) {
      scratchDir = await mkdtemp(join(tmpdir(), SCRATCH_PREFIX))
      tarPath = join(scratchDir, 'archive.tar')
      await decompress(DECOMPRESSORS[archiveType], archivePath, tarPath)
    }

    const members = await listArchiveMembers(tarPath)
    if (members.length === 0) {
      throw new ExtractError(`Archive ${archivePath} contains no entries`)
    }

    const strippedRoot = hasNestedMembers(members)
    await mkdir(destination, { recursive: true })
    await tarExtract({
      file: tarPath,
      cwd: destination,
      strip: getStripCount(members),
    })

    return { members: members.length, strippedRoot }
  } catch (error) {
    if (error instanceof ExtractError) {
      throw error
    }
    throw new ExtractError(
      `Failed to extract ${archivePath}: ${getErrorMessage(error)}`,
      { cause: error },
    )
  } finally {
    if (scratchDir) {
      await rm(scratchDir, { recursive: true, force: true })
    }
  }
}

async function decompress(
  command: string[],
  source: string,
  destination: string,
): Promise<void> {
  const [program, ...args] = command
  if (!program) {
    throw new ExtractError('No decompressor configured')
  }

  const child = spawn(program, [...args, source], {
    stdio: ['ignore', 'pipe', 'pipe'],
  })
  let stderr = ''
  child.stderr.setEncoding('utf-8')
  child.stderr.on('data', (chunk: string) => {
    stderr += chunk
  })

  const exited = new Promise<number | null>((resolve, reject) => {
    child.once('error', reject)
    child.once('close', resolve)
  })

  let code: number | null
  try {
    const [, exitCode] = await Promise.all([
      pipeline(child.stdout, createWriteStream(destination)),
      exited,
    ])
    code = exitCode
  } catch (error) {
    child.kill()
    throw new ExtractError(
      `${program} failed to decompress ${source}: ${getErrorMessage(error)}`,
      { cause: error },
    )
  }

  if (code !== 0) {
    throw new ExtractError(
      `${program} exited with code ${String(code)} while decompressing ${source}: ${stderr.trim()}`,
    )
  }
}

export type ExtractArchiveCachedOptions = {
  url: string
  archivePath: string
  extractDir: string
  noCache: boolean
  logger: Logger
}

export type ExtractArchiveCachedResult = {
  path: string
  cached: boolean
}

/**
 * Unpacks the archive into its slot under `extractDir`, reusing a previous
 * extraction of the same URL when caching is enabled.
 */
export async function extractArchiveCached(
  options: ExtractArchiveCachedOptions,
): Promise<ExtractArchiveCachedResult> {
  const { url, archivePath, extractDir, noCache, logger } = options
  const extractPath = getExtractCachePath({ url, extractDir })

  if (!noCache) {
    const lookup = await lookupCacheEntry(extractPath, url)
    if (lookup.status === 'hit') {
      logger.info(`Using cached extraction: ${extractPath}`)
      return { path: extractPath, cached: true }
    }
    if (lookup.status === 'conflict') {
      logger.warn(
        `Extraction ${extractPath} came from ${lookup.recordedUrl}; replacing it`,
      )
    }
  }

  logger.info(`Extracting archive to: ${extractPath}`)
  await removeCacheEntry(extractPath)

  try {
    const result = await extractTar({ archivePath, destination: extractPath })
    logger.debug(
      `Extracted ${result.members} entries${result.strippedRoot ? ' (root component stripped)' : ''}`,
    )
  } catch (error) {
    await removeCacheEntry(extractPath)
    throw error
  }
  await writeCacheSource(extractPath, url)

  logger.success('Extraction complete')
  return { path: extractPath, cached: false }
}

export async function makeExecutable(filePath: string): Promise<void> {
  if (process.platform !== 'win32') {
    await chmod(filePath, 0o755)
  }
}
