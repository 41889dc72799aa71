import { homedir } from 'node:os'
import { extname, join, posix } from 'node:path'
import { readFile, rm, writeFile } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { HarvestError, isNotFoundError } from './errors.js'

export type CacheOptions = {
  cacheDir?: string
  env?: NodeJS.ProcessEnv
  platform?: NodeJS.Platform
}

export function getCacheDir(options: CacheOptions = {}): string {
  const { cacheDir, env = {}, platform = process.platform } = options

  if (cacheDir) {
    return cacheDir
  }

  if (env['BINHARVEST_CACHE_DIR']) {
    return env['BINHARVEST_CACHE_DIR']
  }

  // Follow XDG Base Directory Specification on Unix
  if (platform !== 'win32' && env['XDG_CACHE_HOME']) {
    return join(env['XDG_CACHE_HOME'], 'binharvest')
  }

  if (platform === 'win32') {
    return join(
      env['LOCALAPPDATA'] || join(homedir(), 'AppData', 'Local'),
      'binharvest',
      'cache',
    )
  }

  return join(homedir(), '.cache', 'binharvest')
}

/**
 * Final path segment of a URL, ignoring query string and fragment.
 */
export function getUrlFileName(url: string): string {
  let fileName: string
  try {
    fileName = decodeURIComponent(posix.basename(new URL(url).pathname))
  } catch {
    throw new HarvestError(`Invalid URL: ${url}`)
  }

  if (!fileName) {
    throw new HarvestError(`Cannot derive a file name from URL: ${url}`)
  }
  return fileName
}

export function getArchiveStem(fileName: string): string {
  let stem = fileName.slice(0, fileName.length - extname(fileName).length)
  if (stem.endsWith('.tar')) {
    stem = stem.slice(0, -'.tar'.length)
  }
  return stem
}

export function getDownloadCachePath(options: {
  url: string
  cacheDir: string
}): string {
  const { url, cacheDir } = options
  return join(cacheDir, getUrlFileName(url))
}

export function getExtractCachePath(options: {
  url: string
  extractDir: string
}): string {
  const { url, extractDir } = options
  return join(extractDir, getArchiveStem(getUrlFileName(url)))
}

export type CacheLookup =
  | { status: 'hit' }
  | { status: 'miss' }
  | { status: 'conflict'; recordedUrl: string }

function getSourceRecordPath(entryPath: string): string {
  return `${entryPath}.url`
}

/**
 * Decides whether the slot at `entryPath` may be reused for `url`. Slots
 * without a source record predate it and are trusted.
 */
export async function lookupCacheEntry(
  entryPath: string,
  url: string,
): Promise<CacheLookup> {
  if (!existsSync(entryPath)) {
    return { status: 'miss' }
  }

  const recordedUrl = await readCacheSource(entryPath)
  if (recordedUrl !== null && recordedUrl !== url) {
    return { status: 'conflict', recordedUrl }
  }
  return { status: 'hit' }
}

export async function readCacheSource(
  entryPath: string,
): Promise<string | null> {
  try {
    const content = await readFile(getSourceRecordPath(entryPath), 'utf-8')
    return content.trim() || null
  } catch (error) {
    if (isNotFoundError(error)) {
      return null
    }
    throw error
  }
}

export async function writeCacheSource(
  entryPath: string,
  url: string,
): Promise<void> {
  await writeFile(getSourceRecordPath(entryPath), `${url}\n`)
}

export async function removeCacheEntry(entryPath: string): Promise<void> {
  await rm(entryPath, { recursive: true, force: true })
  await rm(getSourceRecordPath(entryPath), { force: true })
}

export type ClearCacheResult = {
  cacheDir: boolean
  extractDir: boolean
}

export async function clearCache(options: {
  cacheDir: string
  extractDir: string
}): Promise<ClearCacheResult> {
  const { cacheDir, extractDir } = options
  const result: ClearCacheResult = {
    cacheDir: existsSync(cacheDir),
    extractDir: existsSync(extractDir),
  }

  if (result.cacheDir) {
    await rm(cacheDir, { recursive: true, force: true })
  }
  if (result.extractDir) {
    await rm(extractDir, { recursive: true, force: true })
  }

  return result
}
