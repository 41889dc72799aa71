import { createWriteStream } from 'node:fs'
import { mkdir, rename, unlink } from 'node:fs/promises'
import { once } from 'node:events'
import { dirname } from 'node:path'
import {
  getDownloadCachePath,
  lookupCacheEntry,
  removeCacheEntry,
  writeCacheSource,
} from './cache.js'
import { DownloadError, getErrorMessage } from './errors.js'
import type { Logger } from './logger.js'

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>

export type ProgressCallback = (downloaded: number, total: number) => void

export type DownloadOptions = {
  url: string
  destination: string
  fetch?: FetchLike
  onProgress?: ProgressCallback
}

export type DownloadResult = {
  path: string
  size: number
}

export async function downloadFile(
  options: DownloadOptions,
): Promise<DownloadResult> {
  const { url, destination, fetch: fetchImpl = fetch, onProgress } = options

  await mkdir(dirname(destination), { recursive: true })

  let response: Response
  try {
    response = await fetchImpl(url, {
      headers: {
        'User-Agent': 'binharvest/0.1.0',
      },
    })
  } catch (error) {
    throw new DownloadError(
      `Network error while downloading ${url}: ${getErrorMessage(error)}`,
      { cause: error },
    )
  }

  if (!response.ok) {
    throw new DownloadError(
      `Failed to download ${url}: ${response.status} ${response.statusText}`,
      { statusCode: response.status },
    )
  }

  if (!response.body) {
    throw new DownloadError(`No response body received from ${url}`)
  }

  const total = Number(response.headers.get('content-length')) || 0
  let downloaded = 0

  const fileStream = createWriteStream(destination)
  // Errors raised while waiting on the network are picked up after each read
  let streamError: unknown = null
  fileStream.on('error', (error) => {
    streamError = error
  })

  try {
    await once(fileStream, 'open')
  } catch (error) {
    await response.body.cancel().catch(() => undefined)
    throw new DownloadError(
      `Cannot write ${destination}: ${getErrorMessage(error)}`,
      { cause: error },
    )
  }

  const reader = response.body.getReader()

  try {
    while (true) {
      const { done, value } = await reader.read()
      if (streamError !== null) throw streamError
      if (done) break

      if (!fileStream.write(value)) {
        await once(fileStream, 'drain')
      }
      downloaded += value.length
      onProgress?.(downloaded, total)
    }

    fileStream.end()
    await once(fileStream, 'finish')
  } catch (error) {
    fileStream.destroy()
    await reader.cancel().catch(() => undefined)
    await unlink(destination).catch(() => undefined)
    throw new DownloadError(
      `Download of ${url} failed: ${getErrorMessage(error)}`,
      { cause: error },
    )
  } finally {
    reader.releaseLock()
  }

  return {
    path: destination,
    size: downloaded,
  }
}

export type FetchArchiveOptions = {
  url: string
  cacheDir: string
  noCache: boolean
  logger: Logger
  fetch?: FetchLike
  onProgress?: ProgressCallback
}

export type FetchArchiveResult = {
  path: string
  cached: boolean
}

/**
 * Downloads `url` into the download cache unless a cached copy from the
 * same URL is already there.
 */
export async function fetchArchive(
  options: FetchArchiveOptions,
): Promise<FetchArchiveResult> {
  const { url, cacheDir, noCache, logger, fetch, onProgress } = options
  const cachePath = getDownloadCachePath({ url, cacheDir })

  if (!noCache) {
    const lookup = await lookupCacheEntry(cachePath, url)
    if (lookup.status === 'hit') {
      logger.info(`Cache hit! Using cached version from: ${cachePath}`)
      return { path: cachePath, cached: true }
    }
    if (lookup.status === 'conflict') {
      logger.warn(
        `Cache slot ${cachePath} was downloaded from ${lookup.recordedUrl}; replacing it`,
      )
    }
  }

  logger.info(
    `${noCache ? 'Cache disabled, downloading' : 'Cache miss. Downloading to cache'}: ${cachePath}`,
  )
  await removeCacheEntry(cachePath)

  // Only complete downloads ever occupy the slot
  const partPath = `${cachePath}.part`
  const result = await downloadFile({
    url,
    destination: partPath,
    fetch,
    onProgress,
  })
  await rename(partPath, cachePath)
  await writeCacheSource(cachePath, url)
  // Closes the progress line when the server sent no content-length
  onProgress?.(result.size, result.size)

  logger.success(`Download complete (${formatBytes(result.size)})`)
  return { path: cachePath, cached: false }
}

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B'
  const k = 1024
  const sizes = ['B', 'KB', 'MB', 'GB']
  const i = Math.min(
    Math.floor(Math.log(bytes) / Math.log(k)),
    sizes.length - 1,
  )
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`
}

export function createProgressLogger(
  options: {
    prefix?: string
    stream?: { write: (chunk: string) => unknown }
  } = {},
): ProgressCallback {
  const { prefix = '', stream = process.stdout } = options
  let lastPercent = -1

  return (downloaded: number, total: number) => {
    const percent = total > 0 ? Math.round((downloaded / total) * 100) : 0

    if (percent !== lastPercent) {
      lastPercent = percent
      const downloadedStr = formatBytes(downloaded)
      const totalStr = total > 0 ? formatBytes(total) : 'unknown'
      stream.write(
        `\r${prefix}Downloading... ${percent}% (${downloadedStr}/${totalStr})`,
      )
      if (total > 0 && downloaded >= total) {
        stream.write('\n')
      }
    }
  }
}
