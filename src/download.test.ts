import { existsSync } from 'node:fs'
import { mkdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  createProgressLogger,
  downloadFile,
  fetchArchive,
  formatBytes,
} from './download.js'
import { DownloadError } from './errors.js'
import {
  createFakeFetch,
  createRecordingLogger,
  createTempDir,
  messages,
} from './test-utils.js'

const URL = 'https://example.com/releases/LLVM-19.1.2-Linux-X64.tar.gz'

describe('downloadFile', () => {
  let root: string
  let cleanup: () => Promise<void>

  beforeEach(async () => {
    ;({ path: root, cleanup } = await createTempDir())
  })

  afterEach(async () => {
    await cleanup()
  })

  it('streams the body to disk and reports progress', async () => {
    const destination = join(root, 'nested', 'file.bin')
    const onProgress = vi.fn()
    const fetch = createFakeFetch('hello world', {
      status: 200,
      headers: { 'content-length': '11' },
    })

    const result = await downloadFile({
      url: URL,
      destination,
      fetch,
      onProgress,
    })

    expect(result).toEqual({ path: destination, size: 11 })
    expect(await readFile(destination, 'utf-8')).toBe('hello world')
    expect(onProgress).toHaveBeenLastCalledWith(11, 11)
  })

  it('fails on a non-success status', async () => {
    const destination = join(root, 'file.bin')
    const fetch = createFakeFetch('missing', {
      status: 404,
      statusText: 'Not Found',
    })

    const error = await downloadFile({ url: URL, destination, fetch }).catch(
      (caught: unknown) => caught,
    )

    expect(error).toBeInstanceOf(DownloadError)
    expect(error).toMatchObject({
      statusCode: 404,
      message: `Failed to download ${URL}: 404 Not Found`,
    })
    expect(existsSync(destination)).toBe(false)
  })

  it('rejects when the destination cannot be opened', async () => {
    const destination = join(root, 'occupied')
    await mkdir(destination)
    // Body that never delivers a chunk
    const body = new ReadableStream<Uint8Array>()
    const fetch = async (): Promise<Response> => new Response(body)

    await expect(
      downloadFile({ url: URL, destination, fetch }),
    ).rejects.toThrow(`Cannot write ${destination}: EISDIR`)
  })

  it('wraps network errors', async () => {
    const fetch = async (): Promise<Response> => {
      throw new TypeError('fetch failed')
    }

    await expect(
      downloadFile({ url: URL, destination: join(root, 'x'), fetch }),
    ).rejects.toThrow(`Network error while downloading ${URL}: fetch failed`)
  })
})

describe('fetchArchive', () => {
  let root: string
  let cleanup: () => Promise<void>

  beforeEach(async () => {
    ;({ path: root, cleanup } = await createTempDir())
  })

  afterEach(async () => {
    await cleanup()
  })

  it('downloads on a miss and records the source URL', async () => {
    const fetch = createFakeFetch('archive-bytes')
    const logger = createRecordingLogger()
    const cachePath = join(root, 'LLVM-19.1.2-Linux-X64.tar.gz')

    const result = await fetchArchive({
      url: URL,
      cacheDir: root,
      noCache: false,
      logger,
      fetch,
    })

    expect(result).toEqual({ path: cachePath, cached: false })
    expect(fetch.calls).toEqual([URL])
    expect(await readFile(cachePath, 'utf-8')).toBe('archive-bytes')
    expect(await readFile(`${cachePath}.url`, 'utf-8')).toBe(`${URL}\n`)
    expect(messages(logger, 'info')).toEqual([
      `Cache miss. Downloading to cache: ${cachePath}`,
    ])
  })

  it('leaves nothing in the slot when the body fails midway', async () => {
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('partial'))
        controller.error(new Error('connection reset'))
      },
    })
    const cachePath = join(root, 'LLVM-19.1.2-Linux-X64.tar.gz')

    await expect(
      fetchArchive({
        url: URL,
        cacheDir: root,
        noCache: false,
        logger: createRecordingLogger(),
        fetch: async () => new Response(body),
      }),
    ).rejects.toThrow(`Download of ${URL} failed: connection reset`)
    expect(existsSync(cachePath)).toBe(false)
    expect(existsSync(`${cachePath}.part`)).toBe(false)
    expect(existsSync(`${cachePath}.url`)).toBe(false)
  })

  it('closes the progress report once the size is known', async () => {
    const onProgress = vi.fn()

    await fetchArchive({
      url: URL,
      cacheDir: root,
      noCache: false,
      logger: createRecordingLogger(),
      fetch: createFakeFetch('archive-bytes'),
      onProgress,
    })

    expect(onProgress).toHaveBeenCalledWith(13, 0)
    expect(onProgress).toHaveBeenLastCalledWith(13, 13)
  })

  it('reuses the cached file without touching the network', async () => {
    const fetch = createFakeFetch('archive-bytes')
    const logger = createRecordingLogger()
    const options = { url: URL, cacheDir: root, noCache: false, logger, fetch }

    const first = await fetchArchive(options)
    const second = await fetchArchive(options)

    expect(second).toEqual({ path: first.path, cached: true })
    expect(fetch.calls).toHaveLength(1)
    expect(messages(logger, 'info')).toContain(
      `Cache hit! Using cached version from: ${first.path}`,
    )
  })

  it('always downloads when caching is disabled', async () => {
    const fetch = createFakeFetch('archive-bytes')
    const logger = createRecordingLogger()
    const options = { url: URL, cacheDir: root, noCache: true, logger, fetch }

    await fetchArchive(options)
    const second = await fetchArchive(options)

    expect(second.cached).toBe(false)
    expect(fetch.calls).toHaveLength(2)
    expect(messages(logger, 'info')).toContain(
      `Cache disabled, downloading: ${second.path}`,
    )
  })

  it('replaces a slot that another URL produced', async () => {
    const mirror = 'https://mirror.example.com/LLVM-19.1.2-Linux-X64.tar.gz'
    const logger = createRecordingLogger()
    await fetchArchive({
      url: mirror,
      cacheDir: root,
      noCache: false,
      logger,
      fetch: createFakeFetch('mirror-bytes'),
    })

    const fetch = createFakeFetch('origin-bytes')
    const result = await fetchArchive({
      url: URL,
      cacheDir: root,
      noCache: false,
      logger,
      fetch,
    })

    expect(result.cached).toBe(false)
    expect(fetch.calls).toEqual([URL])
    expect(await readFile(result.path, 'utf-8')).toBe('origin-bytes')
    expect(messages(logger, 'warn')).toEqual([
      `Cache slot ${result.path} was downloaded from ${mirror}; replacing it`,
    ])
  })
})

describe('createProgressLogger', () => {
  it('ends the line once the download reaches its total', () => {
    const chunks: string[] = []
    const report = createProgressLogger({
      stream: { write: (chunk: string) => chunks.push(chunk) },
    })

    report(512, 0)
    report(1536, 1536)
    report(1536, 1536)

    expect(chunks).toEqual([
      '\rDownloading... 0% (512 B/unknown)',
      '\rDownloading... 100% (1.5 KB/1.5 KB)',
      '\n',
    ])
  })
})

describe('formatBytes', () => {
  it.each([
    [0, '0 B'],
    [512, '512 B'],
    [1536, '1.5 KB'],
    [2621440, '2.5 MB'],
  ])('%i -> %s', (bytes, expected) => {
    expect(formatBytes(bytes)).toBe(expected)
  })
})
