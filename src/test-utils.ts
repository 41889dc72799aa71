import { spawnSync } from 'node:child_process'
import { chmod, mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import { create as tarCreate } from 'tar'
import type { FetchLike } from './download.js'
import type { Logger } from './logger.js'
import type { ContentProbe } from './scan.js'

export type LogLevel = keyof Logger

export type RecordedLine = {
  level: LogLevel
  message: string
}

/**
 * Logger that keeps every line in memory instead of printing it.
 */
export function createRecordingLogger(): Logger & { lines: RecordedLine[] } {
  const lines: RecordedLine[] = []
  const record = (level: LogLevel) => (message: string) => {
    lines.push({ level, message })
  }

  return {
    lines,
    info: record('info'),
    step: record('step'),
    success: record('success'),
    warn: record('warn'),
    error: record('error'),
    debug: record('debug'),
  }
}

export function messages(
  logger: { lines: RecordedLine[] },
  level?: LogLevel,
): string[] {
  return logger.lines
    .filter((line) => level === undefined || line.level === level)
    .map((line) => line.message)
}

export async function createTempDir(): Promise<{
  path: string
  cleanup: () => Promise<void>
}> {
  const path = await mkdtemp(join(tmpdir(), 'binharvest-test-'))
  return {
    path,
    cleanup: () => rm(path, { recursive: true, force: true }),
  }
}

export type FixtureFile = {
  content: string
  mode?: number
}

export async function writeTree(
  root: string,
  files: Record<string, FixtureFile>,
): Promise<void> {
  for (const [relativePath, file] of Object.entries(files)) {
    const fullPath = join(root, relativePath)
    await mkdir(dirname(fullPath), { recursive: true })
    await writeFile(fullPath, file.content)
    await chmod(fullPath, file.mode ?? 0o644)
  }
}

/**
 * Writes `files` below `workDir/tree` and packs `entries` (paths relative to
 * that tree) into a tarball at `archivePath`, gzipped unless `gzip` is false.
 */
export async function createTarball(options: {
  workDir: string
  archivePath: string
  files: Record<string, FixtureFile>
  entries: string[]
  gzip?: boolean
}): Promise<string> {
  const { workDir, archivePath, files, entries, gzip = true } = options
  const treeDir = join(workDir, 'tree')
  await writeTree(treeDir, files)
  await mkdir(dirname(archivePath), { recursive: true })
  await tarCreate({ gzip, file: archivePath, cwd: treeDir }, entries)
  return archivePath
}

export function hasCommand(command: string): boolean {
  return spawnSync(command, ['--version'], { stdio: 'ignore' }).status === 0
}

// Executables start with the ELF magic, scripts with a shebang.
export const ELF_CONTENT = '\x7fELF fixture'
export const SCRIPT_CONTENT = '#!/bin/sh\necho fixture\n'

/**
 * Classifies fixtures by content the way `file -b` would, without running it.
 */
export function createFakeProbe(): ContentProbe & { calls: string[] } {
  const calls: string[] = []
  return {
    calls,
    describe: async (path) => {
      calls.push(path)
      const content = await readFile(path, 'utf-8')
      if (content.startsWith('\x7fELF')) {
        return 'ELF 64-bit LSB executable, x86-64'
      }
      if (content.startsWith('#!')) {
        return 'POSIX shell script, ASCII text executable'
      }
      return 'ASCII text'
    },
  }
}

export function createFakeFetch(
  body: Uint8Array | string,
  init: ResponseInit = { status: 200 },
): FetchLike & { calls: string[] } {
  const calls: string[] = []
  const fake = async (url: string): Promise<Response> => {
    calls.push(url)
    if (typeof body === 'string') {
      return new Response(body, init)
    }
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(body)
        controller.close()
      },
    })
    return new Response(stream, init)
  }
  return Object.assign(fake, { calls })
}
