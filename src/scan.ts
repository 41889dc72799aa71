import { execFile } from 'node:child_process'
import { access, readdir, stat } from 'node:fs/promises'
import { constants } from 'node:fs'
import { join } from 'node:path'
import { promisify } from 'node:util'
import { getErrorMessage, isNotFoundError, ProbeError } from './errors.js'
import {
  isExeName,
  matchesFilter,
  stripExe,
  type BinaryFilter,
} from './filter.js'

const execFileAsync = promisify(execFile)

/**
 * Reports what kind of content a file holds, in the style of `file -b`.
 */
export type ContentProbe = {
  describe: (path: string) => Promise<string>
}

export function createFileCommandProbe(command = 'file'): ContentProbe {
  return {
    describe: async (path) => {
      try {
        const { stdout } = await execFileAsync(command, ['-b', '-L', path])
        return stdout.trim()
      } catch (error) {
        throw new ProbeError(
          `Content probe '${command}' failed for ${path}: ${getErrorMessage(error)}`,
          { cause: error },
        )
      }
    },
  }
}

export function isTextual(description: string): boolean {
  return description.toLowerCase().includes('text')
}

export type DiscoveredBinary = {
  path: string
  fileName: string
  // File name without a trailing .exe
  name: string
  // Probe output; null for .exe files, which are accepted without probing
  contentType: string | null
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK)
    return true
  } catch {
    return false
  }
}

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile()
  } catch (error) {
    // Dangling symlink
    if (isNotFoundError(error)) {
      return false
    }
    throw error
  }
}

export async function classifyBinary(
  path: string,
  fileName: string,
  probe: ContentProbe,
): Promise<DiscoveredBinary | null> {
  if (!(await isRegularFile(path))) {
    return null
  }

  const binary = { path, fileName, name: stripExe(fileName) }

  if (isExeName(fileName)) {
    return { ...binary, contentType: null }
  }

  if (!(await isExecutable(path))) {
    return null
  }

  const contentType = await probe.describe(path)
  return isTextual(contentType) ? null : { ...binary, contentType }
}

export type FindBinariesOptions = {
  directory: string
  filter: BinaryFilter | null
  probe: ContentProbe
}

/**
 * Walks `directory` and returns every binary the filter accepts, ordered by
 * file name and then path.
 */
export async function findBinaries(
  options: FindBinariesOptions,
): Promise<DiscoveredBinary[]> {
  const { directory, filter, probe } = options
  const found = new Map<string, DiscoveredBinary>()

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true })

    for (const entry of entries) {
      const fullPath = join(dir, entry.name)
      if (entry.isDirectory()) {
        await walk(fullPath)
        continue
      }
      // Filter by name first so the probe only runs on candidates
      if (!matchesFilter(filter, entry.name) || found.has(fullPath)) {
        continue
      }

      const binary = await classifyBinary(fullPath, entry.name, probe)
      if (binary) {
        found.set(fullPath, binary)
      }
    }
  }

  await walk(directory)

  return [...found.values()].sort(compareBinaries)
}

function compareBinaries(a: DiscoveredBinary, b: DiscoveredBinary): number {
  if (a.fileName !== b.fileName) {
    return a.fileName < b.fileName ? -1 : 1
  }
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0
}
