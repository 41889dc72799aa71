import { readFile } from 'node:fs/promises'
import { isNotFoundError } from './errors.js'

const EXE_SUFFIX = /\.exe$/i

export function stripExe(fileName: string): string {
  return fileName.replace(EXE_SUFFIX, '')
}

export function isExeName(fileName: string): boolean {
  return EXE_SUFFIX.test(fileName)
}

/**
 * Allow-list of binary names. Names are kept without their `.exe` suffix so
 * `clang` accepts both `clang` and `clang.exe`.
 */
export type BinaryFilter = {
  names: ReadonlySet<string>
  source: string
}

export function createBinaryFilter(
  names: Iterable<string>,
  source: string,
): BinaryFilter {
  return { names: new Set([...names].map(stripExe)), source }
}

export function matchesFilter(
  filter: BinaryFilter | null,
  fileName: string,
): boolean {
  return filter === null || filter.names.has(stripExe(fileName))
}

export function getRequestedNames(filter: BinaryFilter): string[] {
  return [...filter.names].sort()
}

export function getMissingNames(
  filter: BinaryFilter,
  foundFileNames: Iterable<string>,
): string[] {
  const found = new Set([...foundFileNames].map(stripExe))
  return getRequestedNames(filter).filter((name) => !found.has(name))
}

export function parseBinaryList(content: string): string[] {
  const names: string[] = []
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim()
    // Skip comments and empty lines
    if (line && !line.startsWith('#')) {
      names.push(line)
    }
  }
  return names
}

export function parseInlineBinaries(value: string): string[] {
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0)
}

export type LoadBinaryFilterOptions = {
  inline?: string
  file?: string
}

/**
 * `inline` (the comma-separated flag) takes precedence over `file`. Returns
 * null when neither yields a filter, including when the file does not exist.
 */
export async function loadBinaryFilter(
  options: LoadBinaryFilterOptions,
): Promise<BinaryFilter | null> {
  const { inline, file } = options

  if (inline !== undefined) {
    const names = parseInlineBinaries(inline)
    return names.length > 0 ? createBinaryFilter(names, '--binaries') : null
  }

  if (file === undefined) {
    return null
  }

  let content: string
  try {
    content = await readFile(file, 'utf-8')
  } catch (error) {
    if (isNotFoundError(error)) {
      return null
    }
    throw error
  }

  const names = parseBinaryList(content)
  return names.length > 0 ? createBinaryFilter(names, file) : null
}
