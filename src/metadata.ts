import { writeFile } from 'node:fs/promises'
import type { DiscoveredBinary } from './scan.js'
import { composeReleaseTag, type ReleaseInfo } from './platform.js'

export const METADATA_FILE = 'metadata.json'

// Key names are read by release workflows (`jq -r .release_tag`), so the
// file keeps snake_case.
export type BinaryMetadata = {
  name: string
  file_name: string
  version: string
  platform: string
  os: string
  release_tag: string
  source_url: string
  content_type: string
  extraction_date: string
}

export type ReleaseMetadata = {
  product: string
  version: string
  platform: string
  os: string
  release_tag: string
  source_url: string
  extraction_date: string
  processed_binaries: string[]
  binaries: Array<{ name: string; file_name: string; content_type: string }>
}

export type ProbedBinary = DiscoveredBinary & { contentType: string }

export function buildBinaryMetadata(options: {
  binary: ProbedBinary
  info: ReleaseInfo
  extractedAt: Date
}): BinaryMetadata {
  const { binary, info, extractedAt } = options
  return {
    name: binary.name,
    file_name: binary.fileName,
    version: info.version,
    platform: info.platform,
    os: info.os,
    release_tag: composeReleaseTag({ name: binary.name, info }),
    source_url: info.sourceUrl,
    content_type: binary.contentType,
    extraction_date: extractedAt.toISOString(),
  }
}

export function buildReleaseMetadata(options: {
  binaries: ProbedBinary[]
  info: ReleaseInfo
  extractedAt: Date
}): ReleaseMetadata {
  const { binaries, info, extractedAt } = options
  return {
    product: info.product,
    version: info.version,
    platform: info.platform,
    os: info.os,
    release_tag: composeReleaseTag({
      name: info.product.toLowerCase(),
      info,
    }),
    source_url: info.sourceUrl,
    extraction_date: extractedAt.toISOString(),
    processed_binaries: [...new Set(binaries.map(({ name }) => name))].sort(),
    binaries: binaries.map(({ name, fileName, contentType }) => ({
      name,
      file_name: fileName,
      content_type: contentType,
    })),
  }
}

export function formatReleaseNotes(options: {
  info: ReleaseInfo
  extractedAt: string
}): string {
  const { info, extractedAt } = options
  return [
    `${info.product} binaries extracted from ${info.sourceUrl}`,
    '',
    `Version: ${info.version}`,
    `Platform: ${info.platform}`,
    `OS: ${info.os}`,
    '',
    `Extraction Date: ${extractedAt}`,
  ].join('\n')
}

export async function writeMetadata(
  path: string,
  metadata: BinaryMetadata | ReleaseMetadata,
): Promise<void> {
  await writeFile(path, `${JSON.stringify(metadata, null, 2)}\n`)
}
