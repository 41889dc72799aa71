export type Architecture = 'arm64' | 'x86_64' | 'unknown'

export type OperatingSystem = 'darwin' | 'linux' | 'windows' | 'unknown'

export type ReleaseInfo = {
  product: string
  version: string
  platform: Architecture
  os: OperatingSystem
  sourceUrl: string
}

export const DEFAULT_PRODUCT = 'LLVM'

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * First `X.Y.Z` following `<product>-` in the URL,
 * e.g. `LLVM-19.1.2-macOS-ARM64.tar.xz` gives `19.1.2`.
 */
export function parseVersion(url: string, product = DEFAULT_PRODUCT): string {
  const pattern = new RegExp(`${escapeRegExp(product)}-(\\d+\\.\\d+\\.\\d+)`)
  const match = pattern.exec(url)
  return match?.[1] ?? 'unknown'
}

export function detectArchitecture(url: string): Architecture {
  const upper = url.toUpperCase()
  if (upper.includes('ARM64') || upper.includes('AARCH64')) return 'arm64'
  if (upper.includes('X86_64') || upper.includes('X64')) return 'x86_64'
  return 'unknown'
}

export function detectOperatingSystem(url: string): OperatingSystem {
  const lower = url.toLowerCase()
  if (lower.includes('macos') || lower.includes('darwin')) return 'darwin'
  if (lower.includes('linux')) return 'linux'
  if (lower.includes('windows') || lower.includes('win64')) return 'windows'
  return 'unknown'
}

export function getReleaseInfo(options: {
  url: string
  product?: string
}): ReleaseInfo {
  const { url, product = DEFAULT_PRODUCT } = options
  return {
    product,
    version: parseVersion(url, product),
    platform: detectArchitecture(url),
    os: detectOperatingSystem(url),
    sourceUrl: url,
  }
}

export function composeReleaseTag(options: {
  name: string
  info: ReleaseInfo
}): string {
  const { name, info } = options
  return [name, info.version, info.platform, info.os].join('-')
}
