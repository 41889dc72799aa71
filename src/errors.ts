export class HarvestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'HarvestError'
  }
}

export class DownloadError extends HarvestError {
  readonly statusCode: number | undefined

  constructor(
    message: string,
    options: { statusCode?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause })
    this.name = 'DownloadError'
    this.statusCode = options.statusCode
  }
}

export class ExtractError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ExtractError'
  }
}

export class ProbeError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ProbeError'
  }
}

export class PublishError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PublishError'
  }
}

export class ConfigError extends HarvestError {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
