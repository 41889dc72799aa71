// Cache management
export {
  type CacheOptions,
  type CacheLookup,
  type ClearCacheResult,
  getCacheDir,
  getUrlFileName,
  getArchiveStem,
  getDownloadCachePath,
  getExtractCachePath,
  lookupCacheEntry,
  readCacheSource,
  writeCacheSource,
  removeCacheEntry,
  clearCache,
} from './cache.js'

// Download utilities
export {
  type FetchLike,
  type ProgressCallback,
  type DownloadOptions,
  type DownloadResult,
  type FetchArchiveOptions,
  type FetchArchiveResult,
  downloadFile,
  fetchArchive,
  formatBytes,
  createProgressLogger,
} from './download.js'

// Extract utilities
export {
  type ArchiveType,
  type ExtractOptions,
  type ExtractResult,
  type ExtractArchiveCachedOptions,
  type ExtractArchiveCachedResult,
  getArchiveType,
  listArchiveMembers,
  hasNestedMembers,
  normalizeMember,
  getStripCount,
  extractTar,
  extractArchiveCached,
  makeExecutable,
} from './extract.js'

// Binary discovery
export {
  type BinaryFilter,
  createBinaryFilter,
  matchesFilter,
  getRequestedNames,
  getMissingNames,
  parseBinaryList,
  parseInlineBinaries,
  loadBinaryFilter,
  stripExe,
  isExeName,
} from './filter.js'
export {
  type ContentProbe,
  type DiscoveredBinary,
  type FindBinariesOptions,
  createFileCommandProbe,
  classifyBinary,
  findBinaries,
  isTextual,
} from './scan.js'

// Release metadata
export {
  type Architecture,
  type OperatingSystem,
  type ReleaseInfo,
  DEFAULT_PRODUCT,
  parseVersion,
  detectArchitecture,
  detectOperatingSystem,
  getReleaseInfo,
  composeReleaseTag,
} from './platform.js'
export {
  type BinaryMetadata,
  type ReleaseMetadata,
  METADATA_FILE,
  buildBinaryMetadata,
  buildReleaseMetadata,
  formatReleaseNotes,
} from './metadata.js'

// Pipeline
export {
  type HarvestDeps,
  type HarvestOutcome,
  type StagedRelease,
  harvest,
} from './packager.js'
export {
  type CommandRunner,
  type PublishResult,
  type ReleaseToPublish,
  buildReleaseCommand,
  publishRelease,
} from './publish.js'
export {
  type CliOptions,
  type HarvestConfig,
  type Layout,
  resolveConfig,
  resolveCachePaths,
} from './config.js'
export { type Logger, createLogger } from './logger.js'
export * from './errors.js'
