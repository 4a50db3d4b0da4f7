export { ChecksumEngine, CHUNK_SIZE, DEFAULT_ALGORITHM, isSupportedAlgorithm } from './checksum'
export { enumerateFiles, collectFiles } from './enumerate/FileEnumerator'
export { mapCompleted, DEFAULT_CONCURRENCY } from './generator/WorkerPool'
export type { PoolOptions } from './generator/WorkerPool'
export { ManifestGenerator, toManifestPath } from './generator/ManifestGenerator'
export type { Digester, GenerateResult, ManifestGeneratorOptions } from './generator/ManifestGenerator'
export * from './manifest'
export * from './compare'
export * from './errors'
export { ConsoleLogger, silentLogger } from './logging/Logger'
export type { Logger, LogContext } from './logging/Logger'
export { TerminalProgressReporter, silentProgress } from './logging/ProgressReporter'
export type { ProgressReporter } from './logging/ProgressReporter'
export { ConfigLoader } from './config/ConfigLoader'
export type { TreesumConfig } from './contracts'
export { run } from './cli/run'
