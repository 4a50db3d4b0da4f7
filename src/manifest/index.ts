export * from './types'
export { FAILURE_SENTINEL, formatEntry, parseLine, unrepresentableReason } from './format'
export { FileManifestSink, MemoryManifestSink } from './ManifestSink'
export { loadManifest, parseManifest, writeManifest } from './ManifestStore'
