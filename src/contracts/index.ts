export * from './schemas'
export type { TreesumConfig, CommandResult } from './types'
