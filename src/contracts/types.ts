import { z } from 'zod'
import { TreesumConfigSchema } from './schemas'

export type TreesumConfig = z.infer<typeof TreesumConfigSchema>

export interface CommandResult {
  /** 0 on success, 130 when interrupted, 2 for an unknown command */
  exitCode: number
  /** Printed to stdout on success, stderr otherwise */
  output: string
}
