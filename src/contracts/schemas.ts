import { z } from 'zod'
import { DEFAULT_ALGORITHM, isSupportedAlgorithm } from '../checksum'

// Config schema
export const TreesumConfigSchema = z.object({
  checksum: z.object({
    algorithm: z.string()
      .refine(isSupportedAlgorithm, { message: 'unsupported checksum algorithm' })
      .default(DEFAULT_ALGORITHM),
  }).default({
    algorithm: DEFAULT_ALGORITHM,
  }),
  generate: z.object({
    concurrency: z.number().int().positive().optional(),
    progress: z.boolean().default(true),
  }).default({
    progress: true,
  }),
})
