import { z } from 'zod'

export const ReportEncodingSchema = z.enum(['utf-8', 'utf8', 'utf16le', 'latin1'])

export const OutputFormatSchema = z.enum(['text', 'json'])

// Config schema
export const SpaceDiffConfigSchema = z.object({
  report: z.object({
    encoding: ReportEncodingSchema.default('utf-8'),
  }).default({
    encoding: 'utf-8',
  }),
  diff: z.object({
    partitions: z.number().int().positive().default(1),
  }).default({
    partitions: 1,
  }),
  output: z.object({
    format: OutputFormatSchema.default('text'),
    limit: z.number().int().positive().optional(),
  }).default({
    format: 'text',
  }),
})
