import { z } from 'zod'

export const EnvironmentSchema = z.enum(['development', 'test', 'production'])

// Rendering of labeled content
export const RenderingConfigSchema = z.object({
  debug: z.boolean().default(false),
})

// Logging configuration
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warning', 'alert', 'critical']).default('info'),
  audit: z
    .object({
      enabled: z.boolean().default(true),
      dir: z.string().min(1).optional(),
    })
    .default({}),
})

// Full application configuration
export const AppConfigSchema = z.object({
  version: z.number().int().positive().default(1),
  environment: EnvironmentSchema.default('production'),
  rendering: RenderingConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
})

export type AppConfig = z.infer<typeof AppConfigSchema>
export type Environment = z.infer<typeof EnvironmentSchema>
export type RenderingConfig = z.infer<typeof RenderingConfigSchema>
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>
