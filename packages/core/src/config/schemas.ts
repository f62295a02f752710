import { z } from 'zod'

export const ServerConfigSchema = z.object({
  command: z.string().min(1, 'Server command is required'),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).default({}),
  cwd: z.string().optional(),
})
export type ServerConfig = z.infer<typeof ServerConfigSchema>

export const WatcherConfigSchema = z
  .object({
    intervalSeconds: z.number().int().positive().default(60),
    maxResults: z.number().int().positive().max(100).default(20),
    lookbackSeconds: z.number().int().positive().default(3600),
    processedCap: z.number().int().positive().default(1000),
    processedKeep: z.number().int().positive().default(500),
  })
  .refine((w) => w.processedKeep <= w.processedCap, {
    message: 'processedKeep must not exceed processedCap',
    path: ['processedKeep'],
  })

export const LlmConfigSchema = z.object({
  provider: z.enum(['anthropic', 'openai', 'ollama']).default('anthropic'),
  model: z.string().min(1).max(128).optional(),
  apiKey: z.string().optional(),
  ollamaBaseUrl: z.string().optional(),
  maxTokens: z.number().int().positive().optional(),
})

export const GmailCredentialsSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  refreshToken: z.string().min(1),
})
export type GmailCredentials = z.infer<typeof GmailCredentialsSchema>

export const HandoffConfigSchema = z.object({
  dir: z.string().optional(),
  agentCommand: z.string().min(1).default('claude'),
  /** Working directory for the prepared command when an action names none. */
  workdir: z.string().optional(),
})

/** Shape of the JSON config file. Paths are resolved by the loader. */
export const ConfigFileSchema = z.object({
  dataDir: z.string().optional(),
  databasePath: z.string().optional(),
  watcher: WatcherConfigSchema.default({}),
  llm: LlmConfigSchema.default({}),
  servers: z.record(ServerConfigSchema).default({}),
  gmail: GmailCredentialsSchema.optional(),
  handoff: HandoffConfigSchema.default({}),
})
export type ConfigFile = z.infer<typeof ConfigFileSchema>

export type WatcherConfig = z.infer<typeof WatcherConfigSchema>
export type LlmConfig = z.infer<typeof LlmConfigSchema>

export interface Config {
  dataDir: string
  databasePath: string
  watcher: WatcherConfig
  llm: LlmConfig
  servers: Record<string, ServerConfig>
  gmail: GmailCredentials | null
  handoff: {
    dir: string
    agentCommand: string
    workdir?: string
  }
}
