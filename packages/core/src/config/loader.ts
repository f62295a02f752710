/**
 * Config loading — JSON file at $TRIPWIRE_CONFIG or ~/.config/tripwire/config.json,
 * validated with zod. A missing file yields the defaults.
 */

import { existsSync, readFileSync } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { Ok, Err, TripwireError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { ConfigFileSchema } from './schemas.js'
import type { Config, ConfigFile, ServerConfig } from './schemas.js'

export interface LoadConfigOptions {
  /** Explicit config path; overrides $TRIPWIRE_CONFIG. */
  path?: string
  env?: NodeJS.ProcessEnv
  homeDir?: string
}

export function defaultConfigPath(env: NodeJS.ProcessEnv, homeDir: string): string {
  return env.TRIPWIRE_CONFIG ?? path.join(homeDir, '.config', 'tripwire', 'config.json')
}

/** Expand `${VAR}` references and a leading `~`. Unset variables expand to ''. */
export function expandValue(value: string, env: NodeJS.ProcessEnv, homeDir: string): string {
  const substituted = value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => env[name] ?? '')
  if (substituted === '~') return homeDir
  if (substituted.startsWith('~/')) return path.join(homeDir, substituted.slice(2))
  return substituted
}

function expandServer(server: ServerConfig, env: NodeJS.ProcessEnv, homeDir: string): ServerConfig {
  const expandedEnv: Record<string, string> = {}
  for (const [key, value] of Object.entries(server.env)) {
    expandedEnv[key] = expandValue(value, env, homeDir)
  }
  return {
    ...server,
    env: expandedEnv,
    ...(server.cwd ? { cwd: expandValue(server.cwd, env, homeDir) } : {}),
  }
}

/** Apply path defaults, `~` expansion and environment fallbacks to a parsed file. */
export function resolveConfig(file: ConfigFile, env: NodeJS.ProcessEnv, homeDir: string): Config {
  const expand = (value: string): string => expandValue(value, env, homeDir)
  const dataDir = expand(file.dataDir ?? '~/.local/share/tripwire')

  const envKey =
    file.llm.provider === 'anthropic' ? env.ANTHROPIC_API_KEY : file.llm.provider === 'openai' ? env.OPENAI_API_KEY : undefined

  const servers: Record<string, ServerConfig> = {}
  for (const [name, server] of Object.entries(file.servers)) {
    servers[name] = expandServer(server, env, homeDir)
  }

  return {
    dataDir,
    databasePath: file.databasePath ? expand(file.databasePath) : path.join(dataDir, 'tripwire.db'),
    watcher: file.watcher,
    llm: { ...file.llm, apiKey: file.llm.apiKey ?? envKey },
    servers,
    gmail: file.gmail ?? null,
    handoff: {
      dir: file.handoff.dir ? expand(file.handoff.dir) : path.join(dataDir, 'handoffs'),
      agentCommand: file.handoff.agentCommand,
      ...(file.handoff.workdir ? { workdir: expand(file.handoff.workdir) } : {}),
    },
  }
}

export function parseConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir(),
): Result<Config, TripwireError> {
  const parsed = ConfigFileSchema.safeParse(raw)
  if (!parsed.success) {
    return Err(
      TripwireError.config(
        parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
      ),
    )
  }
  return Ok(resolveConfig(parsed.data, env, homeDir))
}

export function loadConfig(options: LoadConfigOptions = {}): Result<Config, TripwireError> {
  const env = options.env ?? process.env
  const homeDir = options.homeDir ?? os.homedir()
  const file = options.path ?? defaultConfigPath(env, homeDir)

  if (!existsSync(file)) return parseConfig({}, env, homeDir)

  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'))
  } catch (err) {
    return Err(TripwireError.config(`Failed to read config ${file}: ${errorMessage(err)}`))
  }
  return parseConfig(raw, env, homeDir)
}
