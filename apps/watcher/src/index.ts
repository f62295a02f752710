/**
 * Tripwire watcher process.
 *
 *   tripwire-watch [--config <path>] [--once]
 */

import { loadConfig } from '@tripwire/core'
import { createRuntime } from './runtime.js'

export interface CliArgs {
  configPath?: string
  once: boolean
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { once: false }
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === '--once') args.once = true
    else if (arg === '--config') args.configPath = argv[++i]
    else if (arg.startsWith('--config=')) args.configPath = arg.slice('--config='.length)
  }
  return args
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const args = parseArgs(argv)
  const config = loadConfig({ path: args.configPath })
  if (!config.ok) {
    console.error(`[runtime] ${config.error.message}`)
    return 1
  }

  const runtime = createRuntime(config.value)
  const controller = new AbortController()
  const shutdown = (): void => {
    console.log('[runtime] Stopping...')
    controller.abort()
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)

  try {
    await runtime.run({ once: args.once, signal: controller.signal })
  } finally {
    process.off('SIGINT', shutdown)
    process.off('SIGTERM', shutdown)
    runtime.close()
  }
  return 0
}
