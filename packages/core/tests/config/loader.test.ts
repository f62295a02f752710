import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { loadConfig, parseConfig, expandValue, defaultConfigPath } from '../../src/config/index.js'

const HOME = '/home/tester'

describe('expandValue', () => {
  it('substitutes ${VAR} from the environment', () => {
    expect(expandValue('token-${GH_TOKEN}', { GH_TOKEN: 'test-secret' }, HOME)).toBe('token-test-secret')
  })

  it('expands unset variables to an empty string', () => {
    expect(expandValue('${MISSING}/x', {}, HOME)).toBe('/x')
  })

  it('expands a leading ~', () => {
    expect(expandValue('~/data', {}, HOME)).toBe('/home/tester/data')
    expect(expandValue('~', {}, HOME)).toBe(HOME)
  })

  it('leaves a ~ elsewhere untouched', () => {
    expect(expandValue('/tmp/~x', {}, HOME)).toBe('/tmp/~x')
  })
})

describe('defaultConfigPath', () => {
  it('prefers TRIPWIRE_CONFIG', () => {
    expect(defaultConfigPath({ TRIPWIRE_CONFIG: '/etc/tw.json' }, HOME)).toBe('/etc/tw.json')
  })

  it('falls back to ~/.config/tripwire/config.json', () => {
    expect(defaultConfigPath({}, HOME)).toBe('/home/tester/.config/tripwire/config.json')
  })
})

describe('parseConfig', () => {
  it('fills in defaults for an empty file', () => {
    const result = parseConfig({}, {}, HOME)
    expect(result.ok).toBe(true)
    if (!result.ok) return

    const config = result.value
    expect(config.dataDir).toBe('/home/tester/.local/share/tripwire')
    expect(config.databasePath).toBe('/home/tester/.local/share/tripwire/tripwire.db')
    expect(config.watcher).toEqual({
      intervalSeconds: 60,
      maxResults: 20,
      lookbackSeconds: 3600,
      processedCap: 1000,
      processedKeep: 500,
    })
    expect(config.llm.provider).toBe('anthropic')
    expect(config.llm.apiKey).toBeUndefined()
    expect(config.servers).toEqual({})
    expect(config.gmail).toBeNull()
    expect(config.handoff).toEqual({ dir: '/home/tester/.local/share/tripwire/handoffs', agentCommand: 'claude' })
  })

  it('falls back to the provider API key from the environment', () => {
    const result = parseConfig({ llm: { provider: 'openai' } }, { OPENAI_API_KEY: 'test-secret' }, HOME)
    expect(result.ok && result.value.llm.apiKey).toBe('test-secret')
  })

  it('prefers an explicit API key', () => {
    const result = parseConfig(
      { llm: { apiKey: 'from-file' } },
      { ANTHROPIC_API_KEY: 'from-env' },
      HOME,
    )
    expect(result.ok && result.value.llm.apiKey).toBe('from-file')
  })

  it('expands server env values and cwd', () => {
    const result = parseConfig(
      {
        servers: {
          github: { command: 'github-tools', env: { GH_TOKEN: '${GH_TOKEN}', CACHE: '~/cache' }, cwd: '~/work' },
        },
      },
      { GH_TOKEN: 'test-secret' },
      HOME,
    )
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.servers.github).toEqual({
      command: 'github-tools',
      args: [],
      env: { GH_TOKEN: 'test-secret', CACHE: '/home/tester/cache' },
      cwd: '/home/tester/work',
    })
  })

  it('rejects an invalid watcher section with CONFIG_ERROR', () => {
    const result = parseConfig({ watcher: { processedCap: 10, processedKeep: 20 } }, {}, HOME)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('CONFIG_ERROR')
      expect(result.error.message).toBe('watcher.processedKeep: processedKeep must not exceed processedCap')
    }
  })

  it('rejects a server without a command', () => {
    const result = parseConfig({ servers: { gmail: { command: '' } } }, {}, HOME)
    expect(result.ok).toBe(false)
  })
})

describe('loadConfig', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'tripwire-config-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('returns defaults when the file does not exist', () => {
    const result = loadConfig({ path: path.join(dir, 'missing.json'), env: {}, homeDir: HOME })
    expect(result.ok && result.value.watcher.intervalSeconds).toBe(60)
  })

  it('reads the file named by TRIPWIRE_CONFIG', () => {
    const file = path.join(dir, 'config.json')
    writeFileSync(file, JSON.stringify({ dataDir: '/srv/tripwire', watcher: { intervalSeconds: 15 } }))

    const result = loadConfig({ env: { TRIPWIRE_CONFIG: file }, homeDir: HOME })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.watcher.intervalSeconds).toBe(15)
    expect(result.value.databasePath).toBe('/srv/tripwire/tripwire.db')
  })

  it('returns CONFIG_ERROR for malformed JSON', () => {
    const file = path.join(dir, 'config.json')
    writeFileSync(file, '{ not json')

    const result = loadConfig({ path: file, env: {}, homeDir: HOME })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('CONFIG_ERROR')
  })
})
