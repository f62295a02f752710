import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { openDatabase, parseConfig, parseAutomation, unwrap } from '@tripwire/core'
import type { Config, EmailRecord, EventSource, ToolInvoker, ToolResult } from '@tripwire/core'
import { createRuntime } from '../src/runtime.js'
import { parseArgs } from '../src/index.js'

function config(raw: Record<string, unknown> = {}): Config {
  return unwrap(parseConfig(raw, {}, '/home/test'))
}

class RecordingTools implements ToolInvoker {
  calls: { server: string; tool: string; args: Record<string, unknown> }[] = []

  hasServer(name: string): boolean {
    return name === 'gmail'
  }

  async callTool(server: string, tool: string, args: Record<string, unknown>): Promise<ToolResult> {
    this.calls.push({ server, tool, args })
    return { success: true, content: [{ type: 'text', text: 'ok' }], structured: null, error: null }
  }
}

class OneEmail implements EventSource<EmailRecord> {
  queries: string[] = []

  async search(query: string): Promise<EmailRecord[]> {
    this.queries.push(query)
    return [
      {
        id: 'msg-7',
        threadId: 't-7',
        subject: 'Weekly newsletter',
        from: { name: 'News', email: 'news@letters.test', domain: 'letters.test' },
        to: [],
        date: null,
        snippet: '',
        bodyText: '',
        labels: ['INBOX'],
        attachments: [],
      },
    ]
  }
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('createRuntime', () => {
  it('builds no watchers without gmail credentials or a github server', () => {
    const runtime = createRuntime(config(), { db: openDatabase(':memory:') })
    expect(runtime.watchers).toEqual([])
    runtime.close()
  })

  it('warns when the LLM provider cannot be built', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const runtime = createRuntime(config(), { db: openDatabase(':memory:') })
    expect(warn).toHaveBeenCalledWith(
      '[runtime] LLM provider unavailable, email.classify actions will fail: Anthropic API key is required',
    )
    runtime.close()
  })

  it('adds a code-review watcher when a github server is configured', () => {
    const runtime = createRuntime(config({ servers: { github: { command: 'github-server' } } }), {
      db: openDatabase(':memory:'),
      completer: null,
    })
    expect(runtime.watchers.map((w) => w.domain)).toEqual(['code_review'])
    runtime.close()
  })

  it('runs one cycle with --once and executes matching automations', async () => {
    const tools = new RecordingTools()
    const source = new OneEmail()
    const runtime = createRuntime(config(), {
      db: openDatabase(':memory:'),
      tools,
      completer: null,
      emailSource: source,
    })
    await runtime.store.saveAutomation(
      unwrap(
        parseAutomation({
          id: 'archive-newsletters',
          name: 'Archive newsletters',
          status: 'active',
          trigger: { type: 'email', conditions: [{ field: 'subject', value: 'newsletter' }] },
          actions: [{ type: 'email.archive', message_id: '${trigger.email.id}' }],
        }),
      ),
    )

    await runtime.run({ once: true })

    expect(runtime.watchers.map((w) => w.domain)).toEqual(['email'])
    expect(source.queries).toHaveLength(1)
    expect(tools.calls).toEqual([{ server: 'gmail', tool: 'archive_email', args: { message_id: 'msg-7' } }])
    const executions = await runtime.store.listExecutions('archive-newsletters')
    expect(executions.map((e) => e.status)).toEqual(['success'])
    expect((await runtime.store.getWatcherState('email'))?.processedIds).toEqual(['msg-7'])
    runtime.close()
  })

  it('returns immediately when there is nothing to watch', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const runtime = createRuntime(config(), { db: openDatabase(':memory:'), completer: null })

    await runtime.run()

    expect(warn).toHaveBeenCalledWith('[runtime] No event sources configured (set gmail credentials or a github server)')
    runtime.close()
  })
})

describe('parseArgs', () => {
  it('reads --once and both --config forms', () => {
    expect(parseArgs([])).toEqual({ once: false })
    expect(parseArgs(['--once', '--config', '/etc/tripwire.json'])).toEqual({
      once: true,
      configPath: '/etc/tripwire.json',
    })
    expect(parseArgs(['--config=/tmp/c.json'])).toEqual({ once: false, configPath: '/tmp/c.json' })
  })
})
