import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, rmSync, existsSync } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { ActionRouter } from '../../src/automations/router.js'
import { handoffFileName, handoffCommand, shellQuote } from '../../src/automations/handlers/review-handoff.js'
import type { Action } from '../../src/automations/schemas.js'
import { ScriptedToolInvoker, StubCompleter, textResult, errorResult, makeAutomation } from './fakes.js'

let handoffDir: string

beforeEach(() => {
  handoffDir = mkdtempSync(path.join(os.tmpdir(), 'tripwire-handoff-'))
})

afterEach(() => {
  rmSync(handoffDir, { recursive: true, force: true })
})

function actionsOf(actions: unknown[]): Action[] {
  return makeAutomation({ trigger: { type: 'manual' }, actions }).actions
}

function router(tools: ScriptedToolInvoker, completer: StubCompleter | null = null): ActionRouter {
  return new ActionRouter(tools, { completer, handoff: { dir: handoffDir, agentCommand: 'claude', defaultWorkdir: '/work/widgets' } })
}

const variables = { trigger: { email: { id: 'msg-9', from: 'billing@acme.test' } } }

describe('ActionRouter.canDispatch', () => {
  it('requires a route and a configured server', () => {
    const [label, reply, move] = actionsOf([
      { type: 'email.label', message_id: 'x', label: 'L' },
      { type: 'outlook.reply', params: {} },
      { type: 'file.move', source: 'a' },
    ])
    const gmailOnly = router(new ScriptedToolInvoker(['gmail']))
    expect(gmailOnly.canDispatch(label)).toBe(true)
    expect(gmailOnly.canDispatch(reply)).toBe(false)
    expect(gmailOnly.canDispatch(move)).toBe(false)
  })

  it('classification also needs a structured completer', () => {
    const [classify] = actionsOf([{ type: 'email.classify', message_id: 'x', categories: ['a'] }])
    expect(router(new ScriptedToolInvoker()).canDispatch(classify)).toBe(false)
    expect(router(new ScriptedToolInvoker(), new StubCompleter({})).canDispatch(classify)).toBe(true)
  })

  it('the review hand-off needs the github server', () => {
    const [implement] = actionsOf([{ type: 'code_review.implement', repo: 'acme/widgets', pr_number: 7 }])
    expect(router(new ScriptedToolInvoker(['gmail'])).canDispatch(implement)).toBe(false)
    expect(router(new ScriptedToolInvoker(['github'])).canDispatch(implement)).toBe(true)
  })
})

describe('ActionRouter.execute — routed tools', () => {
  it('dry run describes the call without invoking the tool', async () => {
    const tools = new ScriptedToolInvoker()
    const [label] = actionsOf([{ type: 'email.label', message_id: '${trigger.email.id}', label: 'Invoices' }])

    const result = await router(tools).execute(label, variables, { dryRun: true })

    expect(tools.calls).toEqual([])
    expect(result.status).toBe('success')
    expect(result.actionId).toBe('action_0')
    expect(result.output).toEqual({
      message_id: 'msg-9',
      label: 'Invoices',
      dryRun: true,
      wouldExecute: 'gmail.add_label',
      description: "Would call tool 'add_label' on server 'gmail'",
      arguments: { message_id: 'msg-9', label: 'Invoices' },
    })
    expect(result.durationMs).toBeGreaterThanOrEqual(0)
  })

  it('live call sends snake_case arguments and keeps the last text block', async () => {
    const tools = new ScriptedToolInvoker().respond('gmail', 'send_email', {
      success: true,
      content: [
        { type: 'text', text: 'queued' },
        { type: 'text', text: 'sent id=abc' },
      ],
      structured: { id: 'abc' },
      error: null,
    })
    const [send] = actionsOf([
      { type: 'email.send', to: '${trigger.email.from}', subject: 'Re: invoice', body: 'Thanks' },
    ])

    const result = await router(tools).execute(send, variables)

    expect(tools.calls).toEqual([
      { server: 'gmail', tool: 'send_email', args: { to: ['billing@acme.test'], subject: 'Re: invoice', body: 'Thanks' } },
    ])
    expect(result).toMatchObject({
      status: 'success',
      error: null,
      output: { server: 'gmail', tool: 'send_email', result: 'sent id=abc', structured: { id: 'abc' } },
    })
  })

  it('custom actions pass params through to their route', async () => {
    const tools = new ScriptedToolInvoker()
    const [reply] = actionsOf([{ type: 'outlook.reply', params: { message_id: '${trigger.email.id}', body: 'On it' } }])

    await router(tools).execute(reply, variables)

    expect(tools.calls).toEqual([{ server: 'outlook', tool: 'reply', args: { message_id: 'msg-9', body: 'On it' } }])
  })

  it('maps a remote failure to a failed result', async () => {
    const tools = new ScriptedToolInvoker().respond('gmail', 'archive_email', errorResult('Message not found'))
    const [archive] = actionsOf([{ type: 'email.archive', message_id: 'missing' }])

    const result = await router(tools).execute(archive, variables)

    expect(result).toMatchObject({ actionId: 'action_0', status: 'failed', error: 'Message not found', output: {} })
  })

  it("uses 'Tool call failed' when the remote error is empty", async () => {
    const tools = new ScriptedToolInvoker().respond('gmail', 'archive_email', errorResult(''))
    const [archive] = actionsOf([{ type: 'email.archive', message_id: 'm' }])
    expect((await router(tools).execute(archive, variables)).error).toBe('Tool call failed')
  })

  it('a thrown collaborator error becomes a failed result', async () => {
    const tools = new ScriptedToolInvoker().respond('gmail', 'add_label', () => {
      throw new Error('connection reset')
    })
    const [label] = actionsOf([{ type: 'email.label', message_id: 'm', label: 'L' }])

    const result = await router(tools).execute(label, variables)
    expect(result.status).toBe('failed')
    expect(result.error).toBe('connection reset')
  })
})

describe('ActionRouter.execute — classify and label', () => {
  const classifyAction = () =>
    actionsOf([
      {
        type: 'email.classify',
        message_id: '${trigger.email.id}',
        categories: ['billing', 'support'],
        labels: { billing: 'Finance/Billing' },
      },
    ])[0]

  it('fetches, classifies at temperature 0 and applies the mapped label', async () => {
    const tools = new ScriptedToolInvoker().respond('gmail', 'get_email', textResult('Subject: Invoice #42'))
    const completer = new StubCompleter({ category: ' billing ', confidence: 0.93, reasoning: 'Mentions an invoice' })

    const result = await router(tools, completer).execute(classifyAction(), variables)

    expect(result.status).toBe('success')
    expect(result.output).toEqual({
      messageId: 'msg-9',
      category: 'billing',
      confidence: 0.93,
      reasoning: 'Mentions an invoice',
      label: 'Finance/Billing',
    })
    expect(tools.calls).toEqual([
      { server: 'gmail', tool: 'get_email', args: { message_id: 'msg-9' } },
      { server: 'gmail', tool: 'add_label', args: { message_id: 'msg-9', label: 'Finance/Billing' } },
    ])
    expect(completer.temperatures).toEqual([0])
    expect(completer.prompts[0]).toContain('- "support"')
    expect(completer.prompts[0]).toContain('Subject: Invoice #42')
  })

  it('falls back to the category name when no label is mapped', async () => {
    const tools = new ScriptedToolInvoker()
    const completer = new StubCompleter({ category: 'support', confidence: 0.6 })

    const result = await router(tools, completer).execute(classifyAction(), variables)

    expect(result.output.label).toBe('support')
    expect(tools.calls[1]).toEqual({ server: 'gmail', tool: 'add_label', args: { message_id: 'msg-9', label: 'support' } })
  })

  it('fails when the classifier answers outside the category set', async () => {
    const tools = new ScriptedToolInvoker()
    const completer = new StubCompleter({ category: 'spam', confidence: 0.99 })

    const result = await router(tools, completer).execute(classifyAction(), variables)

    expect(result.status).toBe('failed')
    expect(result.error).toBe('Classifier returned unknown category "spam" (expected one of: billing, support)')
    expect(tools.calls.map((c) => c.tool)).toEqual(['get_email'])
  })

  it('dry run makes no remote calls', async () => {
    const tools = new ScriptedToolInvoker()
    const completer = new StubCompleter({ category: 'billing', confidence: 1 })

    const result = await router(tools, completer).execute(classifyAction(), variables, { dryRun: true })

    expect(tools.calls).toEqual([])
    expect(completer.prompts).toEqual([])
    expect(result.output).toMatchObject({
      dryRun: true,
      wouldExecute: 'gmail.get_email',
      steps: ['gmail.get_email', 'classify', 'gmail.add_label'],
      arguments: { message_id: 'msg-9' },
    })
  })
})

describe('ActionRouter.execute — review hand-off', () => {
  const reviewVars = { trigger: { repo: 'acme/widgets', prNumber: 7 } }
  const implement = (extra: Record<string, unknown> = {}) =>
    actionsOf([{ type: 'code_review.implement', repo: '${trigger.repo}', pr_number: '${trigger.prNumber}', ...extra }])[0]

  it('writes the prompt file and returns a ready-to-run command', async () => {
    const tools = new ScriptedToolInvoker().respond(
      'github',
      'format_review_for_claude',
      textResult('{"prompt":"# PR Review Implementation Task","branch":"feature/cache"}', {
        prompt: '# PR Review Implementation Task',
        branch: 'feature/cache',
      }),
    )

    const result = await router(tools).execute(implement({ additional_instructions: 'Keep the public API stable' }), reviewVars)

    const promptFile = path.join(handoffDir, handoffFileName('acme/widgets', 7))
    expect(result.status).toBe('success')
    expect(result.output).toEqual({
      promptFile,
      command: `cd /work/widgets && claude "$(cat ${promptFile})"`,
      repo: 'acme/widgets',
      prNumber: 7,
      branch: 'feature/cache',
    })
    expect(tools.calls).toEqual([
      { server: 'github', tool: 'format_review_for_claude', args: { repo: 'acme/widgets', pr_number: 7 } },
    ])
    expect(readFileSync(promptFile, 'utf-8')).toBe(
      '# PR Review Implementation Task\n\n## Additional Instructions\n\nKeep the public API stable',
    )
  })

  it('parses the prompt from text when there is no structured payload', async () => {
    const tools = new ScriptedToolInvoker().respond(
      'github',
      'format_review_for_claude',
      textResult('{"prompt":"Fix the nits"}'),
    )
    const result = await router(tools).execute(implement(), reviewVars)
    expect(result.output.branch).toBeNull()
    expect(readFileSync(path.join(handoffDir, handoffFileName('acme/widgets', 7)), 'utf-8')).toBe('Fix the nits')
  })

  it('dry run names the artifact without writing it', async () => {
    const tools = new ScriptedToolInvoker()
    const result = await router(tools).execute(implement(), reviewVars, { dryRun: true })

    const promptFile = path.join(handoffDir, handoffFileName('acme/widgets', 7))
    expect(tools.calls).toEqual([])
    expect(existsSync(promptFile)).toBe(false)
    expect(result.output).toMatchObject({ dryRun: true, promptFile, prNumber: 7 })
  })

  it('fails on a PR number that does not resolve to an integer', async () => {
    const result = await router(new ScriptedToolInvoker()).execute(implement(), { trigger: { repo: 'acme/widgets' } })
    expect(result.status).toBe('failed')
    expect(result.error).toBe('Invalid pull request number: ${trigger.prNumber}')
  })
})

describe('handoff helpers', () => {
  it('derives a stable file name from repo and PR number', () => {
    const name = handoffFileName('acme/widgets', 7)
    expect(name).toMatch(/^acme-widgets-pr-7-[0-9a-f]{12}\.md$/)
    expect(handoffFileName('acme/widgets', 7)).toBe(name)
    expect(handoffFileName('acme/widgets', 8)).not.toBe(name)
  })

  it('quotes shell words that need it', () => {
    expect(shellQuote('/tmp/plain-path.md')).toBe('/tmp/plain-path.md')
    expect(shellQuote("/tmp/it's here")).toBe("'/tmp/it'\\''s here'")
  })

  it('builds the command line', () => {
    expect(handoffCommand('/my repo', 'claude', '/tmp/p.md')).toBe(`cd '/my repo' && claude "$(cat /tmp/p.md)"`)
  })
})
