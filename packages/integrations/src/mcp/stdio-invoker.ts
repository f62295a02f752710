/**
 * ToolInvoker over stdio tool servers.
 *
 * Each call spawns the configured server, initialises a session, calls one tool
 * and closes. Connection and protocol failures come back as unsuccessful results.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js'
import { errorMessage } from '@tripwire/core'
import type { ServerConfig, ToolInvoker, ToolResult } from '@tripwire/core'
import { normalizeToolResult } from './tool-result.js'

export interface ToolSession {
  callTool(tool: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<unknown>
  close(): Promise<void>
}

export type SessionFactory = (name: string, server: ServerConfig) => Promise<ToolSession>

export interface StdioToolInvokerOptions {
  /** Replaces process spawning; used by tests. */
  connect?: SessionFactory
  clientName?: string
  clientVersion?: string
}

export function stdioSessionFactory(clientName = 'tripwire', clientVersion = '0.1.0'): SessionFactory {
  return async (_name, server) => {
    const transport = new StdioClientTransport({
      command: server.command,
      args: server.args,
      env: { ...getDefaultEnvironment(), ...server.env },
      cwd: server.cwd,
      stderr: 'ignore',
    })
    const client = new Client({ name: clientName, version: clientVersion }, { capabilities: {} })
    await client.connect(transport)

    return {
      callTool: (tool, args, signal) => client.callTool({ name: tool, arguments: args }, undefined, { signal }),
      close: () => client.close(),
    }
  }
}

function failure(error: string): ToolResult {
  return { success: false, content: [], structured: null, error }
}

export class StdioToolInvoker implements ToolInvoker {
  private readonly connect: SessionFactory

  constructor(
    private readonly servers: Record<string, ServerConfig>,
    options: StdioToolInvokerOptions = {},
  ) {
    this.connect = options.connect ?? stdioSessionFactory(options.clientName, options.clientVersion)
  }

  hasServer(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.servers, name)
  }

  serverNames(): string[] {
    return Object.keys(this.servers)
  }

  async callTool(
    server: string,
    tool: string,
    args: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<ToolResult> {
    if (!this.hasServer(server)) return failure(`Tool server not configured: ${server}`)
    if (signal?.aborted) return failure('Tool call aborted')

    let session: ToolSession
    try {
      session = await this.connect(server, this.servers[server])
    } catch (err) {
      console.warn(`[tool-client] could not connect to ${server}: ${errorMessage(err)}`)
      return failure(`Could not connect to ${server}: ${errorMessage(err)}`)
    }

    try {
      return normalizeToolResult(await session.callTool(tool, args, signal))
    } catch (err) {
      return failure(errorMessage(err))
    } finally {
      await session.close().catch((err: unknown) => {
        console.warn(`[tool-client] close failed for ${server}: ${errorMessage(err)}`)
      })
    }
  }
}
