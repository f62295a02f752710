/**
 * @tripwire/integrations — event sources and the tool-server client.
 *
 * Gmail over googleapis, code review over the `github` tool server, and a
 * stdio ToolInvoker for the configured servers.
 */

export * from './gmail/index.js'
export * from './github/index.js'
export * from './mcp/index.js'
