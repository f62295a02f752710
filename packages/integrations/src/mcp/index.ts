export { StdioToolInvoker, stdioSessionFactory } from './stdio-invoker.js'
export type { StdioToolInvokerOptions, ToolSession, SessionFactory } from './stdio-invoker.js'
export { normalizeToolResult } from './tool-result.js'
