// Unified helpers for MCP JSON responses
// Keep minimal types to avoid leaking MCP-specific types across modules
import type { CommandEnvelope } from '../types.js';

export type TextResult = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

export function json(payload: unknown, isError = false): TextResult {
  const resp: TextResult = { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }] };
  if (isError) resp.isError = true;
  return resp;
}

export const envelope = (env: CommandEnvelope) => json(env, !env.ok);
