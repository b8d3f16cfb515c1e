import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { appendJsonl, readJsonlLines } from '../fs.js';
import type { Memory } from '../types.js';
import type { Logger } from '../utils/log.js';

const MemorySchema = z.object({
  id: z.string(),
  role: z.string(),
  content: z.string(),
  tags: z.array(z.string()).default([]),
  createdAt: z.string(),
});

export const DEFAULT_MEMORY_ROLE = 'default';

// Role names become file names
function safeRole(role: string): string {
  const r = role.trim().replace(/[^a-zA-Z0-9._-]/g, '_');
  return r.length > 0 && r !== '.' && r !== '..' ? r : DEFAULT_MEMORY_ROLE;
}

/** Blank or whitespace-only queries mean "no filter". */
export function normalizeQuery(query: string | undefined): string[] {
  const q = (query ?? '').trim().toLowerCase();
  return q.length === 0 ? [] : q.split(/\s+/);
}

export function matchesQuery(m: Memory, terms: string[]): boolean {
  if (terms.length === 0) return true;
  const hay = [m.content, ...m.tags].join('\n').toLowerCase();
  return terms.every((t) => hay.includes(t));
}

/** Memories per role, one JSON object per line in `<dir>/<role>.jsonl`. */
export class MemoryStore {
  constructor(private readonly dir: string, private readonly logger?: Logger) {}

  fileFor(role: string): string {
    return path.join(this.dir, `${safeRole(role)}.jsonl`);
  }

  async remember(input: { role: string; content: string; tags?: string[] }): Promise<Memory> {
    const memory: Memory = {
      id: uuidv4(),
      role: safeRole(input.role),
      content: input.content,
      tags: input.tags ?? [],
      createdAt: new Date().toISOString(),
    };
    await appendJsonl(this.fileFor(memory.role), [memory]);
    return memory;
  }

  async list(role: string): Promise<Memory[]> {
    const lines = await readJsonlLines(this.fileFor(role));
    const out: Memory[] = [];
    for (const [i, line] of lines.entries()) {
      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch {
        this.logger?.warn('memory', `skipping unparsable line ${i + 1} in ${this.fileFor(role)}`);
        continue;
      }
      const parsed = MemorySchema.safeParse(json);
      if (parsed.success) out.push(parsed.data);
      else this.logger?.warn('memory', `skipping invalid entry at line ${i + 1} in ${this.fileFor(role)}`);
    }
    return out;
  }

  /** Newest first. */
  async recall(role: string, query?: string, limit?: number): Promise<Memory[]> {
    const terms = normalizeQuery(query);
    const all = await this.list(role);
    const hits = all.filter((m) => matchesQuery(m, terms)).reverse();
    return typeof limit === 'number' ? hits.slice(0, limit) : hits;
  }
}
