import fs from 'node:fs/promises';
import { z } from 'zod';
import { StateFileError, getErrorMessage } from '../errors.js';
import { isErrnoException, writeJsonAtomic } from '../fs.js';
import type { ContextValue, ContextValues } from '../types.js';
import type { Logger } from '../utils/log.js';

export const STATE_VERSION = 1;

const ContextValueSchema: z.ZodType<ContextValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(ContextValueSchema), z.record(z.string(), ContextValueSchema)]),
);

const StateFileSchema = z.object({
  version: z.literal(STATE_VERSION),
  updatedAt: z.string(),
  values: z.record(z.string(), ContextValueSchema),
});
export type StateFile = z.infer<typeof StateFileSchema>;

// version n -> n + 1. Files written before versioning are a bare mapping (version 0).
const MIGRATIONS: Record<number, (raw: Record<string, unknown>) => Record<string, unknown>> = {
  0: (raw) => ({ version: 1, updatedAt: new Date().toISOString(), values: raw }),
};

function detectVersion(raw: Record<string, unknown>): number {
  const v = raw.version;
  if (typeof v === 'number' && Number.isInteger(v) && 'values' in raw) return v;
  return 0;
}

export function migrateState(filePath: string, raw: unknown): StateFile {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new StateFileError(filePath, 'expected a JSON object');
  }
  let cur: Record<string, unknown> = { ...raw };
  let version = detectVersion(cur);
  if (version > STATE_VERSION) {
    throw new StateFileError(filePath, `written by a newer version (${version} > ${STATE_VERSION})`);
  }
  while (version < STATE_VERSION) {
    const step = MIGRATIONS[version];
    if (!step) throw new StateFileError(filePath, `no migration from version ${version}`);
    cur = step(cur);
    version++;
  }
  const parsed = StateFileSchema.safeParse(cur);
  if (!parsed.success) {
    throw new StateFileError(filePath, parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  return parsed.data;
}

/**
 * Persisted process context. Loaded once, rewritten in full after every mutation.
 * Writes are queued so they land in call order, and each one is atomic (see writeJsonAtomic).
 */
export class ContextStore {
  private values: ContextValues;
  private queue: Promise<void> = Promise.resolve();

  private constructor(readonly filePath: string, initial: ContextValues) {
    this.values = initial;
  }

  static async open(filePath: string, logger?: Logger): Promise<ContextStore> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (e) {
      if (isErrnoException(e) && e.code === 'ENOENT') return new ContextStore(filePath, {});
      throw new StateFileError(filePath, getErrorMessage(e), { cause: e });
    }
    let json: unknown;
    try {
      json = JSON.parse(raw || '{}');
    } catch (e) {
      // Keep the unreadable file next to the new one instead of overwriting it
      const aside = `${filePath}.corrupt-${Date.now()}`;
      await fs.rename(filePath, aside);
      logger?.warn('context', `State file was not valid JSON (${getErrorMessage(e)}); moved to ${aside}`);
      return new ContextStore(filePath, {});
    }
    const state = migrateState(filePath, json);
    return new ContextStore(filePath, state.values);
  }

  get(key: string): ContextValue | undefined {
    return this.values[key];
  }

  getString(key: string): string | undefined {
    const v = this.values[key];
    return typeof v === 'string' && v.length > 0 ? v : undefined;
  }

  getStringList(key: string): string[] {
    const v = this.values[key];
    return Array.isArray(v) ? v.filter((x): x is string => typeof x === 'string') : [];
  }

  snapshot(): ContextValues {
    return structuredClone(this.values);
  }

  async set(key: string, value: ContextValue): Promise<void> {
    return this.update({ [key]: value });
  }

  async update(patch: ContextValues): Promise<void> {
    return this.commit({ ...this.values, ...structuredClone(patch) });
  }

  async delete(key: string): Promise<void> {
    if (!(key in this.values)) return;
    const { [key]: _removed, ...rest } = this.values;
    return this.commit(rest);
  }

  /** Resolves once every queued write has landed. */
  async flush(): Promise<void> {
    await this.queue;
  }

  // A failed write restores the previous values unless a later change has replaced them
  private async commit(next: ContextValues): Promise<void> {
    const previous = this.values;
    this.values = next;
    try {
      await this.persist();
    } catch (e) {
      if (this.values === next) this.values = previous;
      throw e;
    }
  }

  private persist(): Promise<void> {
    const data: StateFile = { version: STATE_VERSION, updatedAt: new Date().toISOString(), values: structuredClone(this.values) };
    const run = this.queue.then(() => writeJsonAtomic(this.filePath, data));
    // the caller of this write gets the rejection; later writes still run
    this.queue = run.catch(() => undefined);
    return run;
  }
}
