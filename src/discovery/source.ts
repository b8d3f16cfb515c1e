import path from 'node:path';
import fg from 'fast-glob';
import matter from 'gray-matter';
import { z } from 'zod';
import { pathExists, readText } from '../fs.js';
import { RESOURCE_KINDS, type DiscoveryResult, type ResourceKind, type ResourceRecord, type SourceTier } from '../types.js';

export interface DiscoverySource {
  readonly name: string;
  readonly tier: SourceTier;
  discover(): Promise<DiscoveryResult>;
}

export const DEFAULT_PRIORITY = 100;

const RESOURCE_GLOB = `**/*.{${RESOURCE_KINDS.join(',')}}.md`;

const FrontMatterSchema = z.object({
  priority: z.number().finite().optional(),
  title: z.string().optional(),
  description: z.string().optional(),
}).passthrough();

export type Clock = () => number;

function isResourceKind(s: string): s is ResourceKind {
  return (RESOURCE_KINDS as readonly string[]).includes(s);
}

// writer.role.md -> { kind: 'role', name: 'writer' }
export function parseResourceFileName(file: string): { kind: ResourceKind; name: string } | null {
  const base = path.basename(file);
  const m = base.match(/^(.+)\.([a-z]+)\.md$/);
  if (!m) return null;
  const kind = m[2];
  if (!isResourceKind(kind)) return null;
  return { kind, name: m[1] };
}

export function splitResourceId(id: string): { kind?: ResourceKind; name: string } {
  const idx = id.indexOf(':');
  if (idx > 0) {
    const head = id.slice(0, idx);
    if (isResourceKind(head)) return { kind: head, name: id.slice(idx + 1) };
  }
  return { name: id };
}

function freezeResult(source: string, tier: SourceTier, records: ResourceRecord[]): DiscoveryResult {
  return Object.freeze({ source, tier, records: Object.freeze(records) });
}

/**
 * Scans one tier directory for `<name>.<kind>.md` files. Front matter may set
 * `priority`, `title` and `description`. A missing directory is an empty tier.
 */
export class DirectorySource implements DiscoverySource {
  constructor(
    readonly name: string,
    readonly tier: SourceTier,
    private readonly root: string | undefined,
    private readonly now: Clock = Date.now,
  ) {}

  async discover(): Promise<DiscoveryResult> {
    const root = this.root;
    if (!root || !(await pathExists(root))) return freezeResult(this.name, this.tier, []);
    const files = await fg(RESOURCE_GLOB, { cwd: root, dot: false, onlyFiles: true });
    files.sort();
    const records: ResourceRecord[] = [];
    for (const f of files) {
      const parsed = parseResourceFileName(f);
      if (!parsed) continue;
      const full = path.join(root, f);
      const fm = FrontMatterSchema.safeParse(matter(await readText(full)).data);
      const meta = fm.success ? fm.data : undefined;
      records.push({
        id: `${parsed.kind}:${parsed.name}`,
        kind: parsed.kind,
        name: parsed.name,
        title: meta?.title,
        description: meta?.description,
        location: { type: 'file', path: full },
        metadata: { tier: this.tier, priority: meta?.priority ?? DEFAULT_PRIORITY, registeredAt: this.now() },
      });
    }
    return freezeResult(this.name, this.tier, records);
  }
}

/** Resources listed in configuration and fetched on demand; no network during discovery. */
export class ManifestSource implements DiscoverySource {
  readonly tier = 'INTERNET' as const;

  constructor(
    readonly name: string,
    private readonly manifest: Record<string, string>,
    private readonly now: Clock = Date.now,
  ) {}

  async discover(): Promise<DiscoveryResult> {
    const records: ResourceRecord[] = Object.entries(this.manifest)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([id, url]): ResourceRecord => {
        const { kind, name } = splitResourceId(id);
        return {
          id,
          kind,
          name,
          location: { type: 'url', url },
          metadata: { tier: this.tier, priority: DEFAULT_PRIORITY, registeredAt: this.now() },
        };
      });
    return freezeResult(this.name, this.tier, records);
  }
}
