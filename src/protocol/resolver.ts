import path from 'node:path';
import { ContentResolutionError } from '../errors.js';
import type { ResourceRegistry } from '../registry/registry.js';
import type { ResourceKind, ResourceLocation, ResourceRecord } from '../types.js';
import { loadLocation, type FetchLike } from './loader.js';
import { parseResourceUrl, type Scheme } from './schemes.js';

/**
 * How a scheme finds its location. Registry-backed handlers defer precedence entirely to
 * the registry's override rule; tier-path handlers read a file below one tier root.
 */
export type SchemeHandler =
  | { kind: 'registry-kind'; resourceKind: ResourceKind }
  | { kind: 'registry-id' }
  | { kind: 'tier-path'; tier: 'package' | 'project' | 'user'; root: () => string | undefined };

export type SchemeHandlers = { readonly [S in Scheme]: SchemeHandler };

export interface TierRoots {
  package: () => string | undefined;
  project: () => string | undefined;
  user: () => string | undefined;
}

export function createSchemeHandlers(roots: TierRoots): SchemeHandlers {
  return {
    role: { kind: 'registry-kind', resourceKind: 'role' },
    thought: { kind: 'registry-kind', resourceKind: 'thought' },
    execution: { kind: 'registry-kind', resourceKind: 'execution' },
    knowledge: { kind: 'registry-kind', resourceKind: 'knowledge' },
    prompt: { kind: 'registry-kind', resourceKind: 'prompt' },
    resource: { kind: 'registry-id' },
    package: { kind: 'tier-path', tier: 'package', root: roots.package },
    project: { kind: 'tier-path', tier: 'project', root: roots.project },
    user: { kind: 'tier-path', tier: 'user', root: roots.user },
  };
}

export interface ResolvedResource {
  /** `<scheme>://<path>` with the scheme lowercased and any leading '@' dropped */
  url: string;
  scheme: Scheme;
  id?: string;
  location: ResourceLocation;
  record?: ResourceRecord;
  content: string;
  frontMatter: Record<string, unknown>;
}

export class ProtocolResolver {
  constructor(
    private readonly registry: ResourceRegistry,
    private readonly handlers: SchemeHandlers,
    private readonly fetchImpl: FetchLike,
  ) {}

  /** Resolves `<scheme>://<path>` to loaded content. Scheme validation happens before any handler runs. */
  async resolve(input: string): Promise<ResolvedResource> {
    const { scheme, path: p } = parseResourceUrl(input);
    const url = `${scheme}://${p}`;
    const handler = this.handlers[scheme];
    switch (handler.kind) {
      case 'registry-kind':
        return this.fromRegistry(url, scheme, `${handler.resourceKind}:${p}`);
      case 'registry-id':
        return this.fromRegistry(url, scheme, p);
      case 'tier-path': {
        const location = this.locateInTier(handler.tier, handler.root(), p);
        const loaded = await loadLocation(location, this.fetchImpl);
        return { url, scheme, location, ...loaded };
      }
    }
  }

  private async fromRegistry(url: string, scheme: Scheme, id: string): Promise<ResolvedResource> {
    const location = this.registry.resolve(id);
    const loaded = await loadLocation(location, this.fetchImpl);
    return { url, scheme, id, location, record: this.registry.get(id), ...loaded };
  }

  private locateInTier(tier: string, root: string | undefined, rel: string): ResourceLocation {
    if (!root) throw new ContentResolutionError(`No ${tier} directory is configured`);
    const base = path.resolve(root);
    const target = path.resolve(base, rel.replace(/^\/+/, ''));
    const relative = path.relative(base, target);
    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new ContentResolutionError(`Path escapes the ${tier} directory: ${rel}`);
    }
    return { type: 'file', path: target };
  }
}
