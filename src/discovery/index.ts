import { DiscoverySourceError } from '../errors.js';
import { compareRecords, tierRank } from '../registry/precedence.js';
import type { ResourceRegistry } from '../registry/registry.js';
import type { DiscoveryResult, ResourceRecord, SourceTier } from '../types.js';
import type { Logger } from '../utils/log.js';
import type { DiscoverySource } from './source.js';

export { DirectorySource, ManifestSource, DEFAULT_PRIORITY, parseResourceFileName, splitResourceId } from './source.js';
export type { DiscoverySource, Clock } from './source.js';

export interface DiscoveryReport {
  // In merge order (USER first)
  results: DiscoveryResult[];
  failures: DiscoverySourceError[];
  registered: number;
  // Records that an earlier (higher-tier) merge step should have kept but did not
  inconsistencies: string[];
}

/**
 * Fan out to every source concurrently, then merge into the registry in tier order
 * USER -> PROJECT -> PACKAGE -> INTERNET. A rejected source contributes an empty result
 * and a `DiscoverySourceError`; the others still merge.
 */
export async function discoverResources(
  sources: readonly DiscoverySource[],
  registry: ResourceRegistry,
  logger?: Logger,
): Promise<DiscoveryReport> {
  const settled = await Promise.allSettled(sources.map(async (s) => s.discover()));

  const results: DiscoveryResult[] = [];
  const failures: DiscoverySourceError[] = [];
  settled.forEach((r, i) => {
    const src = sources[i];
    if (r.status === 'fulfilled') {
      results.push(r.value);
    } else {
      const failure = new DiscoverySourceError(src.name, r.reason);
      failures.push(failure);
      logger?.warn('discovery', failure.message);
      results.push({ source: src.name, tier: src.tier, records: [] });
    }
  });

  results.sort((a, b) => tierRank(a.tier) - tierRank(b.tier));

  let registered = 0;
  const winners = new Map<string, ResourceRecord>();
  for (const result of results) {
    for (const rec of result.records) {
      if (registry.register(rec)) registered++;
      const prev = winners.get(rec.id);
      if (!prev || compareRecords(rec, prev) < 0) winners.set(rec.id, rec);
    }
  }

  const inconsistencies = checkConsistency(registry, winners);
  for (const msg of inconsistencies) logger?.warn('discovery', msg);
  logger?.info('discovery', { registered, total: registry.size, failures: failures.length });

  return { results, failures, registered, inconsistencies };
}

// The registry must end up holding, per id, the record the override rule ranks first
function checkConsistency(registry: ResourceRegistry, expected: Map<string, ResourceRecord>): string[] {
  const out: string[] = [];
  for (const [id, want] of expected) {
    const got = registry.get(id);
    if (!got) {
      out.push(`${id}: missing after merge`);
    } else if (compareRecords(got, want) > 0) {
      out.push(`${id}: registry kept ${got.metadata.tier} over ${want.metadata.tier}`);
    }
  }
  return out;
}

export function countByTier(registry: ResourceRegistry): Record<SourceTier, number> {
  const counts: Record<SourceTier, number> = { USER: 0, PROJECT: 0, PACKAGE: 0, INTERNET: 0 };
  for (const rec of registry.list()) counts[rec.metadata.tier]++;
  return counts;
}
