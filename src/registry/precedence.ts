import { TIER_ORDER, type ResourceRecord, type SourceTier } from '../types.js';

export function tierRank(tier: SourceTier): number {
  return TIER_ORDER.indexOf(tier);
}

/**
 * Returns a negative number when `a` takes precedence over `b`, positive when `b` does,
 * and 0 when neither wins (same tier, priority and timestamp).
 *
 * Order of decision: tier (USER > PROJECT > PACKAGE > INTERNET), then priority
 * (smaller wins), then registration timestamp (later wins).
 */
export function compareRecords(a: ResourceRecord, b: ResourceRecord): number {
  const byTier = tierRank(a.metadata.tier) - tierRank(b.metadata.tier);
  if (byTier !== 0) return byTier;
  const byPriority = a.metadata.priority - b.metadata.priority;
  if (byPriority !== 0) return byPriority;
  return b.metadata.registeredAt - a.metadata.registeredAt;
}

export function outranks(candidate: ResourceRecord, existing: ResourceRecord): boolean {
  return compareRecords(candidate, existing) < 0;
}
