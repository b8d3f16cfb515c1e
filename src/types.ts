export type SourceTier = 'USER' | 'PROJECT' | 'PACKAGE' | 'INTERNET';

// Highest precedence first
export const TIER_ORDER: readonly SourceTier[] = ['USER', 'PROJECT', 'PACKAGE', 'INTERNET'];

export const RESOURCE_KINDS = ['role', 'thought', 'execution', 'knowledge', 'prompt'] as const;
export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export type ResourceLocation =
  | { type: 'file'; path: string }
  | { type: 'url'; url: string };

export interface ResourceMetadata {
  tier: SourceTier;
  priority: number; // lower = higher precedence
  registeredAt: number; // ms since epoch
}

export interface ResourceRecord {
  id: string; // e.g. role:writer
  location: ResourceLocation;
  metadata: ResourceMetadata;
  kind?: ResourceKind;
  name?: string;
  title?: string;
  description?: string;
}

export interface DiscoveryResult {
  source: string;
  tier: SourceTier;
  records: readonly ResourceRecord[];
}

export interface Affordance {
  command: string;
  hint: string;
  args?: Record<string, string>;
}

export interface ErrorInfo {
  code: string;
  message: string;
}

export type CommandEnvelope<T = unknown> =
  | { ok: true; command: string; purpose: string; content: T; affordances: Affordance[] }
  | { ok: false; command: string; purpose: string; error: ErrorInfo; affordances: Affordance[] };

export type ContextValue = string | number | boolean | null | ContextValue[] | { [key: string]: ContextValue };
export type ContextValues = Record<string, ContextValue>;

export interface Memory {
  id: string;
  role: string;
  content: string;
  tags: string[];
  createdAt: string; // ISO
}
