import { UnsupportedSchemeError } from '../errors.js';

export const SCHEMES = ['role', 'thought', 'execution', 'knowledge', 'resource', 'prompt', 'package', 'project', 'user'] as const;
export type Scheme = (typeof SCHEMES)[number];

export function isScheme(s: string): s is Scheme {
  return (SCHEMES as readonly string[]).includes(s);
}

export interface ParsedResourceUrl {
  scheme: Scheme;
  path: string;
}

// <scheme>://<path>; an optional leading '@' (as written in prompts) is accepted
export function parseResourceUrl(url: string): ParsedResourceUrl {
  const m = url.trim().match(/^@?([a-zA-Z][a-zA-Z0-9+.-]*):\/\/(.*)$/s);
  if (!m) throw new UnsupportedSchemeError(url, 'expected <scheme>://<path>');
  const scheme = m[1].toLowerCase();
  if (!isScheme(scheme)) throw new UnsupportedSchemeError(url);
  const path = m[2];
  if (path.length === 0) throw new UnsupportedSchemeError(url, 'empty path');
  return { scheme, path };
}
