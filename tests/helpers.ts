import path from 'node:path';
import os from 'node:os';
import fsp from 'node:fs/promises';
import type { HubConfig } from '../src/config.js';
import type { ResourceRecord, SourceTier } from '../src/types.js';

export async function makeTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function rmrf(p: string) {
  await fsp.rm(p, { recursive: true, force: true });
}

export async function writeFile(root: string, rel: string, body: string): Promise<string> {
  const full = path.join(root, rel);
  await fsp.mkdir(path.dirname(full), { recursive: true });
  await fsp.writeFile(full, body, 'utf8');
  return full;
}

export function record(id: string, tier: SourceTier, priority: number, registeredAt: number, where = `/${tier.toLowerCase()}/${id}`): ResourceRecord {
  return {
    id,
    location: { type: 'file', path: where },
    metadata: { tier, priority, registeredAt },
  };
}

export function testConfig(root: string, overrides: Partial<HubConfig> = {}): HubConfig {
  const dataDir = path.join(root, 'data');
  return {
    dataDir,
    stateFile: path.join(dataDir, '.state.json'),
    tiers: {
      packageDir: path.join(root, 'package'),
      projectDir: undefined,
      userDir: path.join(root, 'user'),
    },
    internet: {},
    logLevel: 'silent',
    ...overrides,
  };
}
