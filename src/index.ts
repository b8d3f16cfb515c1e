#!/usr/bin/env node
import path from 'node:path';
import fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { createHub } from './hub.js';
import { createMcpServer } from './server.js';
import { getErrorMessage } from './errors.js';

export const SERVER_NAME = 'mcp-resource-hub';

async function main() {
  const HERE_DIR = path.dirname(fileURLToPath(import.meta.url));
  const REPO_ROOT = path.resolve(HERE_DIR, '..');
  async function getPackageVersion(): Promise<string> {
    // Prefer npm-provided env when available
    const vEnv = process.env.npm_package_version;
    if (vEnv) return vEnv;
    try {
      const raw = await fs.readFile(path.join(REPO_ROOT, 'package.json'), 'utf8');
      const parsed: unknown = JSON.parse(raw);
      if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') return parsed.version;
    } catch (e) {
      console.warn('[startup] could not read package.json version:', getErrorMessage(e));
    }
    return '0.0.0';
  }

  const config = loadConfig();
  const hub = await createHub(config);
  hub.logger.info('startup', `${SERVER_NAME} starting`, { ts: new Date().toISOString(), pid: process.pid });
  hub.logger.info('startup', { dataDir: config.dataDir, tiers: config.tiers, internet: Object.keys(config.internet).length });

  const report = await hub.refresh();
  for (const f of report.failures) hub.logger.warn('startup', f.message);
  hub.logger.info('startup', `registry holds ${hub.registry.size} resources`);

  const server = createMcpServer(hub, { name: SERVER_NAME, version: await getPackageVersion() });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = async () => {
    await hub.context.flush();
    await server.close();
    process.exit(0);
  };
  process.on('SIGINT', () => { shutdown().catch((e) => { console.error('[shutdown]', e); process.exit(1); }); });
  process.on('SIGTERM', () => { shutdown().catch((e) => { console.error('[shutdown]', e); process.exit(1); }); });
}

main().catch((e) => {
  console.error('[startup] fatal:', e);
  process.exit(1);
});
