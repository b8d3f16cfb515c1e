import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

// Resources bundled with the install: <repo>/resources (same from src/ and dist/)
export const PACKAGE_RESOURCES_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', 'resources');

export const HUB_DIR_NAME = '.resource-hub';

export type LogLevel = 'silent' | 'warn' | 'info' | 'debug';

export interface HubConfig {
  dataDir: string;           // context state + memories
  stateFile: string;         // <dataDir>/.state.json
  tiers: {
    packageDir: string;
    projectDir?: string;     // project root; resources live under <root>/.resource-hub/resource
    userDir: string;
  };
  internet: Record<string, string>; // resource id -> url
  logLevel: LogLevel;
}

const FileConfigSchema = z.object({
  dataDir: z.string().optional(),
  packageResourcesDir: z.string().optional(),
  projectDir: z.string().optional(),
  userResourcesDir: z.string().optional(),
  internet: z.record(z.string(), z.string().url()).optional(),
  logLevel: z.enum(['silent', 'warn', 'info', 'debug']).optional(),
});
export type FileConfig = z.infer<typeof FileConfigSchema>;

export function getCliArg(argv: readonly string[], name: string): string | undefined {
  const idx = argv.indexOf(name);
  if (idx >= 0 && idx + 1 < argv.length) return argv[idx + 1];
  return undefined;
}

export function parseBool(v: unknown, def = false): boolean {
  if (typeof v === 'boolean') return v;
  const s = String(v ?? '').toLowerCase();
  if (!s) return def;
  return ['1', 'true', 'yes', 'on'].includes(s);
}

function nonEmpty(v: string | undefined): string | undefined {
  return v && v.trim().length > 0 ? v : undefined;
}

// Source order: --config <file> -> MCP_CONFIG_JSON -> nothing (env only)
export function readFileConfig(argv: readonly string[], env: NodeJS.ProcessEnv): FileConfig {
  const cliConfigPath = getCliArg(argv, '--config');
  let raw: unknown = {};
  if (cliConfigPath) {
    try {
      raw = JSON.parse(fs.readFileSync(cliConfigPath, 'utf8'));
    } catch (e) {
      console.warn(`[config] Failed to read --config ${cliConfigPath}:`, e);
    }
  } else if (env.MCP_CONFIG_JSON) {
    try {
      raw = JSON.parse(env.MCP_CONFIG_JSON);
    } catch (e) {
      console.warn('[config] Failed to parse MCP_CONFIG_JSON:', e);
    }
  }
  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn('[config] Ignoring invalid config:', parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
    return {};
  }
  return parsed.data;
}

// INTERNET_MANIFEST is a JSON object of { "<id>": "<url>" }
function parseManifestEnv(value: string | undefined): Record<string, string> {
  if (!value) return {};
  try {
    const parsed = z.record(z.string(), z.string().url()).safeParse(JSON.parse(value));
    if (parsed.success) return parsed.data;
    console.warn('[config] INTERNET_MANIFEST must map ids to URLs; ignoring');
  } catch (e) {
    console.warn('[config] Failed to parse INTERNET_MANIFEST:', e);
  }
  return {};
}

function parseLogLevel(env: NodeJS.ProcessEnv, fromFile: LogLevel | undefined): LogLevel {
  const v = fromFile ?? env.LOG_LEVEL;
  if (v === 'silent' || v === 'warn' || v === 'info' || v === 'debug') return v;
  if (parseBool(env.LOG_STARTUP)) return 'info';
  return 'warn';
}

export function loadConfig(argv: readonly string[] = process.argv, env: NodeJS.ProcessEnv = process.env): HubConfig {
  const fc = readFileConfig(argv, env);
  const home = os.homedir();
  const dataDir = path.resolve(nonEmpty(fc.dataDir) ?? nonEmpty(env.DATA_DIR) ?? path.join(home, HUB_DIR_NAME));
  const projectDir = nonEmpty(fc.projectDir) ?? nonEmpty(env.PROJECT_DIR);

  return {
    dataDir,
    stateFile: path.join(dataDir, '.state.json'),
    tiers: {
      packageDir: path.resolve(nonEmpty(fc.packageResourcesDir) ?? nonEmpty(env.PACKAGE_RESOURCES_DIR) ?? PACKAGE_RESOURCES_DIR),
      projectDir: projectDir ? path.resolve(projectDir) : undefined,
      userDir: path.resolve(nonEmpty(fc.userResourcesDir) ?? nonEmpty(env.USER_RESOURCES_DIR) ?? path.join(home, HUB_DIR_NAME, 'resource')),
    },
    internet: fc.internet ?? parseManifestEnv(env.INTERNET_MANIFEST),
    logLevel: parseLogLevel(env, fc.logLevel),
  };
}

export function projectResourcesDir(projectRoot: string): string {
  return path.join(projectRoot, HUB_DIR_NAME, 'resource');
}
