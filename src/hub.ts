import path from 'node:path';
import { createBuiltinCommands, PROJECT_PATH_KEY } from './commands/builtin.js';
import type { CommandContext, CommandTable } from './commands/base.js';
import { CommandDispatcher } from './commands/dispatcher.js';
import { projectResourcesDir, type HubConfig } from './config.js';
import { ContextStore } from './context/store.js';
import { DirectorySource, ManifestSource, discoverResources, type Clock, type DiscoveryReport, type DiscoverySource } from './discovery/index.js';
import { MemoryStore } from './memory/store.js';
import type { FetchLike } from './protocol/loader.js';
import { createSchemeHandlers, ProtocolResolver } from './protocol/resolver.js';
import { ResourceRegistry } from './registry/registry.js';
import { createLogger, type Logger } from './utils/log.js';

export interface HubOptions {
  logger?: Logger;
  fetch?: FetchLike;
  now?: Clock;
  commands?: CommandTable;
  // Replace the tier sources (tests inject failing or slow ones)
  sources?: (projectDir: string | undefined) => DiscoverySource[];
}

export interface Hub {
  config: HubConfig;
  registry: ResourceRegistry;
  context: ContextStore;
  memories: MemoryStore;
  resolver: ProtocolResolver;
  dispatcher: CommandDispatcher;
  logger: Logger;
  projectDir(): string | undefined;
  refresh(projectPath?: string): Promise<DiscoveryReport>;
}

export function createTierSources(config: HubConfig, projectDir: string | undefined, now: Clock = Date.now): DiscoverySource[] {
  const sources: DiscoverySource[] = [
    new DirectorySource('user', 'USER', config.tiers.userDir, now),
    new DirectorySource('project', 'PROJECT', projectDir ? projectResourcesDir(projectDir) : undefined, now),
    new DirectorySource('package', 'PACKAGE', config.tiers.packageDir, now),
  ];
  if (Object.keys(config.internet).length > 0) sources.push(new ManifestSource('internet', config.internet, now));
  return sources;
}

const defaultFetch: FetchLike = (url) => fetch(url);

/**
 * Build a hub: registry, persisted context, memories, resolver and dispatcher, all owned by
 * the returned object. Nothing is process-global, so several hubs can coexist.
 * Discovery is not run here; call `refresh()`.
 */
export async function createHub(config: HubConfig, opts: HubOptions = {}): Promise<Hub> {
  const logger = opts.logger ?? createLogger(config.logLevel);
  const registry = new ResourceRegistry();
  const context = await ContextStore.open(config.stateFile, logger);
  const memories = new MemoryStore(path.join(config.dataDir, 'memory'), logger);

  const boundProject = context.getString(PROJECT_PATH_KEY) ?? config.tiers.projectDir;
  let projectDir = boundProject ? path.resolve(boundProject) : undefined;
  const sourcesFor = opts.sources ?? ((dir: string | undefined) => createTierSources(config, dir, opts.now));

  const resolver = new ProtocolResolver(
    registry,
    createSchemeHandlers({
      package: () => config.tiers.packageDir,
      project: () => (projectDir ? projectResourcesDir(projectDir) : undefined),
      user: () => config.tiers.userDir,
    }),
    opts.fetch ?? defaultFetch,
  );

  // Refreshes run one after another; each builds a fresh index and swaps it in at once
  let refreshing: Promise<unknown> = Promise.resolve();
  async function refresh(projectPath?: string): Promise<DiscoveryReport> {
    const run = refreshing.then(async () => {
      if (projectPath) projectDir = path.resolve(projectPath);
      const next = new ResourceRegistry();
      const report = await discoverResources(sourcesFor(projectDir), next, logger);
      registry.clear();
      for (const rec of next.list()) registry.register(rec);
      return report;
    });
    // a failed refresh is reported to its caller; the next one still runs
    refreshing = run.catch(() => undefined);
    return run;
  }

  const ctx: CommandContext = { registry, resolver, context, memories, refresh, logger };
  const dispatcher = new CommandDispatcher(opts.commands ?? createBuiltinCommands(), ctx);

  return {
    config,
    registry,
    context,
    memories,
    resolver,
    dispatcher,
    logger,
    projectDir: () => projectDir,
    refresh,
  };
}
