import path from 'node:path';
import { z } from 'zod';
import { countByTier } from '../discovery/index.js';
import { DEFAULT_MEMORY_ROLE, normalizeQuery } from '../memory/store.js';
import { RESOURCE_KINDS, type Affordance, type ContextValues, type ResourceRecord } from '../types.js';
import { CommandTable, defineCommand } from './base.js';

export const ACTIVE_ROLE_KEY = 'activeRole';
export const PROJECT_PATH_KEY = 'projectPath';
export const LEARNED_KEY = 'learned';
const LEARNED_LIMIT = 50;

function activeRole(state: ContextValues): string | undefined {
  const v = state[ACTIVE_ROLE_KEY];
  return typeof v === 'string' && v.length > 0 ? v : undefined;
}

// Next steps depend only on whether a role is active
export function roleAffordances(state: ContextValues): Affordance[] {
  const role = activeRole(state);
  if (!role) {
    return [
      { command: 'welcome', hint: 'List the roles and resources that can be activated' },
      { command: 'action', hint: 'Activate a role by name' },
    ];
  }
  return [
    { command: 'recall', hint: `Recall what ${role} remembers`, args: { role } },
    { command: 'remember', hint: `Store a memory for ${role}`, args: { role } },
    { command: 'learn', hint: 'Load a resource by <scheme>://<path>' },
    { command: 'action', hint: 'Switch to another role' },
  ];
}

function summarize(rec: ResourceRecord) {
  return {
    id: rec.id,
    name: rec.name ?? rec.id,
    title: rec.title ?? null,
    description: rec.description ?? null,
    tier: rec.metadata.tier,
  };
}

export const initCommand = defineCommand({
  name: 'init',
  title: 'Initialize workspace',
  description: 'Bind the hub to a project directory and re-run resource discovery across all tiers.',
  inputSchema: {
    projectPath: z.string().optional(),
  },
  purpose: () => 'Discover resources for the current project so they can be listed and activated',
  content: async (args, ctx) => {
    const given = args.projectPath?.trim();
    const projectPath = given ? path.resolve(given) : undefined;
    if (projectPath) await ctx.context.set(PROJECT_PATH_KEY, projectPath);
    const report = await ctx.refresh(projectPath ?? ctx.context.getString(PROJECT_PATH_KEY));
    return {
      projectPath: projectPath ?? ctx.context.getString(PROJECT_PATH_KEY) ?? null,
      total: ctx.registry.size,
      byTier: countByTier(ctx.registry),
      failures: report.failures.map((f) => ({ source: f.source, message: f.message })),
      inconsistencies: report.inconsistencies,
    };
  },
  affordances: () => [{ command: 'welcome', hint: 'List the roles and resources that were discovered' }],
});

export const welcomeCommand = defineCommand({
  name: 'welcome',
  title: 'List resources',
  description: 'List every registered resource grouped by kind, with the tier it came from.',
  inputSchema: {},
  purpose: () => 'Show which roles and resources are available to activate or learn',
  content: async (_args, ctx) => {
    const resources: Record<string, ReturnType<typeof summarize>[]> = {};
    for (const kind of RESOURCE_KINDS) {
      resources[kind] = ctx.registry.listByKind(kind).map(summarize);
    }
    const other = Array.from(ctx.registry.list()).filter((r) => !r.kind).map(summarize);
    if (other.length > 0) resources.other = other.sort((a, b) => a.id.localeCompare(b.id));
    return { total: ctx.registry.size, activeRole: ctx.context.getString(ACTIVE_ROLE_KEY) ?? null, resources };
  },
  affordances: (state) => [
    { command: 'action', hint: 'Activate one of the listed roles' },
    { command: 'learn', hint: 'Load any listed resource by <scheme>://<path>' },
    ...(activeRole(state) ? [] : [{ command: 'init', hint: 'Re-run discovery for a project directory' }]),
  ],
});

export const actionCommand = defineCommand({
  name: 'action',
  title: 'Activate role',
  description: 'Load a role definition and make it the active role.',
  inputSchema: {
    role: z.string().trim().min(1),
  },
  purpose: () => 'Load the role definition and make it the active role for later commands',
  content: async (args, ctx) => {
    const resolved = await ctx.resolver.resolve(`role://${args.role}`);
    await ctx.context.set(ACTIVE_ROLE_KEY, args.role);
    return {
      role: args.role,
      tier: resolved.record?.metadata.tier ?? null,
      title: resolved.record?.title ?? null,
      content: resolved.content,
    };
  },
  affordances: roleAffordances,
});

export const learnCommand = defineCommand({
  name: 'learn',
  title: 'Learn resource',
  description: 'Load any resource by <scheme>://<path> (role, thought, execution, knowledge, resource, prompt, package, project, user).',
  inputSchema: {
    resource: z.string().trim().min(1),
  },
  purpose: () => 'Load a resource into the conversation by its protocol address',
  content: async (args, ctx) => {
    const resolved = await ctx.resolver.resolve(args.resource);
    const learned = ctx.context.getStringList(LEARNED_KEY).filter((u) => u !== resolved.url);
    learned.push(resolved.url);
    await ctx.context.set(LEARNED_KEY, learned.slice(-LEARNED_LIMIT));
    return {
      url: resolved.url,
      scheme: resolved.scheme,
      id: resolved.id ?? null,
      content: resolved.content,
    };
  },
  affordances: roleAffordances,
});

export const rememberCommand = defineCommand({
  name: 'remember',
  title: 'Remember',
  description: 'Store a memory for a role (defaults to the active role).',
  inputSchema: {
    content: z.string().trim().min(1),
    role: z.string().optional(),
    tags: z.array(z.string()).optional(),
  },
  purpose: () => 'Keep a piece of knowledge so the role can recall it later',
  content: async (args, ctx) => {
    const role = args.role?.trim() || ctx.context.getString(ACTIVE_ROLE_KEY) || DEFAULT_MEMORY_ROLE;
    const memory = await ctx.memories.remember({ role, content: args.content, tags: args.tags });
    return { memory };
  },
  affordances: roleAffordances,
});

export const recallCommand = defineCommand({
  name: 'recall',
  title: 'Recall',
  description: 'List memories of a role, newest first. Every query term must match; an empty query returns everything.',
  inputSchema: {
    query: z.string().optional(),
    role: z.string().optional(),
    limit: z.number().int().min(1).max(500).optional(),
  },
  purpose: () => 'Retrieve what a role has remembered so far',
  content: async (args, ctx) => {
    const role = args.role?.trim() || ctx.context.getString(ACTIVE_ROLE_KEY) || DEFAULT_MEMORY_ROLE;
    const terms = normalizeQuery(args.query);
    const memories = await ctx.memories.recall(role, args.query, args.limit);
    return { role, query: terms.length ? terms.join(' ') : null, count: memories.length, memories };
  },
  affordances: roleAffordances,
});

export function createBuiltinCommands(): CommandTable {
  return new CommandTable()
    .register(initCommand)
    .register(welcomeCommand)
    .register(actionCommand)
    .register(learnCommand)
    .register(rememberCommand)
    .register(recallCommand);
}
