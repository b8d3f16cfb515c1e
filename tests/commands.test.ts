import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import { z } from 'zod';
import { createHub, type Hub } from '../src/hub.js';
import { CommandTable, defineCommand, type CommandDefinition } from '../src/commands/base.js';
import { ContextStore } from '../src/context/store.js';
import { ConstructionError } from '../src/errors.js';
import { silentLogger } from '../src/utils/log.js';
import type { CommandEnvelope } from '../src/types.js';
import { makeTmp, rmrf, testConfig, writeFile } from './helpers.js';

let TMP: string;

beforeEach(async () => {
  TMP = await makeTmp('resource-hub-commands-');
  await writeFile(TMP, 'package/role/writer/writer.role.md', '---\ntitle: Stock writer\n---\nPackage writer');
  await writeFile(TMP, 'package/thought/critical.thought.md', 'Check assumptions.');
  await writeFile(TMP, 'project/.resource-hub/resource/role/writer.role.md', '---\ntitle: Project writer\n---\nProject writer');
});

afterEach(async () => {
  await rmrf(TMP);
});

async function hub(): Promise<Hub> {
  const h = await createHub(testConfig(TMP), { logger: silentLogger });
  await h.refresh();
  return h;
}

function content(env: CommandEnvelope): unknown {
  if (!env.ok) throw new Error(`expected ok envelope, got ${env.error.code}: ${env.error.message}`);
  return env.content;
}

describe('CommandTable', () => {
  const complete = defineCommand({
    name: 'ping',
    title: 'Ping',
    description: 'Replies pong',
    inputSchema: { n: z.number().optional() },
    purpose: () => 'Check the server answers',
    content: async (args) => ({ pong: args.n ?? 0 }),
    affordances: () => [],
  });

  it('rejects a definition missing a computation at registration', () => {
    const { content: _dropped, ...partial } = complete;
    const table = new CommandTable();
    expect(() => table.register(partial as unknown as CommandDefinition)).toThrow(ConstructionError);
    expect(() => table.register(partial as unknown as CommandDefinition)).toThrow("Command 'ping' is missing: content");
    expect(table.has('ping')).toBe(false);
  });

  it('rejects duplicates and nameless definitions', () => {
    const table = new CommandTable().register(complete);
    expect(() => table.register(complete)).toThrow("Command 'ping' is already registered");
    expect(() => table.register({ ...complete, name: '  ' })).toThrow('Command definition is missing a name');
  });
});

describe('CommandDispatcher', () => {
  it('recall with an empty query applies no filter', async () => {
    const h = await hub();
    const env = await h.dispatcher.execute('recall', { query: '' });
    expect(env.ok).toBe(true);
    expect(content(env)).toEqual({ role: 'default', query: null, count: 0, memories: [] });
  });

  it('recall filters by every term, newest first; whitespace means everything', async () => {
    const h = await hub();
    await h.dispatcher.execute('remember', { content: 'Deploy on Fridays is banned', tags: ['ops'] });
    await h.dispatcher.execute('remember', { content: 'Release notes go in CHANGELOG' });
    await h.dispatcher.execute('remember', { content: 'Deploy needs a ticket', tags: ['ops', 'process'] });

    const all = content(await h.dispatcher.execute('recall', { query: '   ' }));
    expect(all).toMatchObject({ query: null, count: 3 });

    const hits = await h.dispatcher.execute('recall', { query: 'deploy OPS' });
    expect(content(hits)).toMatchObject({
      role: 'default',
      query: 'deploy ops',
      count: 2,
      memories: [{ content: 'Deploy needs a ticket' }, { content: 'Deploy on Fridays is banned' }],
    });
  });

  it('returns an error envelope for unknown commands', async () => {
    const h = await hub();
    const env = await h.dispatcher.execute('fly', {});
    expect(env).toMatchObject({ ok: false, command: 'fly', error: { code: 'NOT_FOUND', message: 'Command not found: fly' } });
    expect(env.affordances.map((a) => a.command)).toEqual(['init', 'welcome', 'action', 'learn', 'remember', 'recall']);
  });

  it('action activates a role and points at role-scoped next steps', async () => {
    const h = await hub();
    const env = await h.dispatcher.execute('action', { role: 'writer' });
    expect(content(env)).toEqual({ role: 'writer', tier: 'PACKAGE', title: 'Stock writer', content: 'Package writer' });
    expect(env.purpose).toBe('Load the role definition and make it the active role for later commands');
    expect(env.affordances[0]).toEqual({ command: 'recall', hint: 'Recall what writer remembers', args: { role: 'writer' } });
    expect(h.context.getString('activeRole')).toBe('writer');
  });

  it('content failures become error envelopes with the taxonomy code', async () => {
    const h = await hub();
    const missing = await h.dispatcher.execute('action', { role: 'ghost' });
    expect(missing).toMatchObject({ ok: false, command: 'action', error: { code: 'NOT_FOUND', message: 'Resource not found: role:ghost' } });
    expect(missing.affordances.map((a) => a.command)).toEqual(['welcome', 'action']);

    const scheme = await h.dispatcher.execute('learn', { resource: 'ftp://x' });
    expect(scheme).toMatchObject({ ok: false, error: { code: 'UNSUPPORTED_SCHEME' } });

    const invalid = await h.dispatcher.execute('action', {});
    expect(invalid).toMatchObject({ ok: false, error: { code: 'INVALID_ARGUMENTS' } });
  });

  it('learn loads any scheme and remembers what was learned', async () => {
    const h = await hub();
    const env = await h.dispatcher.execute('learn', { resource: 'thought://critical' });
    expect(content(env)).toEqual({ url: 'thought://critical', scheme: 'thought', id: 'thought:critical', content: 'Check assumptions.' });
    await h.dispatcher.execute('learn', { resource: 'package://thought/critical.thought.md' });
    await h.dispatcher.execute('learn', { resource: 'thought://critical' });
    expect(h.context.getStringList('learned')).toEqual(['package://thought/critical.thought.md', 'thought://critical']);
    await h.dispatcher.execute('learn', { resource: '@thought://critical' });
    expect(h.context.getStringList('learned')).toEqual(['package://thought/critical.thought.md', 'thought://critical']);
  });

  it('init binds a project and lets its resources override the package tier', async () => {
    const h = await hub();
    const env = await h.dispatcher.execute('init', { projectPath: path.join(TMP, 'project') });
    expect(content(env)).toMatchObject({
      projectPath: path.join(TMP, 'project'),
      total: 2,
      byTier: { USER: 0, PROJECT: 1, PACKAGE: 1, INTERNET: 0 },
      failures: [],
    });
    expect(env.affordances).toEqual([{ command: 'welcome', hint: 'List the roles and resources that were discovered' }]);

    const welcome = content(await h.dispatcher.execute('welcome', {}));
    expect(welcome).toMatchObject({
      total: 2,
      resources: { role: [{ id: 'role:writer', title: 'Project writer', tier: 'PROJECT' }], thought: [{ id: 'thought:critical', tier: 'PACKAGE' }] },
    });
  });

  it('affordances come from the persisted context after a restart', async () => {
    const first = await hub();
    await first.dispatcher.execute('action', { role: 'writer' });
    await first.dispatcher.execute('remember', { content: 'Prefer short sentences' });
    await first.context.flush();

    const second = await hub();
    const env = await second.dispatcher.execute('recall', {});
    expect(content(env)).toMatchObject({ role: 'writer', count: 1, memories: [{ content: 'Prefer short sentences', role: 'writer' }] });
    expect(env.affordances.map((a) => a.command)).toEqual(['recall', 'remember', 'learn', 'action']);
  });

  it('project binding survives a restart', async () => {
    const first = await hub();
    await first.dispatcher.execute('init', { projectPath: path.join(TMP, 'project') });
    const second = await hub();
    expect(second.projectDir()).toBe(path.join(TMP, 'project'));
    expect(second.registry.get('role:writer')?.metadata.tier).toBe('PROJECT');
  });

  it('binds a relative project path as an absolute one that survives a restart', async () => {
    const absolute = path.join(TMP, 'project');
    const relative = path.relative(process.cwd(), absolute);
    const first = await hub();
    const env = await first.dispatcher.execute('init', { projectPath: relative });
    expect(content(env)).toMatchObject({ projectPath: absolute });
    expect(first.context.getString('projectPath')).toBe(absolute);

    const second = await hub();
    expect(second.projectDir()).toBe(absolute);
    expect(second.registry.get('role:writer')?.metadata.tier).toBe('PROJECT');
  });

  it('resolves a relative project path already in the state file', async () => {
    const store = await ContextStore.open(testConfig(TMP).stateFile);
    await store.set('projectPath', path.relative(process.cwd(), path.join(TMP, 'project')));
    const h = await hub();
    expect(h.projectDir()).toBe(path.join(TMP, 'project'));
  });

  it('a failing tier source is reported by init, not thrown', async () => {
    const h = await createHub(testConfig(TMP), {
      logger: silentLogger,
      sources: () => [
        { name: 'user', tier: 'USER', discover: async () => { throw new Error('permission denied'); } },
        { name: 'package', tier: 'PACKAGE', discover: async () => ({ source: 'package', tier: 'PACKAGE', records: [] }) },
      ],
    });
    const env = await h.dispatcher.execute('init', {});
    expect(content(env)).toMatchObject({
      total: 0,
      failures: [{ source: 'user', message: "Discovery source 'user' failed: permission denied" }],
    });
  });
});
