import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import path from 'node:path';
import { ResourceRegistry } from '../src/registry/registry.js';
import { createSchemeHandlers, ProtocolResolver } from '../src/protocol/resolver.js';
import { SCHEMES, parseResourceUrl } from '../src/protocol/schemes.js';
import type { FetchLike } from '../src/protocol/loader.js';
import { ContentResolutionError, NotFoundError, UnsupportedSchemeError } from '../src/errors.js';
import { makeTmp, rmrf, writeFile } from './helpers.js';

let TMP: string;
let writerPath: string;

beforeAll(async () => {
  TMP = await makeTmp('resource-hub-resolver-');
  writerPath = await writeFile(TMP, 'package/role/writer/writer.role.md', '---\ntitle: Writer\n---\nWrite clearly.\n');
  await writeFile(TMP, 'package/notes/plain.txt', 'plain text');
  await writeFile(TMP, 'secret.md', 'outside');
  await writeFile(TMP, 'package/notes/bad.md', '---\ntitle: [unclosed\n---\nBody\n');
});

afterAll(async () => {
  await rmrf(TMP);
});

function setup(fetchImpl: FetchLike = vi.fn<FetchLike>(async () => ({ ok: true, status: 200, text: async () => '' }))) {
  const registry = new ResourceRegistry();
  registry.register({
    id: 'role:writer',
    kind: 'role',
    name: 'writer',
    location: { type: 'file', path: writerPath },
    metadata: { tier: 'PACKAGE', priority: 100, registeredAt: 1 },
  });
  registry.register({
    id: 'knowledge:remote',
    kind: 'knowledge',
    location: { type: 'url', url: 'https://example.test/remote.md' },
    metadata: { tier: 'INTERNET', priority: 100, registeredAt: 1 },
  });
  const handlers = createSchemeHandlers({
    package: () => path.join(TMP, 'package'),
    project: () => undefined,
    user: () => path.join(TMP, 'user'),
  });
  return { registry, resolver: new ProtocolResolver(registry, handlers, fetchImpl), fetchImpl };
}

describe('parseResourceUrl', () => {
  it('knows exactly nine schemes', () => {
    expect([...SCHEMES].sort()).toEqual(['execution', 'knowledge', 'package', 'project', 'prompt', 'resource', 'role', 'thought', 'user']);
  });

  it('splits scheme and path, accepting a leading @', () => {
    expect(parseResourceUrl('role://writer')).toEqual({ scheme: 'role', path: 'writer' });
    expect(parseResourceUrl('@thought://critical')).toEqual({ scheme: 'thought', path: 'critical' });
    expect(parseResourceUrl('package://role/writer/writer.role.md')).toEqual({ scheme: 'package', path: 'role/writer/writer.role.md' });
  });
});

describe('ProtocolResolver', () => {
  it('resolves a kind scheme through the registry and strips front matter', async () => {
    const { resolver } = setup();
    const res = await resolver.resolve('role://writer');
    expect(res.content).toBe('Write clearly.');
    expect(res.id).toBe('role:writer');
    expect(res.frontMatter).toEqual({ title: 'Writer' });
    expect(res.record?.metadata.tier).toBe('PACKAGE');
  });

  it('reports the address in canonical form', async () => {
    const { resolver } = setup();
    expect((await resolver.resolve('@role://writer')).url).toBe('role://writer');
    expect((await resolver.resolve('ROLE://writer')).url).toBe('role://writer');
  });

  it('resource:// takes a full registry id', async () => {
    const { resolver } = setup();
    const res = await resolver.resolve('resource://role:writer');
    expect(res.scheme).toBe('resource');
    expect(res.content).toBe('Write clearly.');
  });

  it.each(['http://example.test/x', 'foo://bar', 'role:writer', 'role://', 'writer'])(
    'rejects %s before any handler runs',
    async (url) => {
      const { resolver, registry, fetchImpl } = setup();
      const spy = vi.spyOn(registry, 'resolve');
      await expect(resolver.resolve(url)).rejects.toBeInstanceOf(UnsupportedSchemeError);
      expect(spy).not.toHaveBeenCalled();
      expect(fetchImpl).not.toHaveBeenCalled();
    },
  );

  it('propagates NotFoundError for unknown names', async () => {
    const { resolver } = setup();
    await expect(resolver.resolve('role://ghost')).rejects.toBeInstanceOf(NotFoundError);
    await expect(resolver.resolve('thought://writer')).rejects.toThrow('Resource not found: thought:writer');
  });

  it('fetches url locations with the injected fetch', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => ({ ok: true, status: 200, text: async () => '# Remote\n' }));
    const { resolver } = setup(fetchImpl);
    const res = await resolver.resolve('knowledge://remote');
    expect(res.content).toBe('# Remote');
    expect(fetchImpl).toHaveBeenCalledWith('https://example.test/remote.md');
  });

  it('turns HTTP and network failures into ContentResolutionError', async () => {
    const notFound = setup(vi.fn<FetchLike>(async () => ({ ok: false, status: 404, text: async () => 'nope' })));
    await expect(notFound.resolver.resolve('knowledge://remote')).rejects.toThrow('Cannot fetch https://example.test/remote.md: HTTP 404');
    const offline = setup(vi.fn<FetchLike>(async () => { throw new Error('ECONNREFUSED'); }));
    await expect(offline.resolver.resolve('knowledge://remote')).rejects.toBeInstanceOf(ContentResolutionError);
  });

  it('reports malformed front matter as ContentResolutionError on every read', async () => {
    const { resolver } = setup();
    const bad = path.join(TMP, 'package', 'notes', 'bad.md');
    await expect(resolver.resolve('package://notes/bad.md')).rejects.toBeInstanceOf(ContentResolutionError);
    await expect(resolver.resolve('package://notes/bad.md')).rejects.toThrow(`Cannot parse front matter in ${bad}:`);
  });

  it('reads tier paths relative to the tier root', async () => {
    const { resolver } = setup();
    expect((await resolver.resolve('package://notes/plain.txt')).content).toBe('plain text');
    expect((await resolver.resolve('package://role/writer/writer.role.md')).content).toBe('Write clearly.');
  });

  it('refuses tier paths that leave the root, and unconfigured tiers', async () => {
    const { resolver } = setup();
    await expect(resolver.resolve('package://../secret.md')).rejects.toThrow('Path escapes the package directory: ../secret.md');
    await expect(resolver.resolve('project://anything.md')).rejects.toThrow('No project directory is configured');
    await expect(resolver.resolve('user://missing.md')).rejects.toBeInstanceOf(ContentResolutionError);
  });
});
