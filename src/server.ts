import { McpServer, ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Hub } from './hub.js';
import { SCHEMES, type Scheme } from './protocol/schemes.js';
import type { ResourceKind } from './types.js';
import { envelope } from './utils/respond.js';

const SCHEME_DESCRIPTIONS: Record<Scheme, string> = {
  role: 'Role definitions (registry id role:<name>)',
  thought: 'Thinking patterns (registry id thought:<name>)',
  execution: 'Execution procedures (registry id execution:<name>)',
  knowledge: 'Knowledge documents (registry id knowledge:<name>)',
  prompt: 'Prompt templates (registry id prompt:<name>)',
  resource: 'Any registered resource by full id; percent-encode the colon (resource://role%3Awriter)',
  package: 'Files under the bundled resource directory',
  project: 'Files under <project>/.resource-hub/resource',
  user: 'Files under the user resource directory',
};

const REGISTRY_KIND: Partial<Record<Scheme, ResourceKind>> = {
  role: 'role',
  thought: 'thought',
  execution: 'execution',
  knowledge: 'knowledge',
  prompt: 'prompt',
};

/** MCP surface: one tool per dispatcher command, one resource template per scheme. */
export function createMcpServer(hub: Hub, info: { name: string; version: string }): McpServer {
  const server = new McpServer(info);

  for (const cmd of hub.dispatcher.commands) {
    server.registerTool(
      cmd.name,
      { title: cmd.title, description: cmd.description, inputSchema: cmd.inputSchema },
      async (args) => envelope(await hub.dispatcher.execute(cmd.name, args)),
    );
  }

  for (const scheme of SCHEMES) {
    const kind = REGISTRY_KIND[scheme];
    const list = kind
      ? async () => ({
          resources: hub.registry.listByKind(kind).map((rec) => ({
            uri: `${scheme}://${rec.name ?? rec.id}`,
            name: rec.id,
            description: rec.description ?? rec.title,
            mimeType: 'text/markdown',
          })),
        })
      : undefined;
    server.registerResource(
      `${scheme}-resources`,
      new ResourceTemplate(`${scheme}://{+path}`, { list }),
      { title: `${scheme}://`, description: SCHEME_DESCRIPTIONS[scheme], mimeType: 'text/markdown' },
      async (uri) => {
        const resolved = await hub.resolver.resolve(decodeURIComponent(uri.href));
        return { contents: [{ uri: uri.href, text: resolved.content, mimeType: 'text/markdown' }] };
      },
    );
  }

  server.registerResource(
    'registry',
    'registry://resources',
    { title: 'Resource registry', description: 'Every active registry record with its tier and priority', mimeType: 'application/json' },
    async (uri) => {
      const records = Array.from(hub.registry.list()).sort((a, b) => a.id.localeCompare(b.id));
      return { contents: [{ uri: uri.href, text: JSON.stringify({ total: records.length, records }, null, 2), mimeType: 'application/json' }] };
    },
  );

  return server;
}
