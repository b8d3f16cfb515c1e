import { z } from 'zod';
import { ConstructionError, InvalidArgumentsError } from '../errors.js';
import type { ContextStore } from '../context/store.js';
import type { DiscoveryReport } from '../discovery/index.js';
import type { MemoryStore } from '../memory/store.js';
import type { ProtocolResolver } from '../protocol/resolver.js';
import type { ResourceRegistry } from '../registry/registry.js';
import type { Affordance, ContextValues } from '../types.js';
import type { Logger } from '../utils/log.js';

/** Collaborators a command may use while computing its content. Owned by the hub, never global. */
export interface CommandContext {
  registry: ResourceRegistry;
  resolver: ProtocolResolver;
  context: ContextStore;
  memories: MemoryStore;
  refresh(projectPath?: string): Promise<DiscoveryReport>;
  logger: Logger;
}

export type CommandArgs<S extends z.ZodRawShape> = z.objectOutputType<S, z.ZodTypeAny, 'strip'>;

/**
 * A command supplies three computations:
 * - `purpose`: constant text for the command kind, no I/O
 * - `content`: the payload; may do I/O and may throw
 * - `affordances`: commands worth calling next, from the persisted context only
 */
export interface CommandDefinition<S extends z.ZodRawShape = z.ZodRawShape, C = unknown> {
  name: string;
  title: string;
  description: string;
  inputSchema: S;
  purpose(): string;
  content(args: CommandArgs<S>, ctx: CommandContext): Promise<C>;
  affordances(state: ContextValues): Affordance[];
}

export interface RegisteredCommand {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly inputSchema: z.ZodRawShape;
  purpose(): string;
  content(args: unknown, ctx: CommandContext): Promise<unknown>;
  affordances(state: ContextValues): Affordance[];
}

export function defineCommand<S extends z.ZodRawShape, C>(def: CommandDefinition<S, C>): CommandDefinition<S, C> {
  return def;
}

const REQUIRED_COMPUTATIONS = ['purpose', 'content', 'affordances'] as const;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}

/** Registration table built at startup. Incomplete or duplicate definitions fail here, not at call time. */
export class CommandTable {
  private readonly commands = new Map<string, RegisteredCommand>();

  register<S extends z.ZodRawShape, C>(def: CommandDefinition<S, C>): this {
    const name = typeof def?.name === 'string' ? def.name.trim() : '';
    if (!name) throw new ConstructionError('Command definition is missing a name');
    const missing = REQUIRED_COMPUTATIONS.filter((k) => typeof def[k] !== 'function');
    if (missing.length > 0) {
      throw new ConstructionError(`Command '${name}' is missing: ${missing.join(', ')}`);
    }
    if (this.commands.has(name)) throw new ConstructionError(`Command '${name}' is already registered`);

    const schema = z.object(def.inputSchema);
    this.commands.set(name, {
      name,
      title: def.title,
      description: def.description,
      inputSchema: def.inputSchema,
      purpose: () => def.purpose(),
      content: async (args, ctx) => {
        const parsed = schema.safeParse(args ?? {});
        if (!parsed.success) throw new InvalidArgumentsError(`Invalid arguments for '${name}': ${formatIssues(parsed.error)}`);
        return def.content(parsed.data, ctx);
      },
      affordances: (state) => def.affordances(state),
    });
    return this;
  }

  get(name: string): RegisteredCommand | undefined {
    return this.commands.get(name);
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  list(): RegisteredCommand[] {
    return Array.from(this.commands.values());
  }
}
