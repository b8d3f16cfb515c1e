import { NotFoundError, toErrorInfo } from '../errors.js';
import type { Affordance, CommandEnvelope } from '../types.js';
import type { CommandContext, CommandTable, RegisteredCommand } from './base.js';

/**
 * Executes commands into envelopes. Each call runs purpose -> content -> affordances in
 * sequence and keeps no state of its own between calls; `execute` always resolves.
 */
export class CommandDispatcher {
  constructor(private readonly table: CommandTable, private readonly ctx: CommandContext) {}

  get commands(): RegisteredCommand[] {
    return this.table.list();
  }

  async execute(commandId: string, args: unknown = {}): Promise<CommandEnvelope> {
    const cmd = this.table.get(commandId);
    if (!cmd) {
      return {
        ok: false,
        command: commandId,
        purpose: 'Unknown command',
        error: new NotFoundError(commandId, 'Command').toJSON(),
        affordances: this.catalogue(),
      };
    }

    let purpose = cmd.title;
    try {
      purpose = cmd.purpose();
      const content = await cmd.content(args, this.ctx);
      const affordances = cmd.affordances(this.ctx.context.snapshot());
      return { ok: true, command: cmd.name, purpose, content, affordances };
    } catch (e) {
      this.ctx.logger.warn('dispatch', `${cmd.name} failed:`, e instanceof Error ? e.message : e);
      return { ok: false, command: cmd.name, purpose, error: toErrorInfo(e), affordances: this.affordancesAfterFailure(cmd) };
    }
  }

  private affordancesAfterFailure(cmd: RegisteredCommand): Affordance[] {
    try {
      return cmd.affordances(this.ctx.context.snapshot());
    } catch (e) {
      this.ctx.logger.warn('dispatch', `${cmd.name} affordances failed:`, e instanceof Error ? e.message : e);
      return this.catalogue();
    }
  }

  private catalogue(): Affordance[] {
    return this.table.list().map((c) => ({ command: c.name, hint: c.title }));
  }
}
