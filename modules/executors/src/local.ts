/**
 * Helmsman Executors — Local
 *
 * In-process handlers registered per action type. The fastest path: no
 * network. An action type without a handler fails the attempt so the
 * dispatcher moves on to the next path.
 */

import type { Action, ActionExecutor, ExecuteContext, ExecutorOutcome } from '@helmsman/kernel';

export type LocalHandler = (action: Action, signal: AbortSignal) => Promise<unknown> | unknown;

export class LocalExecutor implements ActionExecutor {
  readonly name: string;
  private readonly handlers = new Map<string, LocalHandler>();

  constructor(handlers: Readonly<Record<string, LocalHandler>> = {}, name = 'local') {
    this.name = name;
    for (const [type, handler] of Object.entries(handlers)) this.handlers.set(type, handler);
  }

  register(actionType: string, handler: LocalHandler): void {
    this.handlers.set(actionType, handler);
  }

  handles(actionType: string): boolean {
    return this.handlers.has(actionType);
  }

  async execute(action: Action, context: ExecuteContext): Promise<ExecutorOutcome> {
    const handler = this.handlers.get(action.type);
    if (handler === undefined) {
      return { ok: false, error: `no local handler for action type '${action.type}'` };
    }
    const data = await handler(action, context.signal);
    return { ok: true, detail: `handled locally: ${action.type}`, data };
  }
}
