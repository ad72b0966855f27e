/**
 * Helmsman Kernel — Action Executor Interface
 *
 * The one capability every execution backend implements. The dispatcher is
 * generic over this interface and knows nothing about individual backends:
 * a new backend is a new implementation, never a branch in the dispatcher.
 *
 * Implementations live in @helmsman/executors.
 *
 * @see docs/governance.md §4.2 (path dispatcher)
 */

import type { Action } from '../types/action.js';

export interface ExecuteContext {
  /** The path's configured timeout. The dispatcher enforces it regardless. */
  readonly timeoutMs: number;
  /**
   * Fires when the timeout elapses. Backends should pass it to their I/O;
   * the dispatcher stops waiting either way.
   */
  readonly signal: AbortSignal;
}

export type ExecutorOutcome =
  | { readonly ok: true; readonly detail?: string | undefined; readonly data?: unknown }
  | { readonly ok: false; readonly error: string };

export interface ActionExecutor {
  /** Matches PathConfig.name. */
  readonly name: string;
  /** May resolve `{ ok: false }` or throw; both count as a failed attempt. */
  execute(action: Action, context: ExecuteContext): Promise<ExecutorOutcome>;
}
