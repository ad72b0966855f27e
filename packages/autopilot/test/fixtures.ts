/**
 * Shared fixtures for autopilot tests: a controllable clock, scripted
 * executors and a pipeline factory over in-memory state.
 */

import { RiskTier, parseGovernanceConfig } from '@helmsman/kernel';
import type {
  Action,
  ActionExecutor,
  Clock,
  ExecuteContext,
  ExecutorOutcome,
  GovernanceConfigInput,
} from '@helmsman/kernel';
import { FileGovernanceStore, MemoryStateIO } from '@helmsman/runtime-host';
import { ActionPipeline } from '../src/pipeline.js';

export const T0 = '2026-01-01T00:00:00.000Z';

export class TestClock {
  private nowMs = Date.parse(T0);
  readonly clock: Clock = () => new Date(this.nowMs);

  advance(ms: number): void {
    this.nowMs += ms;
  }
}

export type Behaviour = (action: Action) => ExecutorOutcome;

export const succeed: Behaviour = () => ({ ok: true, detail: 'done' });
export const fail: Behaviour = (action) => ({ ok: false, error: `${action.type} failed` });

/** Executor whose outcome is decided per call by a swappable behaviour. */
export class ScriptedExecutor implements ActionExecutor {
  readonly calls: string[] = [];

  constructor(
    readonly name: string,
    public behaviour: Behaviour = succeed,
  ) {}

  execute(action: Action, _context: ExecuteContext): Promise<ExecutorOutcome> {
    this.calls.push(action.id);
    return Promise.resolve(this.behaviour(action));
  }
}

export function makeAction(overrides: Partial<Action> = {}): Action {
  return {
    id: 'act-1',
    type: 'restart_service',
    targets: ['svc1'],
    risk_tier: RiskTier.Medium,
    confidence: 0.95,
    proposed_at: T0,
    ...overrides,
  };
}

/** Two non-terminal paths, so a dispatch can exhaust. */
export const TWO_PATHS: GovernanceConfigInput['paths'] = [
  { name: 'local', timeout_ms: 1000, priority: 0, reliability_estimate: 0.95 },
  { name: 'webhook', timeout_ms: 1000, priority: 1, reliability_estimate: 0.85 },
];

export interface Harness {
  readonly pipeline: ActionPipeline;
  readonly stateIO: MemoryStateIO;
  readonly store: FileGovernanceStore;
  readonly local: ScriptedExecutor;
  readonly webhook: ScriptedExecutor;
  readonly time: TestClock;
}

export function makeHarness(config: GovernanceConfigInput = {}, stateIO = new MemoryStateIO()): Harness {
  const time = new TestClock();
  const local = new ScriptedExecutor('local');
  const webhook = new ScriptedExecutor('webhook');
  const store = new FileGovernanceStore(stateIO, time.clock);
  const pipeline = new ActionPipeline({
    config: parseGovernanceConfig({ paths: TWO_PATHS, ...config }),
    executors: [local, webhook],
    store,
    clock: time.clock,
  });
  return { pipeline, stateIO, store, local, webhook, time };
}
