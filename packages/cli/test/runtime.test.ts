/**
 * Helmsman CLI — Runtime and Executor Settings Tests
 *
 *   CLI-U1: executors.json is optional and validated
 *   CLI-U2: one executor per default path, in path-table names
 *   CLI-U3: a submitted action falls through unconfigured paths to the webhook
 *   CLI-U4: state and the audit trail survive into the next invocation
 *
 * Isolation: homes are temp dirs; HTTP goes to an in-process fetch stand-in.
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ActionState, ConfigurationError, DEFAULT_PATHS, RiskTier, silentLogger } from '@helmsman/kernel';
import type { Action } from '@helmsman/kernel';
import type { FetchFn } from '@helmsman/executors';
import { buildExecutors, loadExecutorSettings } from '../src/executor-settings.js';
import { buildRuntime } from '../src/runtime.js';
import { queryLogs } from '../src/commands/log.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function tempHome(): string {
  return mkdtempSync(join(tmpdir(), 'helmsman-cli-'));
}

/** Answers 202 for the one webhook URL the test configures, 404 otherwise. */
function webhookFetch(calls: string[]): FetchFn {
  return (input) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    calls.push(url);
    const status = url === 'http://hooks.test/clear_cache' ? 202 : 404;
    return Promise.resolve(new Response('ok', { status }));
  };
}

const action: Action = {
  id: 'cache-1',
  type: 'clear_cache',
  targets: ['api'],
  risk_tier: RiskTier.Low,
  confidence: 0.95,
  proposed_at: '2026-01-01T00:00:00.000Z',
};

// ---------------------------------------------------------------------------
// Executor settings
// ---------------------------------------------------------------------------

describe('executor settings', () => {
  it('CLI-U1: absent file means no settings; a bad file lists its issues', () => {
    const home = tempHome();
    expect(loadExecutorSettings(home)).toEqual({});

    writeFileSync(join(home, 'executors.json'), JSON.stringify({ webhook: { url: 'not a url' } }));
    let caught: unknown;
    try {
      loadExecutorSettings(home);
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof ConfigurationError ? caught.issues : []).toEqual([
      'executors.json: webhook.url: Invalid url',
    ]);
  });

  it('CLI-U2: builds an executor for every default path', () => {
    const built = buildExecutors({}, { env: {}, logger: silentLogger });
    expect(built.all.map((e) => e.name)).toEqual(DEFAULT_PATHS.map((p) => p.name));
    expect(built.local.handles('alert')).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Runtime
// ---------------------------------------------------------------------------

describe('buildRuntime', () => {
  it('CLI-U3: falls through unconfigured paths to the webhook', async () => {
    const home = tempHome();
    writeFileSync(join(home, 'executors.json'), JSON.stringify({ webhook: { url: 'http://hooks.test' } }));
    const calls: string[] = [];
    const runtime = buildRuntime({ home, env: {}, logger: silentLogger, fetchFn: webhookFetch(calls) });

    const submission = await runtime.pipeline.submit(action);

    expect(submission.kind).toBe('dispatched');
    expect(submission.kind === 'dispatched' ? submission.result.path : null).toBe('webhook');
    expect(runtime.pipeline.record('cache-1')?.attempts.map((a) => a.path)).toEqual([
      'local',
      'remote-service',
      'webhook',
    ]);
    expect(calls).toEqual(['http://hooks.test/clear_cache']);
  });

  it('CLI-U4: the next invocation sees the record and the audit trail', async () => {
    const home = tempHome();
    writeFileSync(join(home, 'executors.json'), JSON.stringify({ webhook: { url: 'http://hooks.test' } }));
    const first = buildRuntime({ home, env: {}, logger: silentLogger, fetchFn: webhookFetch([]) });
    await first.pipeline.submit(action);

    const second = buildRuntime({ home, env: {}, logger: silentLogger });
    expect(second.restored).toEqual({ records: 1, interrupted: 0, halted: false });
    expect(second.pipeline.record('cache-1')?.state).toBe(ActionState.Succeeded);

    const decisions = queryLogs(second.stateIO, { kind: 'decisions', limit: 10 });
    expect(decisions.events.map((e) => e.verdict)).toEqual(['ALLOW']);
    const attempts = queryLogs(second.stateIO, { kind: 'attempts', action_id: 'cache-1', limit: 10 });
    expect(attempts.events.map((e) => e['path']).sort()).toEqual(['local', 'remote-service', 'webhook']);
    expect(() => queryLogs(second.stateIO, { kind: 'everything', limit: 10 })).toThrow(
      "Unknown log 'everything'. Valid: decisions, attempts, transitions, all",
    );
  });
});
