/**
 * Helmsman CLI — Executor Settings
 *
 * Backend endpoints live in `<home>/executors.json`; the file is optional
 * and every section in it is optional. Tokens never go in the file: they are
 * read from the environment and handed to the executor constructors.
 *
 *   HELMSMAN_REMOTE_SERVICE_TOKEN  bearer token for the remote service
 *   HELMSMAN_WEBHOOK_TOKEN         bearer token for the webhook
 *   HELMSMAN_SCM_TOKEN             source-control token (workflow dispatch, tickets)
 *
 * A backend without settings stays registered and fails its attempts with
 * "not configured", so the dispatcher moves on to the next path.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigurationError, formatZodIssues } from '@helmsman/kernel';
import type { ActionExecutor, OperationalLogger } from '@helmsman/kernel';
import {
  IssueTrackerTicketSink,
  LocalExecutor,
  ManualTicketExecutor,
  RemoteServiceExecutor,
  WebhookExecutor,
  WorkflowDispatchExecutor,
} from '@helmsman/executors';
import type { FetchFn, TicketSink } from '@helmsman/executors';
import { isNodeError } from '@helmsman/runtime-host';

export const EXECUTORS_FILE = 'executors.json';

const repository = z.string().regex(/^[^/\s]+\/[^/\s]+$/, { message: "must be 'owner/name'" });

export const ExecutorSettingsSchema = z
  .object({
    api_base: z.string().url().optional(),
    remote_service: z
      .object({ url: z.string().url(), endpoints: z.array(z.string()).min(1).optional() })
      .strict()
      .optional(),
    webhook: z.object({ url: z.string().url() }).strict().optional(),
    workflow_dispatch: z
      .object({ repository, ref: z.string().min(1).optional(), workflows: z.record(z.string().min(1)) })
      .strict()
      .optional(),
    tickets: z.object({ repository }).strict().optional(),
  })
  .strict();

export type ExecutorSettings = z.infer<typeof ExecutorSettingsSchema>;

/** @throws ConfigurationError for unparseable JSON or schema violations */
export function loadExecutorSettings(home: string): ExecutorSettings {
  let raw: string;
  try {
    raw = readFileSync(join(home, EXECUTORS_FILE), 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return {};
    throw err;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new ConfigurationError([`${EXECUTORS_FILE}: ${err instanceof Error ? err.message : String(err)}`]);
  }
  const result = ExecutorSettingsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(formatZodIssues(result.error).map((issue) => `${EXECUTORS_FILE}: ${issue}`));
  }
  return result.data;
}

export interface BuildExecutorsOptions {
  readonly env: NodeJS.ProcessEnv;
  readonly logger: OperationalLogger;
  /** Used when no issue tracker is configured. */
  readonly fallbackTicketSink?: TicketSink | undefined;
  readonly fetchFn?: FetchFn | undefined;
}

export interface BuiltExecutors {
  readonly all: ReadonlyArray<ActionExecutor>;
  readonly local: LocalExecutor;
  readonly manual: ManualTicketExecutor;
}

export function buildExecutors(settings: ExecutorSettings, options: BuildExecutorsOptions): BuiltExecutors {
  const { env, logger, fetchFn } = options;
  const scmToken = env['HELMSMAN_SCM_TOKEN'];

  const local = new LocalExecutor({
    alert: (action) => {
      logger.warn({ action_id: action.id, targets: action.targets, params: action.params }, 'alert raised');
      return { alerted: true };
    },
  });

  const remote = new RemoteServiceExecutor({
    baseUrl: settings.remote_service?.url,
    endpoints: settings.remote_service?.endpoints,
    token: env['HELMSMAN_REMOTE_SERVICE_TOKEN'],
    fetchFn,
  });

  const webhook = new WebhookExecutor({
    baseUrl: settings.webhook?.url,
    token: env['HELMSMAN_WEBHOOK_TOKEN'],
    fetchFn,
  });

  const workflow = new WorkflowDispatchExecutor({
    repository: settings.workflow_dispatch?.repository,
    ref: settings.workflow_dispatch?.ref,
    workflows: settings.workflow_dispatch?.workflows ?? {},
    token: scmToken,
    apiBase: settings.api_base,
    fetchFn,
  });

  const tickets =
    settings.tickets !== undefined && scmToken !== undefined && scmToken !== ''
      ? new IssueTrackerTicketSink({
          repository: settings.tickets.repository,
          token: scmToken,
          apiBase: settings.api_base,
          fetchFn,
        })
      : options.fallbackTicketSink ?? null;
  const manual = new ManualTicketExecutor(tickets);

  return { all: [local, remote, webhook, workflow, manual], local, manual };
}
