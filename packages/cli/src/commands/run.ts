/**
 * helmsman run — The observe-decide-act loop
 *
 * Polls the candidate inbox (`inbox/candidates.jsonl`) and the anomaly
 * inbox (`inbox/anomalies.jsonl`) every interval, scores and submits the
 * candidates, and keeps going until SIGINT or SIGTERM. On a signal the
 * current tick and its dispatches finish before the process exits.
 *
 * `helmsman halt` and `helmsman resume` from another shell take effect at
 * the next tick or the next record save, whichever comes first.
 *
 * @see docs/governance.md §4.5 (observe-decide-act loop)
 */

import { Command } from 'commander';
import {
  AnomalySignalSource,
  InboxAnomalyDetector,
  InboxSignalSource,
  ObserveDecideActLoop,
} from '@helmsman/autopilot';
import { FileCandidateInbox } from '@helmsman/runtime-host';
import { t } from '../output/theme.js';
import { fail, parseNumberOption, print, runtimeFor } from './shared.js';

export const runCommand = new Command('run')
  .description('Run the observe-decide-act loop until interrupted')
  .option('--interval <seconds>', 'Seconds between ticks (default: loop_interval_seconds from config.json)')
  .option('--once', 'Run a single tick and exit')
  .action(async (options: { interval?: string; once?: boolean }, command: Command) => {
    try {
      const { pipeline, logger, paths, config } = runtimeFor(command);
      const intervalSeconds = parseNumberOption('--interval', options.interval) ?? config.loop_interval_seconds;

      const loop = new ObserveDecideActLoop({
        pipeline,
        intervalMs: intervalSeconds * 1000,
        logger,
        sources: [
          new InboxSignalSource(new FileCandidateInbox(paths.inbox), logger),
          new AnomalySignalSource(new InboxAnomalyDetector(new FileCandidateInbox(paths.anomalies), logger), {
            logger,
          }),
        ],
      });

      if (options.once === true) {
        const report = await loop.tick();
        print(
          `tick ${report.tick}: ${report.candidates} candidate(s), ` +
            `${t.green(`${report.allowed} allowed`)}, ${t.amber(`${report.escalated} escalated`)}, ` +
            `${t.red(`${report.denied} denied`)}`,
        );
        return;
      }

      const controller = new AbortController();
      const stop = (): void => {
        logger.info({}, 'shutdown requested; finishing the current tick');
        controller.abort();
      };
      process.once('SIGINT', stop);
      process.once('SIGTERM', stop);

      print(t.blue(`◈ helmsman loop running every ${intervalSeconds}s `) + t.dim(`(home ${paths.home})`));
      await loop.run(controller.signal);
      await pipeline.drain();
      print(t.dim('loop stopped'));
    } catch (err: unknown) {
      fail('run', err);
    }
  });
