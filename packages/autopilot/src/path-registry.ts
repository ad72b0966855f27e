/**
 * Helmsman Autopilot — Path Registry
 *
 * The operator's execution path table. Persisted to `state/paths.json`,
 * validated by the kernel's path schema and pushed to the PathDispatcher on
 * every change. Dispatches already running keep the table they started with.
 *
 * A persisted table takes precedence over the `paths` in config.json.
 *
 * @see docs/governance.md §4.2 (path dispatcher)
 */

import { ConfigurationError, parsePathTable } from '@helmsman/kernel';
import type { OperationalLogger, PathConfig, PathDispatcher } from '@helmsman/kernel';
import { silentLogger } from '@helmsman/kernel';
import type { StateIO } from '@helmsman/runtime-host';

export const PATHS_FILE = 'paths.json';

export type PathUpdate = Partial<Omit<PathConfig, 'name'>>;

export class PathRegistry {
  constructor(
    private readonly stateIO: StateIO,
    private readonly dispatcher: PathDispatcher,
    private readonly logger: OperationalLogger = silentLogger,
  ) {}

  /**
   * Read the persisted table, or null when none has been saved.
   *
   * @throws ConfigurationError if the persisted table is invalid
   */
  static loadPersisted(stateIO: StateIO): ReadonlyArray<PathConfig> | null {
    const raw = stateIO.readJson<unknown>(PATHS_FILE, null);
    return raw === null ? null : parsePathTable(raw);
  }

  list(): ReadonlyArray<PathConfig> {
    return this.dispatcher.paths();
  }

  enable(name: string): ReadonlyArray<PathConfig> {
    return this.update(name, { enabled: true });
  }

  disable(name: string): ReadonlyArray<PathConfig> {
    return this.update(name, { enabled: false });
  }

  /** @throws ConfigurationError for an unknown path or an invalid result */
  update(name: string, patch: PathUpdate): ReadonlyArray<PathConfig> {
    const current = this.list();
    if (!current.some((p) => p.name === name)) {
      throw new ConfigurationError([`paths: unknown path '${name}'`]);
    }
    return this.replace(current.map((p) => (p.name === name ? { ...p, ...patch } : p)));
  }

  /** @throws ConfigurationError if the table is invalid or names a path with no executor */
  replace(paths: ReadonlyArray<PathConfig>): ReadonlyArray<PathConfig> {
    const table = parsePathTable(paths);
    this.dispatcher.replacePaths(table);
    this.stateIO.writeJson(PATHS_FILE, this.dispatcher.paths());
    this.logger.info({ paths: table.map((p) => p.name) }, 'path table saved');
    return this.dispatcher.paths();
  }
}
