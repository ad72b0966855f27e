/**
 * Helmsman Runtime Host — Configuration Loader
 *
 * Reads `<home>/config.json` and validates it through the kernel's
 * GovernanceConfigSchema. The file is optional: absent means defaults.
 * Unparseable JSON and schema violations both surface as ConfigurationError
 * so the CLI reports every issue at once.
 *
 * @see docs/governance.md §8 (configuration)
 */

import { readFileSync } from 'node:fs';
import {
  ConfigurationError,
  defaultGovernanceConfig,
  parseGovernanceConfig,
} from '@helmsman/kernel';
import type { GovernanceConfig } from '@helmsman/kernel';
import { helmsmanPaths } from '../home.js';
import { isNodeError } from '../state/state-io.js';

export function loadGovernanceConfig(home: string): GovernanceConfig {
  const configPath = helmsmanPaths(home).config;
  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return defaultGovernanceConfig();
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError([`config.json: ${message}`]);
  }
  return parseGovernanceConfig(parsed);
}
