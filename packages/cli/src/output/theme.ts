import chalk, { type ChalkInstance } from 'chalk'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueDim:    chalk.hex('#0277BD'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

const _verdictColors: Record<string, ChalkInstance> = {
  ALLOW:    t.green,
  DENY:     t.red,
  ESCALATE: t.amber,
}

export const verdictColor = (verdict: string): ChalkInstance =>
  _verdictColors[verdict] ?? t.muted

const _stateColors: Record<string, ChalkInstance> = {
  PENDING:      t.amber,
  EXECUTING:    t.blue,
  SUCCEEDED:    t.green,
  FAILED:       t.red,
  ROLLING_BACK: t.amber,
  ROLLED_BACK:  t.muted,
  REJECTED:     t.muted,
}

export const stateColor = (state: string): ChalkInstance =>
  _stateColors[state] ?? t.muted

const _tierColors: Record<string, ChalkInstance> = {
  'read-only': t.muted,
  low:         t.text,
  medium:      t.amber,
  high:        t.red,
  critical:    t.red,
}

export const tierColor = (tier: string): ChalkInstance =>
  _tierColors[tier] ?? t.muted
