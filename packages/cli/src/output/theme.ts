import chalk, { type ChalkInstance } from 'chalk'
import type { SummaryKey } from '@kiln/kernel'

export const t = {
  blue:    chalk.hex('#4FC3F7'),
  blueDim: chalk.hex('#0277BD'),
  text:    chalk.hex('#C8C8C0'),
  white:   chalk.hex('#F2F2EC'),
  dim:     chalk.hex('#444444'),
  muted:   chalk.hex('#666666'),
  amber:   chalk.hex('#D4880A'),
  green:   chalk.hex('#81C784'),
  red:     chalk.hex('#CF6679'),
} as const

const _outcomeColors: Record<SummaryKey, ChalkInstance> = {
  update:  t.green,
  skip:    t.muted,
  fail:    t.red,
  discard: t.amber,
}

export const outcomeColor = (outcome: SummaryKey): ChalkInstance => _outcomeColors[outcome]
