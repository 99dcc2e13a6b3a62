import type { LearnedConfig } from '../../core/types.js'

/**
 * Ordering of learned configurations, best first: more passed stages,
 * then shorter duration, then id for a stable tie-break.
 * Negative when `a` ranks ahead of `b`.
 */
export function compareLearnedConfigs(a: LearnedConfig, b: LearnedConfig): number {
  if (a.stagesPassedCount !== b.stagesPassedCount) {
    return b.stagesPassedCount - a.stagesPassedCount
  }
  if (a.durationSeconds !== b.durationSeconds) {
    return a.durationSeconds - b.durationSeconds
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

/** Best learned configuration, or undefined for an empty list */
export function pickBestLearnedConfig(configs: readonly LearnedConfig[]): LearnedConfig | undefined {
  return [...configs].sort(compareLearnedConfigs)[0]
}
