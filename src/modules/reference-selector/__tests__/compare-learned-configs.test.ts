import { describe, it, expect } from 'vitest'
import { compareLearnedConfigs, pickBestLearnedConfig } from '../compare-learned-configs.js'
import type { LearnedConfig } from '../../../core/types.js'

function config(id: string, stagesPassedCount: number, durationSeconds: number): LearnedConfig {
  return {
    id,
    language: 'java',
    framework: 'spring',
    pipelineId: '100',
    durationSeconds,
    stagesPassedCount,
    timestamp: '2026-01-01T00:00:00.000Z',
    content: { pipelineDefinition: 'stages: [build]\n', imageBuildDefinition: 'FROM x\n' },
  }
}

describe('compareLearnedConfigs', () => {
  it('prefers more passed stages regardless of duration', () => {
    const five = config('a', 5, 60)
    const seven = config('b', 7, 900)
    expect(pickBestLearnedConfig([five, seven])?.id).toBe('b')
    expect(compareLearnedConfigs(seven, five)).toBeLessThan(0)
  })

  it('prefers the shorter duration when stages are equal', () => {
    const slow = config('a', 7, 300)
    const fast = config('b', 7, 120)
    expect(pickBestLearnedConfig([slow, fast])?.id).toBe('b')
  })

  it('breaks full ties by id', () => {
    expect(pickBestLearnedConfig([config('z', 3, 10), config('m', 3, 10)])?.id).toBe('m')
    expect(compareLearnedConfigs(config('x', 1, 1), config('x', 1, 1))).toBe(0)
  })

  it('returns undefined for no candidates', () => {
    expect(pickBestLearnedConfig([])).toBeUndefined()
  })

  it('does not reorder the input', () => {
    const input = [config('a', 1, 1), config('b', 9, 1)]
    pickBestLearnedConfig(input)
    expect(input.map((c) => c.id)).toEqual(['a', 'b'])
  })
})
