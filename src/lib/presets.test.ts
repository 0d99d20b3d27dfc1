import { describe, expect, test } from 'vitest'
import { DEFAULT_PRESETS, UnknownPresetError, buildPresetTable, resolvePreset } from './presets.ts'

const MiB = 1024 ** 2

describe('resolvePreset', () => {
  test('resolves the built-in presets', () => {
    expect(resolvePreset('Small')).toEqual({ cpuLimit: 0.2, memoryLimit: 64 * MiB })
    expect(resolvePreset('Medium')).toEqual({ cpuLimit: 0.5, memoryLimit: 128 * MiB })
    expect(resolvePreset('Large')).toEqual({ cpuLimit: 1, memoryLimit: 512 * MiB })
  })

  test('accepts Big as the older name of Large', () => {
    expect(resolvePreset('Big')).toEqual({ cpuLimit: 1, memoryLimit: 512 * MiB })
    expect(resolvePreset('Big', buildPresetTable({ Large: { cpuLimit: 2 } }))).toEqual({ cpuLimit: 2 })
    expect(resolvePreset('Big', buildPresetTable({ Big: { cpuLimit: 4 } }))).toEqual({ cpuLimit: 4 })
  })

  test('returns a copy', () => {
    const preset = resolvePreset('Small')
    preset.cpuLimit = 4

    expect(DEFAULT_PRESETS.Small?.cpuLimit).toBe(0.2)
  })

  test('names the available presets for unknown names', () => {
    expect(() => resolvePreset('Huge')).toThrow(UnknownPresetError)
    expect(() => resolvePreset('Huge')).toThrow(
      'Unknown resource preset "Huge". Available presets: Small, Medium, Large'
    )
    expect(() => resolvePreset('toString')).toThrow(UnknownPresetError)
  })
})

test('buildPresetTable lets user presets add to and override the built-in ones', () => {
  const table = buildPresetTable({ Large: { cpuLimit: 2 }, Tiny: { memoryLimit: 32 * MiB } })

  expect(Object.keys(table)).toEqual(['Small', 'Medium', 'Large', 'Tiny'])
  expect(resolvePreset('Large', table)).toEqual({ cpuLimit: 2 })
  expect(resolvePreset('Tiny', table)).toEqual({ memoryLimit: 32 * MiB })
})
