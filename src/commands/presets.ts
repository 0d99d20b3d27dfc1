import { loadConfig } from '../lib/config.ts'
import { buildPresetTable, DEFAULT_PRESETS } from '../lib/presets.ts'
import * as output from '../lib/output.ts'
import { formatResources } from './list.ts'

/**
 * List the available resource presets
 */
export async function presets(): Promise<void> {
  const config = await loadConfig()
  const table = buildPresetTable(config.presets)

  output.header('Resource presets:')
  for (const [name, limits] of Object.entries(table)) {
    const origin = Object.hasOwn(config.presets, name)
      ? Object.hasOwn(DEFAULT_PRESETS, name)
        ? ' (overridden)'
        : ' (custom)'
      : ''
    console.log(`  ${name}${origin}  ${formatResources(limits)}`)
  }
}
