import type { ComposeDocument, ResourceLimits, RestartPolicy, ServiceSpec } from '../types.ts'
import { loadConfig, getComposeFile } from '../lib/config.ts'
import { loadComposeFile, readComposeDocument, writeComposeFile } from '../lib/document.ts'
import { attachInfraNetworks } from '../lib/infra.ts'
import { mergeCompose, type MergeChange } from '../lib/merge.ts'
import { buildPresetTable, resolvePreset, UnknownPresetError, type PresetTable } from '../lib/presets.ts'
import { parseCpus, parseMemory } from '../lib/quantity.ts'
import {
  isRestartPolicy,
  parseKeyValueList,
  parsePortMapping,
  parseVolumeMapping,
  ValidationError,
} from '../lib/spec.ts'
import * as output from '../lib/output.ts'

/** Restart policy given to services created without one */
export const DEFAULT_RESTART: RestartPolicy = 'unless-stopped'

export interface AddOptions {
  file?: string
  infra?: string
  containerName?: string
  image?: string
  restart?: string
  network?: string[]
  port?: string[]
  env?: string[]
  volume?: string[]
  label?: string[]
  dependsOn?: string[]
  preset?: string
  cpus?: string
  memory?: string
  cpuReservation?: string
  memoryReservation?: string
  autoUpdate?: boolean
  note?: string[]
}

/**
 * Explicit resource flags, parsed into limits
 */
function explicitResources(options: AddOptions): ResourceLimits {
  const problems: string[] = []
  const resources: ResourceLimits = {}
  const flags = [
    ['--cpus', options.cpus, parseCpus, 'cpuLimit'],
    ['--memory', options.memory, parseMemory, 'memoryLimit'],
    ['--cpu-reservation', options.cpuReservation, parseCpus, 'cpuReservation'],
    ['--memory-reservation', options.memoryReservation, parseMemory, 'memoryReservation'],
  ] as const

  for (const [flag, raw, parse, key] of flags) {
    if (raw === undefined) continue

    const parsed = parse(raw)
    if (parsed === null) {
      problems.push(`${flag}: invalid quantity "${raw}"`)
    } else {
      resources[key] = parsed
    }
  }

  if (problems.length > 0) {
    throw new ValidationError(problems)
  }

  return resources
}

/**
 * Resolve the preset and explicit resource flags into limits
 *
 * Explicit flags override the preset. An unknown preset is only fatal when
 * no explicit values were given.
 */
function resolveResources(options: AddOptions, presets: PresetTable): ResourceLimits | undefined {
  const explicit = explicitResources(options)
  const hasExplicit = Object.keys(explicit).length > 0
  let preset: ResourceLimits = {}

  if (options.preset !== undefined) {
    try {
      preset = resolvePreset(options.preset, presets)
    } catch (error) {
      if (!(error instanceof UnknownPresetError) || !hasExplicit) {
        throw error
      }
      output.warn(`${error.message}; using the explicit values only`)
    }
  }

  const resources = { ...preset, ...explicit }
  return Object.keys(resources).length > 0 ? resources : undefined
}

function nonEmpty(values: string[] | undefined): string[] | undefined {
  return values && values.length > 0 ? values : undefined
}

/**
 * Build a service description from command line options
 *
 * Options that were not given stay undefined so the merge leaves the
 * corresponding keys of an existing service alone.
 *
 * @throws ValidationError if an option value is malformed
 */
export function buildServiceSpec(name: string, options: AddOptions, presets: PresetTable): ServiceSpec {
  const service: ServiceSpec = { name }

  if (options.restart !== undefined) {
    if (!isRestartPolicy(options.restart)) {
      throw new ValidationError([`unknown restart policy "${options.restart}"`])
    }
    service.restart = options.restart
  }

  const ports = nonEmpty(options.port)
  const env = nonEmpty(options.env)
  const volumes = nonEmpty(options.volume)
  const labels = nonEmpty(options.label)
  const resources = resolveResources(options, presets)

  if (options.containerName !== undefined) service.containerName = options.containerName
  if (options.image !== undefined) service.image = options.image
  if (nonEmpty(options.network)) service.networks = options.network
  if (ports) service.ports = ports.map(parsePortMapping)
  if (env) service.environment = parseKeyValueList(env, 'environment variable')
  if (volumes) service.volumes = volumes.map(parseVolumeMapping)
  if (labels) service.labels = parseKeyValueList(labels, 'label')
  if (nonEmpty(options.dependsOn)) service.dependsOn = options.dependsOn
  if (resources) service.resources = resources
  if (options.autoUpdate !== undefined) service.autoUpdate = options.autoUpdate
  if (nonEmpty(options.note)) service.notes = options.note

  return service
}

/**
 * Print what a merge did
 */
export function reportChanges(changes: MergeChange[], composeFile: string): void {
  for (const change of changes) {
    const kind = change.section === 'services' ? 'service' : 'network'
    const name = change.section === 'services' ? output.service(change.name) : output.network(change.name)

    if (change.action === 'unchanged') {
      output.dim(`${kind} ${change.name} is already up to date`)
    } else {
      output.success(`${change.action === 'added' ? 'Added' : 'Updated'} ${kind} ${name} in ${output.file(composeFile)}`)
    }
  }
}

/**
 * Add a service to the compose file, or update the given fields of an existing one
 *
 * @param name - The service name
 */
export async function add(name: string, options: AddOptions = {}): Promise<void> {
  const config = await loadConfig()
  const composeFile = getComposeFile(config, options.file)
  const service = buildServiceSpec(name, options, buildPresetTable(config.presets))
  const tree = await loadComposeFile(composeFile)

  const exists = tree ? readComposeDocument(tree).services.some(existing => existing.name === name) : false
  if (!exists) {
    service.containerName ??= name
    service.restart ??= DEFAULT_RESTART
  }

  let document: ComposeDocument = { services: [service], networks: [] }
  const infraFile = options.infra ?? config.infraFile

  if (infraFile) {
    const infra = await loadComposeFile(infraFile)
    if (!infra) {
      output.warn(`Infra file ${output.file(infraFile)} not found; its networks are not available`)
    }

    document = attachInfraNetworks(document, tree, infra)
    for (const network of document.networks) {
      output.info(`Using ${output.network(network.name)} from ${output.file(infraFile)} as an external network`)
    }
  }

  const result = mergeCompose(tree, document)

  if (result.changes.some(change => change.action !== 'unchanged')) {
    await writeComposeFile(result.tree, composeFile)
  }

  reportChanges(result.changes, composeFile)
}
