import {
  AUTO_UPDATE_LABEL,
  NETWORK_DRIVERS,
  RESTART_POLICIES,
  type ComposeDocument,
  type NetworkDriver,
  type NetworkSpec,
  type PortMapping,
  type ResourceLimits,
  type RestartPolicy,
  type ServiceSpec,
  type VolumeMapping,
} from '../types.ts'
import { MIN_CPUS } from './quantity.ts'

/** Service and network keys accepted by compose */
const NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/
const PORT_PATTERN = /^\d+(?:-\d+)?$/
const HOST_PORT_PATTERN = /^(?:(?:\d{1,3}\.){3}\d{1,3}:)?\d*(?:-\d+)?$/
const PROTOCOL_PATTERN = /^(.*?)(?:\/(tcp|udp|sctp))?$/
const VOLUME_MODE_PATTERN = /^[a-zA-Z]+(?:,[a-zA-Z]+)*$/
const ENV_KEY_PATTERN = /^[^\s=]+$/

/**
 * Error thrown when a request is not a valid compose description
 *
 * Collects every problem found so the caller can report them together.
 */
export class ValidationError extends Error {
  readonly problems: string[]

  constructor(problems: string[]) {
    super(problems.join('; '))
    this.name = 'ValidationError'
    this.problems = problems
  }
}

/**
 * Names already present in the compose file a document is merged into
 */
export interface ExistingNames {
  services: string[]
  networks: string[]
}

/**
 * Split a port mapping into its parts without validating them
 *
 * Accepts anything compose files contain, including interpolated values
 * such as `${WEB_PORT}:80`.
 */
export function splitPortMapping(raw: string): PortMapping {
  const [, mapping = '', protocol] = raw.trim().match(PROTOCOL_PATTERN) ?? []
  const separator = mapping.lastIndexOf(':')
  const port: PortMapping = { container: mapping.slice(separator + 1) }

  if (separator > 0) port.host = mapping.slice(0, separator)
  if (protocol === 'tcp' || protocol === 'udp' || protocol === 'sctp') port.protocol = protocol

  return port
}

/**
 * Parse a port mapping such as `8080:80`, `127.0.0.1:53:53/udp` or `3000`
 *
 * @throws ValidationError if the mapping is malformed
 */
export function parsePortMapping(raw: string): PortMapping {
  const port = splitPortMapping(raw)

  if (!PORT_PATTERN.test(port.container) || (port.host !== undefined && !HOST_PORT_PATTERN.test(port.host))) {
    throw new ValidationError([`invalid port mapping "${raw}" (expected host:container[/proto])`])
  }

  return port
}

export function formatPortMapping(port: PortMapping): string {
  const host = port.host ? `${port.host}:` : ''
  const protocol = port.protocol ? `/${port.protocol}` : ''
  return `${host}${port.container}${protocol}`
}

/**
 * Split a volume mapping into its parts without validating them
 */
export function splitVolumeMapping(raw: string): VolumeMapping {
  const parts = raw.trim().split(':')
  const last = parts[parts.length - 1] ?? ''

  if (parts.length === 1) {
    return { target: last }
  }

  if (parts.length >= 3 && VOLUME_MODE_PATTERN.test(last)) {
    return {
      source: parts.slice(0, -2).join(':'),
      target: parts[parts.length - 2] ?? '',
      mode: last,
    }
  }

  return { source: parts.slice(0, -1).join(':'), target: last }
}

/**
 * Parse a volume mapping such as `./data:/config` or `/var/run/docker.sock:/var/run/docker.sock:ro`
 *
 * @throws ValidationError if the mapping is malformed
 */
export function parseVolumeMapping(raw: string): VolumeMapping {
  const parts = raw.trim().split(':')

  if (parts.length > 3 || parts.some(part => part === '')) {
    throw new ValidationError([`invalid volume mapping "${raw}" (expected host:container[:mode])`])
  }

  const volume = splitVolumeMapping(raw)
  if (!volume.target.startsWith('/') || (parts.length === 3 && volume.mode === undefined)) {
    throw new ValidationError([`invalid volume mapping "${raw}" (expected host:container[:mode])`])
  }

  return volume
}

export function formatVolumeMapping(volume: VolumeMapping): string {
  return [volume.source, volume.target, volume.mode].filter(part => part !== undefined).join(':')
}

/**
 * Parse `KEY=VALUE` entries into a mapping, rejecting duplicate keys
 *
 * @param entries - Raw entries, e.g. from repeated command line flags
 * @param kind - What the entries describe, used in error messages
 */
export function parseKeyValueList(entries: string[], kind: string): Record<string, string> {
  const result: Record<string, string> = {}
  const problems: string[] = []

  for (const entry of entries) {
    const separator = entry.indexOf('=')
    const key = separator === -1 ? '' : entry.slice(0, separator).trim()

    if (!key) {
      problems.push(`invalid ${kind} "${entry}" (expected KEY=VALUE)`)
      continue
    }

    if (Object.hasOwn(result, key)) {
      problems.push(`duplicate ${kind} key "${key}"`)
      continue
    }

    result[key] = entry.slice(separator + 1)
  }

  if (problems.length > 0) {
    throw new ValidationError(problems)
  }

  return result
}

function findDuplicates(values: string[]): string[] {
  const seen = new Set<string>()
  const duplicates = new Set<string>()

  for (const value of values) {
    if (seen.has(value)) duplicates.add(value)
    seen.add(value)
  }

  return [...duplicates]
}

function validateResources(owner: string, resources: ResourceLimits): string[] {
  const problems: string[] = []
  const cpus = [resources.cpuLimit, resources.cpuReservation]
  const memory = [resources.memoryLimit, resources.memoryReservation]

  if (cpus.some(value => value !== undefined && !(Number.isFinite(value) && value >= 0))) {
    problems.push(`${owner}: cpu values must be non-negative numbers`)
  } else if (cpus.some(value => value !== undefined && value > 0 && value < MIN_CPUS)) {
    problems.push(`${owner}: cpu values below ${MIN_CPUS.toFixed(6)} are not supported`)
  }
  if (memory.some(value => value !== undefined && !(Number.isInteger(value) && value >= 0))) {
    problems.push(`${owner}: memory values must be whole byte counts`)
  }

  return problems
}

/**
 * Check the shape of a single service description
 *
 * @returns Problems found, empty if the service is valid
 */
export function validateServiceSpec(service: ServiceSpec): string[] {
  const owner = `service "${service.name}"`
  const problems: string[] = []

  if (!NAME_PATTERN.test(service.name)) {
    problems.push(`${owner}: invalid service name`)
  }

  if (typeof service.image === 'string' && (service.image === '' || /\s/.test(service.image))) {
    problems.push(`${owner}: invalid image "${service.image}"`)
  }

  if (typeof service.containerName === 'string' && !NAME_PATTERN.test(service.containerName)) {
    problems.push(`${owner}: invalid container name "${service.containerName}"`)
  }

  if (service.restart && !RESTART_POLICIES.includes(service.restart)) {
    problems.push(`${owner}: unknown restart policy "${service.restart}"`)
  }

  for (const network of findDuplicates(service.networks ?? [])) {
    problems.push(`${owner}: network "${network}" listed twice`)
  }

  for (const port of service.ports ?? []) {
    if (!PORT_PATTERN.test(port.container)) {
      problems.push(`${owner}: invalid container port "${port.container}"`)
    }
  }

  // A mapping without a protocol is tcp
  const normalizedPorts = (service.ports ?? []).map(port =>
    formatPortMapping({ ...port, protocol: port.protocol ?? 'tcp' })
  )
  for (const port of findDuplicates(normalizedPorts)) {
    problems.push(`${owner}: duplicate port mapping "${port}"`)
  }

  for (const key of Object.keys(service.environment ?? {})) {
    if (!ENV_KEY_PATTERN.test(key)) {
      problems.push(`${owner}: invalid environment variable name "${key}"`)
    }
  }

  for (const volume of service.volumes ?? []) {
    if (!volume.target) {
      problems.push(`${owner}: volume without a container path`)
    }
  }

  if (service.labels && Object.hasOwn(service.labels, AUTO_UPDATE_LABEL)) {
    problems.push(`${owner}: label "${AUTO_UPDATE_LABEL}" is managed by the auto-update setting`)
  }

  for (const dependency of findDuplicates(service.dependsOn ?? [])) {
    problems.push(`${owner}: dependency "${dependency}" listed twice`)
  }

  if (service.dependsOn?.includes(service.name)) {
    problems.push(`${owner}: cannot depend on itself`)
  }

  if (service.resources) {
    problems.push(...validateResources(owner, service.resources))
  }

  if (service.notes?.some(note => /[\r\n]/.test(note))) {
    problems.push(`${owner}: notes must be single lines`)
  }

  return problems
}

/**
 * Check the shape of a single network description
 *
 * @returns Problems found, empty if the network is valid
 */
export function validateNetworkSpec(network: NetworkSpec): string[] {
  const owner = `network "${network.name}"`
  const problems: string[] = []

  if (!NAME_PATTERN.test(network.name)) {
    problems.push(`${owner}: invalid network name`)
  }

  if (network.driver && !NETWORK_DRIVERS.includes(network.driver)) {
    problems.push(`${owner}: unknown driver "${network.driver}"`)
  }

  if (network.external && (network.driver || network.internal || network.enableIpv6)) {
    problems.push(`${owner}: external networks cannot set driver, internal or enable_ipv6`)
  }

  return problems
}

/**
 * Find entries whose names differ only in case from another entry
 */
function findCaseCollisions(names: string[], existing: string[], kind: string): string[] {
  const problems: string[] = []
  const known = new Map<string, string>()

  for (const name of existing) {
    known.set(name.toLowerCase(), name)
  }

  const requested = new Map<string, string>()
  for (const name of names) {
    const folded = name.toLowerCase()
    const previous = requested.get(folded)

    if (previous === name) {
      problems.push(`${kind} "${name}" is defined twice`)
    } else if (previous !== undefined) {
      problems.push(`${kind} "${name}" collides with "${previous}"`)
    } else {
      const current = known.get(folded)
      if (current !== undefined && current !== name) {
        problems.push(`${kind} "${name}" collides with existing ${kind} "${current}"`)
      }
    }

    requested.set(folded, previous ?? name)
  }

  return problems
}

/**
 * Validate a document against itself and the entries already on disk
 *
 * Checks every service and network, name collisions, and that every network
 * and dependency a service references is defined either in the document or
 * in the existing file.
 *
 * @throws ValidationError listing every problem found
 */
export function validateComposeDocument(
  document: ComposeDocument,
  existing: ExistingNames = { services: [], networks: [] }
): void {
  const serviceNames = document.services.map(service => service.name)
  const networkNames = document.networks.map(network => network.name)
  const problems = [
    ...document.services.flatMap(validateServiceSpec),
    ...document.networks.flatMap(validateNetworkSpec),
    ...findCaseCollisions(serviceNames, existing.services, 'service'),
    ...findCaseCollisions(networkNames, existing.networks, 'network'),
  ]

  const knownNetworks = new Set([...existing.networks, ...networkNames])
  const knownServices = new Set([...existing.services, ...serviceNames])

  for (const service of document.services) {
    for (const network of service.networks ?? []) {
      if (!knownNetworks.has(network)) {
        problems.push(`service "${service.name}" references undefined network "${network}"`)
      }
    }

    for (const dependency of service.dependsOn ?? []) {
      if (!knownServices.has(dependency)) {
        problems.push(`service "${service.name}" depends on undefined service "${dependency}"`)
      }
    }
  }

  if (problems.length > 0) {
    throw new ValidationError(problems)
  }
}

export function isRestartPolicy(value: string): value is RestartPolicy {
  return RESTART_POLICIES.some(policy => policy === value)
}

export function isNetworkDriver(value: string): value is NetworkDriver {
  return NETWORK_DRIVERS.some(driver => driver === value)
}
