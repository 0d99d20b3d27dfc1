import {
  AUTO_UPDATE_LABEL,
  type PortMapping,
  type ResourceLimits,
  type VolumeMapping,
} from '../types.ts'
import { parseCpus, parseMemory } from './quantity.ts'
import { formatPortMapping, formatVolumeMapping, splitPortMapping, splitVolumeMapping } from './spec.ts'

/**
 * Conversions between plain values read from a compose file and the
 * structured fields of the spec model. Readers accept every spelling compose
 * allows; writers produce the one spelling this tool emits.
 */

export function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined
  }

  return Object.fromEntries(Object.entries(value))
}

/**
 * String form of a scalar value (`8080`, `true` and `"x"` all qualify)
 */
export function scalarString(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return undefined
}

/**
 * Names from a list (`[a, b]`) or the keys of a mapping (`{ a: {...} }`)
 */
export function readStringList(value: unknown): string[] | undefined {
  if (Array.isArray(value)) {
    return value.map(scalarString).filter((item): item is string => item !== undefined)
  }

  const record = asRecord(value)
  return record ? Object.keys(record) : undefined
}

/**
 * Key/value pairs from a `KEY=VALUE` list or a mapping
 *
 * List entries without `=` and mapping entries without a value read as an
 * empty string.
 */
export function readKeyValues(value: unknown): Record<string, string> | undefined {
  if (Array.isArray(value)) {
    const result: Record<string, string> = {}

    for (const entry of value.map(scalarString)) {
      if (entry === undefined) continue
      const separator = entry.indexOf('=')
      if (separator === -1) {
        result[entry] = ''
      } else {
        result[entry.slice(0, separator)] = entry.slice(separator + 1)
      }
    }

    return result
  }

  const record = asRecord(value)
  if (!record) {
    return undefined
  }

  return Object.fromEntries(Object.entries(record).map(([key, item]) => [key, scalarString(item) ?? '']))
}

/**
 * Write key/value pairs in the given style
 */
export function writeKeyValues(
  values: Record<string, string>,
  style: 'list' | 'map'
): string[] | Record<string, string> {
  if (style === 'map') {
    return { ...values }
  }

  return Object.entries(values).map(([key, value]) => `${key}=${value}`)
}

/**
 * Port mappings in short (`8080:80`) or long (`{ target, published }`) syntax
 */
export function readPorts(value: unknown): PortMapping[] | undefined {
  if (!Array.isArray(value)) {
    return undefined
  }

  return value.flatMap((entry): PortMapping[] => {
    const short = scalarString(entry)
    if (short !== undefined) {
      return [splitPortMapping(short)]
    }

    const long = asRecord(entry)
    const target = scalarString(long?.target)
    if (!long || target === undefined) {
      return []
    }

    const port: PortMapping = { container: target }
    const published = scalarString(long.published)
    const hostIp = scalarString(long.host_ip)
    const protocol = long.protocol

    if (published !== undefined) port.host = hostIp ? `${hostIp}:${published}` : published
    if (protocol === 'tcp' || protocol === 'udp' || protocol === 'sctp') port.protocol = protocol

    return [port]
  })
}

/**
 * Volume mappings in short (`./data:/data:ro`) or long (`{ source, target }`) syntax
 */
export function readVolumes(value: unknown): VolumeMapping[] | undefined {
  if (!Array.isArray(value)) {
    return undefined
  }

  return value.flatMap((entry): VolumeMapping[] => {
    const short = scalarString(entry)
    if (short !== undefined) {
      return [splitVolumeMapping(short)]
    }

    const long = asRecord(entry)
    const target = scalarString(long?.target)
    if (!long || target === undefined) {
      return []
    }

    const volume: VolumeMapping = { target }
    const source = scalarString(long.source)

    if (source !== undefined) volume.source = source
    if (long.read_only === true) volume.mode = 'ro'

    return [volume]
  })
}

export function writePorts(ports: PortMapping[]): string[] {
  return ports.map(formatPortMapping)
}

export function writeVolumes(volumes: VolumeMapping[]): string[] {
  return volumes.map(formatVolumeMapping)
}

/**
 * Resource limits from a service's `deploy` section
 *
 * Values compose could not interpret as quantities are left out.
 */
export function readResources(deploy: unknown): ResourceLimits | undefined {
  const resources = asRecord(asRecord(deploy)?.resources)
  if (!resources) {
    return undefined
  }

  const limits = asRecord(resources.limits) ?? {}
  const reservations = asRecord(resources.reservations) ?? {}
  const result: ResourceLimits = {}

  const cpuLimit = parseCpus(limits.cpus)
  const memoryLimit = parseMemory(limits.memory)
  const cpuReservation = parseCpus(reservations.cpus)
  const memoryReservation = parseMemory(reservations.memory)

  if (cpuLimit !== null) result.cpuLimit = cpuLimit
  if (memoryLimit !== null) result.memoryLimit = memoryLimit
  if (cpuReservation !== null) result.cpuReservation = cpuReservation
  if (memoryReservation !== null) result.memoryReservation = memoryReservation

  return result
}

/**
 * Auto-update setting from a service's labels
 *
 * @returns true or false when the managed label is set, undefined otherwise
 */
export function readAutoUpdate(labels: unknown): boolean | undefined {
  const value = readKeyValues(labels)?.[AUTO_UPDATE_LABEL]

  if (value === 'true') return true
  if (value === 'false') return false
  return undefined
}
