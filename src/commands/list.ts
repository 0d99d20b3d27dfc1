import type { NetworkSpec, ResourceLimits, ServiceSpec } from '../types.ts'
import { loadConfig, getComposeFile } from '../lib/config.ts'
import { loadComposeFile, readComposeDocument } from '../lib/document.ts'
import { formatCpus, formatMemory } from '../lib/quantity.ts'
import { formatPortMapping, formatVolumeMapping } from '../lib/spec.ts'
import * as output from '../lib/output.ts'

export interface ListOptions {
  file?: string
}

/**
 * Format resource limits as `cpus=0.5 memory=128M`
 */
export function formatResources(resources: ResourceLimits): string {
  const parts: string[] = []

  if (resources.cpuLimit !== undefined) parts.push(`cpus=${formatCpus(resources.cpuLimit)}`)
  if (resources.memoryLimit !== undefined) parts.push(`memory=${formatMemory(resources.memoryLimit)}`)
  if (resources.cpuReservation !== undefined) {
    parts.push(`reserved cpus=${formatCpus(resources.cpuReservation)}`)
  }
  if (resources.memoryReservation !== undefined) {
    parts.push(`reserved memory=${formatMemory(resources.memoryReservation)}`)
  }

  return parts.join(' ')
}

/**
 * Format a service's networks, marking external ones with `(E)`
 */
export function formatNetworks(service: ServiceSpec, networks: NetworkSpec[]): string | undefined {
  if (!service.networks || service.networks.length === 0) {
    return undefined
  }

  const external = new Set(networks.filter(network => network.external).map(network => network.name))
  return service.networks.map(name => (external.has(name) ? `${name} (E)` : name)).join(', ')
}

function joinList(values: string[] | null | undefined): string | undefined {
  return values && values.length > 0 ? values.join(', ') : undefined
}

/**
 * List the services and networks of the compose file
 */
export async function list(options: ListOptions = {}): Promise<void> {
  const config = await loadConfig()
  const composeFile = getComposeFile(config, options.file)
  const tree = await loadComposeFile(composeFile)

  if (!tree) {
    output.warn(`No compose file found at ${output.file(composeFile)}`)
    return
  }

  const { services, networks } = readComposeDocument(tree)

  if (services.length === 0 && networks.length === 0) {
    output.dim(`${composeFile} has no services or networks`)
    return
  }

  if (services.length > 0) {
    output.header('Services:')
    for (const service of services) {
      console.log(`  ${output.service(service.name)}`)
      output.details([
        ['image', service.image ?? undefined],
        ['restart', service.restart ?? undefined],
        ['networks', formatNetworks(service, networks)],
        ['ports', joinList(service.ports?.map(formatPortMapping))],
        ['volumes', joinList(service.volumes?.map(formatVolumeMapping))],
        ['depends on', joinList(service.dependsOn)],
        ['resources', service.resources ? formatResources(service.resources) : undefined],
        ['auto-update', typeof service.autoUpdate === 'boolean' ? String(service.autoUpdate) : undefined],
        ['notes', joinList(service.notes)],
      ])
    }
  }

  if (networks.length > 0) {
    if (services.length > 0) output.newline()
    output.header('Networks:')
    for (const network of networks) {
      const suffix = network.external ? ' (external)' : ''
      console.log(`  ${output.network(network.name)}${suffix}`)
      output.details([
        ['driver', network.driver ?? undefined],
        ['internal', network.internal ? 'yes' : undefined],
        ['ipv6', network.enableIpv6 ? 'yes' : undefined],
      ])
    }
  }
}
