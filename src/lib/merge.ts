import { isDeepStrictEqual } from 'util'
import { YAMLMap, isMap, isScalar } from 'yaml'
import {
  AUTO_UPDATE_LABEL,
  type ComposeDocument,
  type Field,
  type NetworkSpec,
  type ResourceLimits,
  type ServiceSpec,
} from '../types.ts'
import {
  ComposeParseError,
  createComposeTree,
  getRoot,
  markDirty,
  readComposeDocument,
  readNotes,
  type ComposeTree,
} from './document.ts'
import {
  asRecord,
  readAutoUpdate,
  readKeyValues,
  readPorts,
  readStringList,
  readVolumes,
  scalarString,
  writeKeyValues,
  writePorts,
  writeVolumes,
} from './fields.ts'
import { keyName, type OrderScope } from './ordering.ts'
import { formatCpus, formatMemory, parseCpus, parseMemory } from './quantity.ts'
import { ValidationError, validateComposeDocument } from './spec.ts'

export type ComposeSection = 'services' | 'networks'

export type MergeAction = 'added' | 'updated' | 'unchanged'

/**
 * What a merge did to one entry
 */
export interface MergeChange {
  section: ComposeSection
  name: string
  action: MergeAction
}

export interface MergeResult {
  tree: ComposeTree
  changes: MergeChange[]
}

/**
 * Pending write of a single key; a null value removes the key
 */
interface FieldUpdate {
  key: string
  value: unknown
  /** Whether the file already holds the requested value */
  same: boolean
}

type PlainBlock = Record<string, unknown>

function nonEmpty<T>(values: T[]): T[] | null {
  return values.length > 0 ? values : null
}

function nonEmptyRecord(values: Record<string, string>): Record<string, string> | null {
  return Object.keys(values).length > 0 ? values : null
}

/**
 * Build the update for one key
 *
 * @param existing - Current value, normalized the same way as `desired`
 * @param desired - Requested value in comparable form, defaults to `value`
 */
function update(
  current: PlainBlock,
  key: string,
  value: unknown,
  existing: unknown,
  desired: unknown = value
): FieldUpdate {
  const same = value === null ? !Object.hasOwn(current, key) : isDeepStrictEqual(existing, desired)
  return { key, value, same }
}

function scalarUpdate(current: PlainBlock, key: string, value: Field<string>): FieldUpdate[] {
  if (value === undefined) return []
  return [update(current, key, value, scalarString(current[key]))]
}

function listUpdate(current: PlainBlock, key: string, value: string[] | null, existing: string[] | undefined) {
  return [update(current, key, value === null ? null : nonEmpty(value), existing)]
}

function labelUpdates(service: ServiceSpec, current: PlainBlock): FieldUpdate[] {
  if (service.labels === undefined && service.autoUpdate === undefined) {
    return []
  }

  const existing = readKeyValues(current.labels)
  const labels = service.labels !== undefined ? { ...service.labels } : { ...existing }
  const autoUpdate = service.autoUpdate !== undefined ? service.autoUpdate : readAutoUpdate(current.labels)

  if (autoUpdate === true || autoUpdate === false) {
    labels[AUTO_UPDATE_LABEL] = String(autoUpdate)
  } else {
    delete labels[AUTO_UPDATE_LABEL]
  }

  const style = Array.isArray(current.labels) ? 'list' : 'map'
  const value = nonEmptyRecord(labels)

  return [update(current, 'labels', value && writeKeyValues(value, style), existing, value)]
}

function serviceUpdates(service: ServiceSpec, current: PlainBlock): FieldUpdate[] {
  const updates = [
    ...scalarUpdate(current, 'container_name', service.containerName),
    ...scalarUpdate(current, 'image', service.image),
    ...scalarUpdate(current, 'restart', service.restart),
  ]

  // Mapping forms are reconciled by name in applyNameMap
  if (service.networks !== undefined && !(service.networks?.length && asRecord(current.networks))) {
    updates.push(...listUpdate(current, 'networks', service.networks, readStringList(current.networks)))
  }

  if (service.ports !== undefined) {
    const existing = readPorts(current.ports)
    updates.push(
      ...listUpdate(current, 'ports', service.ports && writePorts(service.ports), existing && writePorts(existing))
    )
  }

  if (service.environment !== undefined) {
    const value = service.environment && nonEmptyRecord(service.environment)
    const style = Array.isArray(current.environment) ? 'list' : 'map'
    updates.push(
      update(current, 'environment', value && writeKeyValues(value, style), readKeyValues(current.environment), value)
    )
  }

  if (service.volumes !== undefined) {
    const existing = readVolumes(current.volumes)
    updates.push(
      ...listUpdate(
        current,
        'volumes',
        service.volumes && writeVolumes(service.volumes),
        existing && writeVolumes(existing)
      )
    )
  }

  if (service.dependsOn !== undefined && !(service.dependsOn?.length && asRecord(current.depends_on))) {
    updates.push(...listUpdate(current, 'depends_on', service.dependsOn, readStringList(current.depends_on)))
  }

  updates.push(...labelUpdates(service, current))

  return updates
}

/**
 * Boolean network flags are written as `true` and removed when false
 */
function flagUpdate(current: PlainBlock, key: string, value: Field<boolean>, forceOff: boolean): FieldUpdate[] {
  if (forceOff) return [update(current, key, null, undefined)]
  if (value === undefined) return []
  return [update(current, key, value ? true : null, current[key])]
}

function networkUpdates(network: NetworkSpec, current: PlainBlock, existed: boolean): FieldUpdate[] {
  const external = network.external === true
  // New blocks carry their name; existing ones keep whatever they were given
  const updates: FieldUpdate[] = existed ? [] : [update(current, 'name', network.name, undefined)]

  if (external) {
    updates.push(update(current, 'driver', null, undefined))
  } else {
    updates.push(...scalarUpdate(current, 'driver', network.driver))
  }

  updates.push(
    ...flagUpdate(current, 'internal', network.internal, external),
    ...flagUpdate(current, 'external', network.external, false),
    ...flagUpdate(current, 'enable_ipv6', network.enableIpv6, external)
  )

  return updates
}

/**
 * Write the updates that change something into a block
 *
 * @returns true if the block was modified
 */
function applyUpdates(tree: ComposeTree, block: YAMLMap, updates: FieldUpdate[]): boolean {
  let changed = false

  for (const { key, value, same } of updates) {
    if (same) continue

    if (value === null) {
      block.delete(key)
    } else if (typeof value === 'object') {
      block.set(key, tree.document.createNode(value))
    } else {
      // Scalars are assigned in place so their quoting and comments survive
      block.set(key, value)
    }
    changed = true
  }

  return changed
}

/** Model field behind each key this tool manages under `deploy.resources` */
const RESOURCE_FIELDS = [
  ['limits', 'cpus', 'cpuLimit'],
  ['limits', 'memory', 'memoryLimit'],
  ['reservations', 'cpus', 'cpuReservation'],
  ['reservations', 'memory', 'memoryReservation'],
] as const

function childMap(parent: YAMLMap | undefined, key: string): YAMLMap | undefined {
  const node = parent?.get(key, true)
  return isMap(node) ? node : undefined
}

function ensureChildMap(tree: ComposeTree, parent: YAMLMap, key: string, scope: OrderScope): YAMLMap {
  const existing = childMap(parent, key)
  if (existing) {
    return existing
  }

  const created = new YAMLMap()
  parent.set(key, created)
  markDirty(tree, parent, scope)
  return created
}

function deleteIfEmpty(parent: YAMLMap | undefined, key: string): void {
  if (parent && childMap(parent, key)?.items.length === 0) {
    parent.delete(key)
  }
}

/**
 * Set or remove the cpu and memory values under `deploy.resources`
 *
 * Only `cpus` and `memory` of `limits` and `reservations` are touched; other
 * keys such as `pids` or `devices` stay. A map is removed only when clearing
 * values left it empty.
 *
 * @returns true if the block was modified
 */
function applyResources(tree: ComposeTree, block: YAMLMap, resources: Field<ResourceLimits>): boolean {
  if (resources === undefined) {
    return false
  }

  const desired: ResourceLimits = resources ?? {}
  let changed = false
  let cleared = false

  for (const [group, key, field] of RESOURCE_FIELDS) {
    const value = desired[field]
    const spec = childMap(childMap(childMap(block, 'deploy'), 'resources'), group)

    if (value === undefined) {
      if (spec?.has(key)) {
        spec.delete(key)
        changed = true
        cleared = true
      }
      continue
    }

    const parse = key === 'cpus' ? parseCpus : parseMemory
    if (spec && parse(spec.get(key)) === value) {
      continue
    }

    const deploy = ensureChildMap(tree, block, 'deploy', 'service')
    const target = ensureChildMap(tree, ensureChildMap(tree, deploy, 'resources', 'deploy'), group, 'resources')
    // Scalars are assigned in place so their quoting survives
    target.set(key, key === 'cpus' ? formatCpus(value) : formatMemory(value))
    markDirty(tree, target, 'resourceSpec')
    changed = true
  }

  if (cleared) {
    const deploy = childMap(block, 'deploy')
    const resourcesMap = childMap(deploy, 'resources')
    deleteIfEmpty(resourcesMap, 'limits')
    deleteIfEmpty(resourcesMap, 'reservations')
    deleteIfEmpty(deploy, 'resources')
    deleteIfEmpty(block, 'deploy')
  }

  return changed
}

/**
 * Bring a mapping-form `networks` or `depends_on` in line with a list of names
 *
 * Entries of names that stay keep their settings, new names get `entry()`
 * and names no longer wanted are removed.
 *
 * @returns true if the block was modified
 */
function applyNameMap(block: YAMLMap, key: string, names: Field<string[]>, entry: () => YAMLMap): boolean {
  const map = block.get(key, true)
  if (!names?.length || !isMap(map)) {
    return false
  }

  let changed = false

  for (const pair of [...map.items]) {
    if (!names.includes(keyName(pair.key))) {
      map.delete(pair.key)
      changed = true
    }
  }

  for (const name of names) {
    if (!map.has(name)) {
      map.set(name, entry())
      changed = true
    }
  }

  return changed
}

/** Long-form `depends_on` entry for a service that only has to be started */
function dependsOnEntry(): YAMLMap {
  const entry = new YAMLMap()
  entry.set('condition', 'service_started')
  return entry
}

/**
 * Write the notes of a service as comment lines under its key
 *
 * @returns true if the block was modified
 */
function applyNotes(block: YAMLMap, notes: Field<string[]>): boolean {
  if (notes === undefined) {
    return false
  }

  const desired = notes ?? []
  if (isDeepStrictEqual(readNotes(block), desired)) {
    return false
  }

  block.commentBefore = desired.length > 0 ? desired.map(note => ` ${note}`).join('\n') : null
  const [first] = block.items
  if (first && isScalar(first.key)) {
    first.key.commentBefore = null
  }

  return true
}

/**
 * Get a top-level section, or undefined if it is missing or empty
 *
 * @throws ComposeParseError if the section is not a mapping
 */
function getSection(root: YAMLMap, section: ComposeSection): YAMLMap | undefined {
  const node = root.get(section, true)

  if (node === undefined || (isScalar(node) && node.value === null)) {
    return undefined
  }

  if (!isMap(node)) {
    throw new ComposeParseError(`"${section}" must be a mapping`)
  }

  return node
}

function ensureSection(tree: ComposeTree, root: YAMLMap, section: ComposeSection): YAMLMap {
  const existing = getSection(root, section)
  if (existing) {
    return existing
  }

  const created = new YAMLMap()
  root.set(section, created)
  markDirty(tree, root, 'top')
  return created
}

/**
 * Make sure an entry targeted by a merge can be edited field by field
 *
 * @throws ComposeParseError if the entry or its deploy section has an unusable shape
 */
function checkEntry(section: YAMLMap | undefined, kind: string, name: string): void {
  const node = section?.get(name, true)

  if (node === undefined || (isScalar(node) && node.value === null)) {
    return
  }

  if (!isMap(node)) {
    throw new ComposeParseError(`${kind} "${name}" must be a mapping`)
  }

  const deploy = node.get('deploy', true)
  if (deploy !== undefined && !isMap(deploy) && !(isScalar(deploy) && deploy.value === null)) {
    throw new ComposeParseError(`${kind} "${name}": "deploy" must be a mapping`)
  }
}

function mergeEntry(
  tree: ComposeTree,
  root: YAMLMap,
  section: ComposeSection,
  name: string,
  edit: (block: YAMLMap) => boolean
): MergeChange {
  const target = ensureSection(tree, root, section)
  const node: unknown = target.get(name, true)
  const existed = target.has(name)
  const block = isMap(node) ? node : new YAMLMap()
  const changed = edit(block)
  const scope = section === 'services' ? 'service' : 'network'

  if (existed && !changed) {
    return { section, name, action: 'unchanged' }
  }

  if (block !== node) {
    target.flow = false
    target.set(name, block)
  }
  markDirty(tree, block, scope)

  return { section, name, action: existed ? 'updated' : 'added' }
}

/**
 * Reconcile the services and networks of a document with a compose tree
 *
 * New entries are appended; existing entries are updated field by field and
 * only rewritten when a value actually changes. Entries the document does not
 * mention are never touched. Everything is validated before the first edit,
 * so a rejected merge leaves the tree as it was.
 *
 * @param tree - Current file content, or null when the file does not exist
 * @throws ValidationError if the document is invalid or references unknown names
 * @throws ComposeParseError if an existing section has an unusable shape
 */
export function mergeCompose(tree: ComposeTree | null, document: ComposeDocument): MergeResult {
  const target = tree ?? createComposeTree()
  const root = getRoot(target)
  const plain = asRecord(target.document.toJS()) ?? {}
  const currentServices = asRecord(plain.services) ?? {}
  const currentNetworks = asRecord(plain.networks) ?? {}
  const services = getSection(root, 'services')
  const networks = getSection(root, 'networks')

  validateComposeDocument(document, {
    services: Object.keys(currentServices),
    networks: Object.keys(currentNetworks),
  })

  for (const service of document.services) checkEntry(services, 'service', service.name)
  for (const network of document.networks) checkEntry(networks, 'network', network.name)

  const changes = [
    ...document.services.map(service => {
      const current = asRecord(currentServices[service.name]) ?? {}

      return mergeEntry(target, root, 'services', service.name, block => {
        const edits = [
          applyUpdates(target, block, serviceUpdates(service, current)),
          applyNameMap(block, 'networks', service.networks, () => new YAMLMap()),
          applyNameMap(block, 'depends_on', service.dependsOn, dependsOnEntry),
          applyResources(target, block, service.resources),
          applyNotes(block, service.notes),
        ]
        return edits.includes(true)
      })
    }),
    ...document.networks.map(network => {
      const current = asRecord(currentNetworks[network.name]) ?? {}
      const existed = Object.hasOwn(currentNetworks, network.name)

      return mergeEntry(target, root, 'networks', network.name, block =>
        applyUpdates(target, block, networkUpdates(network, current, existed))
      )
    }),
  ]

  return { tree: target, changes }
}

/**
 * Remove a service or network from a compose tree
 *
 * Removal only ever happens through this function; merging a document that
 * omits an entry leaves it in place.
 *
 * @returns false if there was no such entry
 * @throws ValidationError if another service still references the entry
 */
export function removeComposeEntry(tree: ComposeTree, section: ComposeSection, name: string): boolean {
  const map = getSection(getRoot(tree), section)

  if (!map?.has(name)) {
    return false
  }

  const kind = section === 'services' ? 'service' : 'network'
  const dependents = readComposeDocument(tree).services.filter(service => {
    const references = section === 'services' ? service.dependsOn : service.networks
    return service.name !== name && references?.includes(name)
  })

  if (dependents.length > 0) {
    throw new ValidationError(
      dependents.map(service => `service "${service.name}" still references ${kind} "${name}"`)
    )
  }

  map.delete(name)
  return true
}
