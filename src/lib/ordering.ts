import { isScalar, type YAMLMap } from 'yaml'

/**
 * Canonical key order per kind of block
 *
 * Keys not listed here keep their relative order and follow the listed ones.
 */
export const KEY_ORDER = {
  top: ['version', 'name', 'services', 'networks', 'volumes', 'configs', 'secrets'],
  service: [
    'container_name',
    'image',
    'restart',
    'networks',
    'ports',
    'environment',
    'volumes',
    'depends_on',
    'labels',
    'deploy',
  ],
  network: ['name', 'driver', 'internal', 'external', 'enable_ipv6'],
  deploy: ['mode', 'replicas', 'resources', 'restart_policy', 'placement', 'update_config'],
  resources: ['limits', 'reservations'],
  resourceSpec: ['cpus', 'memory'],
} as const satisfies Record<string, readonly string[]>

export type OrderScope = keyof typeof KEY_ORDER

/**
 * Sort rank of a key within a block
 *
 * Unrecognized keys all share the last rank; sorting with a stable sort keeps
 * them in the order they were first encountered.
 */
export function rank(scope: OrderScope, key: string): number {
  const order: readonly string[] = KEY_ORDER[scope]
  const index = order.indexOf(key)
  return index === -1 ? order.length : index
}

/**
 * Plain string form of a mapping key
 */
export function keyName(key: unknown): string {
  return String(isScalar(key) ? key.value : key)
}

/**
 * Sort the entries of a mapping into canonical order in place
 */
export function sortMap(map: YAMLMap, scope: OrderScope): void {
  const ranked = map.items.map((pair, index) => ({ pair, index, rank: rank(scope, keyName(pair.key)) }))

  ranked.sort((a, b) => a.rank - b.rank || a.index - b.index)
  map.items = ranked.map(({ pair }) => pair)
}
