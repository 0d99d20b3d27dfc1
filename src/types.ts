/**
 * Restart policies accepted by docker compose
 */
export const RESTART_POLICIES = ['always', 'unless-stopped', 'on-failure', 'no'] as const

export type RestartPolicy = (typeof RESTART_POLICIES)[number]

/**
 * Network drivers the tool knows how to write
 */
export const NETWORK_DRIVERS = ['bridge', 'overlay', 'host', 'none', 'macvlan'] as const

export type NetworkDriver = (typeof NETWORK_DRIVERS)[number]

/** Label that gates Watchtower auto-updates for a container */
export const AUTO_UPDATE_LABEL = 'com.centurylinklabs.watchtower.enable'

/**
 * A field that may be left out of a request (`undefined`) or explicitly
 * cleared (`null`)
 */
export type Field<T> = T | null | undefined

/**
 * A published port, written as `host:container[/protocol]`
 */
export interface PortMapping {
  /** Host side, optionally prefixed with an IP (`127.0.0.1:8080`) */
  host?: string
  /** Container port or range */
  container: string
  protocol?: 'tcp' | 'udp' | 'sctp'
}

/**
 * A volume or bind mount, written as `source:target[:mode]`
 */
export interface VolumeMapping {
  /** Host path or named volume; absent for anonymous volumes */
  source?: string
  target: string
  /** Access mode such as `ro` or `rw` */
  mode?: string
}

/**
 * CPU and memory constraints for `deploy.resources`
 *
 * CPU values are core counts; memory values are byte counts.
 */
export interface ResourceLimits {
  cpuLimit?: number
  memoryLimit?: number
  cpuReservation?: number
  memoryReservation?: number
}

/**
 * Desired state of a single compose service
 *
 * Every field except `name` follows {@link Field} semantics: absent fields
 * leave the existing key alone, `null` removes it.
 */
export interface ServiceSpec {
  /** Service key in the `services` section */
  name: string
  containerName?: Field<string>
  /** Image reference, `repository[:tag]` */
  image?: Field<string>
  restart?: Field<RestartPolicy>
  networks?: Field<string[]>
  ports?: Field<PortMapping[]>
  environment?: Field<Record<string, string>>
  volumes?: Field<VolumeMapping[]>
  /** Free-form labels; the auto-update label is controlled by `autoUpdate` */
  labels?: Field<Record<string, string>>
  dependsOn?: Field<string[]>
  resources?: Field<ResourceLimits>
  /** Writes the Watchtower enable label as `"true"` or `"false"` */
  autoUpdate?: Field<boolean>
  /** Comment lines written under the service key, one per entry */
  notes?: Field<string[]>
}

/**
 * Desired state of a single compose network
 */
export interface NetworkSpec {
  /** Network key in the `networks` section */
  name: string
  driver?: Field<NetworkDriver>
  internal?: Field<boolean>
  enableIpv6?: Field<boolean>
  /** External networks never carry driver, internal or IPv6 settings */
  external?: Field<boolean>
}

/**
 * Services and networks to reconcile against a compose file
 */
export interface ComposeDocument {
  services: ServiceSpec[]
  networks: NetworkSpec[]
}

/**
 * User configuration stored in ~/.compose-manager/config.jsonc
 */
export interface ManagerConfig {
  /** Compose file to operate on (default: "compose.yml") */
  composeFile: string
  /** Shared compose file whose networks are attached as external networks */
  infraFile?: string
  /** Extra or overriding resource presets */
  presets: Record<string, ResourceLimits>
}
