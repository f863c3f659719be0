/**
 * Core types for the Berth container group orchestrator
 */

// =============================================================================
// Identifiers
// =============================================================================

/**
 * Unique name of a container. Names are global across all groups and double
 * as the runtime container name.
 * @example 'vpn'
 * @example 'torrent-client'
 */
export type ContainerName = string

/**
 * Unique name of a container group.
 * @example 'media'
 */
export type GroupName = string

/**
 * Opaque identifier of a live runtime object, returned by the gateway on create.
 * - Docker: container ID
 * @example 'f2b9c1d0a4e7'
 */
export type RuntimeHandle = string

/**
 * Opaque identifier of a local image, returned by the gateway after pull/build.
 * @example 'sha256:3f57d9401f8d42f986df300f0c69192fc41da28ccc8d797829467780db3dd741'
 */
export type ImageHandle = string

// =============================================================================
// Container status
// =============================================================================

/**
 * Lifecycle status of a container, owned by the lifecycle engine.
 * - `undefined`: Known to the registry, never created in the runtime
 * - `created`: Runtime object exists, not started
 * - `starting`: Start issued, waiting for readiness
 * - `running`: Running and ready
 * - `stopping`: Stop issued
 * - `stopped`: Runtime object exists, not running
 * - `failed`: Last transition failed; the cause is attached to the status entry
 * - `removed`: Runtime object removed
 */
export type ContainerStatus =
  | 'undefined'
  | 'created'
  | 'starting'
  | 'running'
  | 'stopping'
  | 'stopped'
  | 'failed'
  | 'removed'

// =============================================================================
// Image source
// =============================================================================

/**
 * Image pulled from a registry.
 */
export interface PulledImage {
  kind: 'pull'

  /**
   * Image reference, including tag or digest when wanted.
   * @example 'qmcgaw/gluetun:latest'
   */
  reference: string

  /**
   * The registry is served over plain HTTP.
   * @default false
   */
  insecure: boolean

  /** Registry username. Always set together with `password`. */
  username?: string

  /** Registry password. Always set together with `username`. */
  password?: string
}

/**
 * Image built locally from a directory containing a Dockerfile.
 */
export interface BuiltImage {
  kind: 'build'

  /**
   * Directory holding the Dockerfile (not the Dockerfile itself).
   * @example '/srv/build/proxy'
   */
  buildPath: string

  /**
   * Tag given to the built image; the container runs this tag.
   * @example 'local/proxy:latest'
   */
  tag: string

  /**
   * Squash the built layers into one.
   * @default false
   */
  squash: boolean
}

/**
 * Exactly one image source is active per container.
 */
export type ImageSource = PulledImage | BuiltImage

// =============================================================================
// Runtime options
// =============================================================================

/**
 * Bind mount from the host.
 */
export interface VolumeMount {
  /**
   * Path on the host.
   * @example '/srv/media'
   */
  source: string

  /**
   * Path inside the container.
   * @example '/downloads'
   */
  target: string

  /**
   * Mount as read-only.
   * @example false
   */
  readOnly: boolean
}

/**
 * Tmpfs mount.
 */
export interface TmpfsMount {
  /**
   * Path inside the container.
   * @example '/tmp'
   */
  target: string

  /**
   * Mount options, comma separated.
   * @example 'size=3G,uid=1000'
   */
  options?: string
}

/**
 * Published port.
 */
export interface PortBinding {
  /**
   * Host interface to bind; all interfaces when unset.
   * @example '127.0.0.1'
   */
  hostIp?: string

  /** @example 8181 */
  hostPort: number

  /** @example 8181 */
  containerPort: number

  protocol: 'tcp' | 'udp' | 'sctp'
}

/**
 * Host device exposed to the container.
 */
export interface DeviceMapping {
  /** @example '/dev/net/tun' */
  pathOnHost: string

  /** @example '/dev/net/tun' */
  pathInContainer: string

  /**
   * Cgroup permissions.
   * @example 'rwm'
   */
  permissions: string
}

export type RestartPolicyName = 'no' | 'always' | 'unless-stopped' | 'on-failure'

export interface RestartPolicy {
  name: RestartPolicyName

  /** Only meaningful for `on-failure`. */
  maximumRetryCount?: number
}

// =============================================================================
// Definitions
// =============================================================================

/**
 * Validated container definition. Immutable once admitted to the registry.
 */
export interface ContainerDefinition {
  /**
   * Unique container name.
   * @example 'vpn'
   */
  name: ContainerName

  /**
   * Owning group.
   * @example 'media'
   */
  group?: GroupName

  /** Where the image comes from. */
  image: ImageSource

  /**
   * Arguments passed after the image name.
   * @example ['--log-level', 'debug']
   */
  args: string[]

  /** @example ['NET_ADMIN'] */
  capAdd: string[]

  capDrop: string[]

  devices: DeviceMapping[]

  /** @example ['8.8.4.4'] */
  dns: string[]

  /** @example { TZ: 'UTC' } */
  environment: Record<string, string>

  mounts: VolumeMount[]

  tmpfs: TmpfsMount[]

  ports: PortBinding[]

  restart: RestartPolicy

  /**
   * Container whose network namespace this one joins. Creates a start-order
   * dependency on that container.
   * @example 'vpn'
   */
  net?: ContainerName

  /**
   * Named runtime network. Mutually exclusive with `net`.
   * @example 'bridge'
   */
  network?: string

  /**
   * Explicit start-order dependencies.
   * @example ['database']
   */
  dependsOn: ContainerName[]
}

/**
 * Defaults applied to every member of a group. Explicit container values win.
 */
export type ContainerDefaults = Partial<
  Pick<
    ContainerDefinition,
    | 'capAdd'
    | 'capDrop'
    | 'devices'
    | 'dns'
    | 'environment'
    | 'mounts'
    | 'tmpfs'
    | 'ports'
    | 'restart'
    | 'network'
  >
>

/**
 * Parsed but not yet finalized container definition: unset fields are still
 * distinguishable from empty ones, which is what default merging needs.
 */
export type ContainerDraft = Pick<ContainerDefinition, 'name' | 'image'> &
  Partial<Omit<ContainerDefinition, 'name' | 'image'>>

/**
 * Group of containers managed as a unit.
 */
export interface GroupDefinition {
  /**
   * Unique group name.
   * @example 'media'
   */
  name: GroupName

  /**
   * Member container names, in declaration order.
   */
  members: ContainerName[]

  /**
   * Member that every other member starts after.
   * @example 'vpn'
   */
  master?: ContainerName

  /**
   * Defaults applied to member definitions.
   */
  defaults?: ContainerDefaults
}
