import type {
  DeviceMapping,
  PortBinding,
  RestartPolicy,
  RestartPolicyName,
  TmpfsMount,
  VolumeMount,
} from '../types'

/**
 * Parse a bind mount string (e.g., "/srv/media:/downloads", "/etc/app:/config:ro")
 */
export function parseMount(value: string): VolumeMount {
  const parts = value.split(':')
  if (parts.length < 2 || parts.length > 3 || parts.some((p) => p === '')) {
    throw new Error(`Malformed mount '${value}': expected host:container[:ro|rw]`)
  }
  const [source, target, mode = 'rw'] = parts
  if (mode !== 'ro' && mode !== 'rw') {
    throw new Error(`Malformed mount '${value}': mode must be ro or rw`)
  }
  return { source, target, readOnly: mode === 'ro' }
}

/**
 * Format a bind mount back to its string form
 */
export function formatMount(mount: VolumeMount): string {
  return `${mount.source}:${mount.target}:${mount.readOnly ? 'ro' : 'rw'}`
}

const portPattern = /^(?:(\d{1,3}(?:\.\d{1,3}){3}):)?(\d+):(\d+)(?:\/(tcp|udp|sctp))?$/

function toPort(raw: string, value: string): number {
  const port = Number.parseInt(raw, 10)
  if (port < 1 || port > 65535) {
    throw new Error(`Malformed port '${value}': ${raw} is out of range`)
  }
  return port
}

/**
 * Parse a published port string (e.g., "8181:8181", "8181:8181/udp", "127.0.0.1:80:8080")
 */
export function parsePort(value: string): PortBinding {
  const match = value.match(portPattern)
  if (!match) {
    throw new Error(`Malformed port '${value}': expected [ip:]host:container[/tcp|udp|sctp]`)
  }
  const [, hostIp, hostPort, containerPort, protocol] = match
  const binding: PortBinding = {
    hostPort: toPort(hostPort, value),
    containerPort: toPort(containerPort, value),
    protocol: protocol === 'udp' || protocol === 'sctp' ? protocol : 'tcp',
  }
  if (hostIp) binding.hostIp = hostIp
  return binding
}

/**
 * Format a published port back to its string form
 */
export function formatPort(port: PortBinding): string {
  const host = port.hostIp ? `${port.hostIp}:${port.hostPort}` : `${port.hostPort}`
  return `${host}:${port.containerPort}/${port.protocol}`
}

/**
 * Parse a device string (e.g., "/dev/net/tun", "/dev/sda:/dev/xvda:rw")
 */
export function parseDevice(value: string): DeviceMapping {
  const parts = value.split(':')
  if (parts.length > 3 || parts.some((p) => p === '')) {
    throw new Error(`Malformed device '${value}': expected host[:container[:permissions]]`)
  }
  const [pathOnHost, pathInContainer = pathOnHost, permissions = 'rwm'] = parts
  if (!/^[rwm]+$/.test(permissions)) {
    throw new Error(`Malformed device '${value}': permissions must combine r, w and m`)
  }
  return { pathOnHost, pathInContainer, permissions }
}

/**
 * Format a device mapping back to its string form
 */
export function formatDevice(device: DeviceMapping): string {
  return `${device.pathOnHost}:${device.pathInContainer}:${device.permissions}`
}

/**
 * Parse a tmpfs string (e.g., "/run", "/tmp:size=3G,uid=1000")
 */
export function parseTmpfs(value: string): TmpfsMount {
  const separator = value.indexOf(':')
  const target = separator === -1 ? value : value.slice(0, separator)
  const options = separator === -1 ? undefined : value.slice(separator + 1)
  if (!target.startsWith('/')) {
    throw new Error(`Malformed tmpfs '${value}': target must be an absolute path`)
  }
  if (options === '') {
    throw new Error(`Malformed tmpfs '${value}': empty options after ':'`)
  }
  return options === undefined ? { target } : { target, options }
}

/**
 * Format a tmpfs mount back to its string form
 */
export function formatTmpfs(mount: TmpfsMount): string {
  return mount.options ? `${mount.target}:${mount.options}` : mount.target
}

const restartNames: RestartPolicyName[] = ['no', 'always', 'unless-stopped', 'on-failure']

function isRestartPolicyName(value: string): value is RestartPolicyName {
  return restartNames.some((name) => name === value)
}

/**
 * Parse a restart policy string (e.g., "always", "on-failure:5")
 */
export function parseRestart(value: string): RestartPolicy {
  const [name, count] = value.split(':')
  if (!isRestartPolicyName(name)) {
    throw new Error(`Unknown restart policy '${value}': expected one of ${restartNames.join(', ')}`)
  }
  if (count === undefined) {
    return { name }
  }
  if (name !== 'on-failure' || !/^\d+$/.test(count)) {
    throw new Error(`Malformed restart policy '${value}': only on-failure takes a retry count`)
  }
  return { name, maximumRetryCount: Number.parseInt(count, 10) }
}

/**
 * Format a restart policy back to its string form
 */
export function formatRestart(policy: RestartPolicy): string {
  return policy.maximumRetryCount === undefined
    ? policy.name
    : `${policy.name}:${policy.maximumRetryCount}`
}

/**
 * Parse a KEY=value environment list into a map
 */
export function parseEnvironmentList(values: string[]): Record<string, string> {
  const env: Record<string, string> = {}
  for (const entry of values) {
    const separator = entry.indexOf('=')
    if (separator <= 0) {
      throw new Error(`Malformed environment entry '${entry}': expected KEY=value`)
    }
    env[entry.slice(0, separator)] = entry.slice(separator + 1)
  }
  return env
}

const imageTagPattern = /^[\w][\w.-]{0,127}$/

/**
 * Replace the tag (or digest) of an image reference, e.g.
 * "registry:5000/app:1.0" with "2.0" gives "registry:5000/app:2.0"
 */
export function withImageTag(reference: string, tag: string): string {
  if (!imageTagPattern.test(tag)) {
    throw new Error(`Malformed image tag '${tag}'`)
  }
  const repository = reference.split('@')[0] ?? reference
  const lastSlash = repository.lastIndexOf('/')
  const colon = repository.indexOf(':', lastSlash + 1)
  return `${colon === -1 ? repository : repository.slice(0, colon)}:${tag}`
}

export function isImageTag(value: string): boolean {
  return imageTagPattern.test(value)
}
