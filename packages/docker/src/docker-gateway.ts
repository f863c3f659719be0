/**
 * Docker Runtime Gateway
 *
 * Implements RuntimeGateway using dockerode. Docker API failures are mapped
 * onto the gateway error classes, flagged transient or permanent.
 */

import { readdir } from 'node:fs/promises'
import {
  CreateError,
  type ContainerDefinition,
  type GatewayErrorOptions,
  ImageError,
  type ImageHandle,
  type ImageSource,
  InspectError,
  type InspectResult,
  type PulledImage,
  type BuiltImage,
  type PullOrBuildOptions,
  RemoveError,
  type RemoveOptions,
  type RuntimeGateway,
  RuntimeGatewayError,
  type RuntimeHandle,
  StartError,
  StopError,
} from '@berth/core'
import Docker from 'dockerode'
import pino, { type Logger } from 'pino'

export interface DockerGatewayConfig {
  /**
   * Path to the Docker socket for local connections.
   * @example '/var/run/docker.sock'
   */
  socketPath?: string

  /**
   * Docker host for remote connections. When set, uses TCP instead of socket.
   * @example '192.168.1.100'
   */
  host?: string

  /**
   * Docker port for remote connections. Only used when `host` is set.
   * @default 2375
   */
  port?: number

  /**
   * Prefix of the labels put on created containers.
   * @default 'berth'
   */
  labelPrefix?: string

  logger?: Logger
}

type GatewayErrorClass = new (
  target: string,
  message: string,
  options: GatewayErrorOptions,
) => RuntimeGatewayError

interface ProgressEvent {
  status?: string
  id?: string
  progress?: string
  error?: string
}

const DOCKER_HUB = 'https://index.docker.io/v1/'

// Network-level failures worth another attempt
const transientErrorCodes = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'EAI_AGAIN'])

function statusCodeOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'statusCode' in err) {
    return typeof err.statusCode === 'number' ? err.statusCode : undefined
  }
  return undefined
}

/**
 * Transient: daemon-side 5xx, request timeout, rate limiting and dropped
 * connections. Everything else (400 bad option, 404 missing image, 409 name
 * conflict) is permanent.
 */
export function isTransientDockerError(err: unknown): boolean {
  const status = statusCodeOf(err)
  if (status !== undefined) {
    return status >= 500 || status === 408 || status === 429
  }
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    if (transientErrorCodes.has(err.code)) return true
  }
  return err instanceof Error && /socket hang up/i.test(err.message)
}

function messageOf(err: unknown): string {
  if (!(err instanceof Error)) return String(err)
  // dockerode puts the daemon's reply in `json.message`
  if ('json' in err && typeof err.json === 'object' && err.json !== null && 'message' in err.json) {
    const detail = err.json.message
    if (typeof detail === 'string') return detail
  }
  return err.message
}

function toGatewayError(ErrorClass: GatewayErrorClass, target: string, err: unknown) {
  if (err instanceof RuntimeGatewayError) return err
  return new ErrorClass(target, messageOf(err), {
    transient: isTransientDockerError(err),
    cause: err,
  })
}

/**
 * Registry host of an image reference; Docker Hub when the first path
 * segment is not a host name.
 */
export function registryOf(reference: string): string {
  const slash = reference.indexOf('/')
  if (slash === -1) return DOCKER_HUB
  const first = reference.slice(0, slash)
  if (first.includes('.') || first.includes(':') || first === 'localhost') return first
  return DOCKER_HUB
}

/**
 * Registries the daemon treats as insecure, read from `docker info`.
 */
export function insecureRegistries(info: unknown): string[] {
  if (typeof info !== 'object' || info === null || !('RegistryConfig' in info)) return []
  const config = info.RegistryConfig
  if (typeof config !== 'object' || config === null || !('IndexConfigs' in config)) return []
  const indexes = config.IndexConfigs
  if (typeof indexes !== 'object' || indexes === null) return []
  return Object.entries(indexes)
    .filter(
      ([, index]) =>
        typeof index === 'object' && index !== null && 'Secure' in index && index.Secure === false,
    )
    .map(([name]) => name)
}

export class DockerGateway implements RuntimeGateway {
  readonly name = 'docker'
  private docker: Docker
  private labelPrefix: string
  private log: Logger

  constructor(config?: DockerGatewayConfig) {
    if (config?.host) {
      this.docker = new Docker({ host: config.host, port: config.port ?? 2375 })
    } else {
      this.docker = new Docker({ socketPath: config?.socketPath ?? '/var/run/docker.sock' })
    }
    this.labelPrefix = config?.labelPrefix ?? 'berth'
    this.log = (config?.logger ?? pino({ level: 'silent' })).child({ component: 'DockerGateway' })
  }

  async pullOrBuild(source: ImageSource, options?: PullOrBuildOptions): Promise<ImageHandle> {
    const reference = source.kind === 'pull' ? source.reference : source.tag
    try {
      if (!options?.force) {
        const existing = await this.findImage(reference)
        if (existing) {
          this.log.debug({ image: reference }, 'Image present locally')
          return existing
        }
      }

      if (source.kind === 'pull') {
        await this.pull(source)
      } else {
        await this.build(source)
      }

      const image = await this.docker.getImage(reference).inspect()
      return image.Id
    } catch (err) {
      throw toGatewayError(ImageError, reference, err)
    }
  }

  async create(definition: ContainerDefinition, netTarget?: RuntimeHandle): Promise<RuntimeHandle> {
    try {
      const container = await this.docker.createContainer(
        this.toCreateOptions(definition, netTarget),
      )
      this.log.debug({ container: definition.name, id: container.id }, 'Container created')
      return container.id
    } catch (err) {
      throw toGatewayError(CreateError, definition.name, err)
    }
  }

  async start(handle: RuntimeHandle): Promise<void> {
    try {
      await this.docker.getContainer(handle).start()
    } catch (err) {
      // 304: already started
      if (statusCodeOf(err) === 304) return
      throw toGatewayError(StartError, handle, err)
    }
  }

  async stop(handle: RuntimeHandle, timeoutSeconds: number): Promise<void> {
    try {
      await this.docker.getContainer(handle).stop({ t: timeoutSeconds })
    } catch (err) {
      if (statusCodeOf(err) === 304 || this.isNotRunningError(err)) return
      throw toGatewayError(StopError, handle, err)
    }
  }

  async remove(handle: RuntimeHandle, options?: RemoveOptions): Promise<void> {
    try {
      await this.docker.getContainer(handle).remove({ force: options?.force ?? false })
    } catch (err) {
      if (statusCodeOf(err) === 404) return
      throw toGatewayError(RemoveError, handle, err)
    }
  }

  async inspect(handle: RuntimeHandle): Promise<InspectResult> {
    try {
      const info = await this.docker.getContainer(handle).inspect()
      if (info.State.Running) {
        return { running: true }
      }
      if (info.State.Status === 'exited' || info.State.Status === 'dead') {
        return { running: false, exitCode: info.State.ExitCode }
      }
      return { running: false }
    } catch (err) {
      throw toGatewayError(InspectError, handle, err)
    }
  }

  async lookup(name: string): Promise<RuntimeHandle | null> {
    try {
      const info = await this.docker.getContainer(name).inspect()
      return info.Id
    } catch (err) {
      if (statusCodeOf(err) === 404) return null
      throw toGatewayError(InspectError, name, err)
    }
  }

  private async findImage(reference: string): Promise<ImageHandle | null> {
    try {
      const image = await this.docker.getImage(reference).inspect()
      return image.Id
    } catch (err) {
      if (statusCodeOf(err) === 404) return null
      throw err
    }
  }

  private async pull(source: PulledImage): Promise<void> {
    const registry = registryOf(source.reference)
    if (source.insecure) {
      const insecure = insecureRegistries(await this.docker.info())
      if (!insecure.includes(registry)) {
        throw new ImageError(
          source.reference,
          `registry '${registry}' is not configured as insecure in the Docker daemon`,
          { transient: false },
        )
      }
    }

    const options =
      source.username !== undefined && source.password !== undefined
        ? {
            authconfig: {
              username: source.username,
              password: source.password,
              serveraddress: registry,
            },
          }
        : {}

    this.log.info({ image: source.reference }, 'Pulling image')
    const stream: NodeJS.ReadableStream = await this.docker.pull(source.reference, options)
    await this.followProgress(stream, source.reference)
  }

  private async build(source: BuiltImage): Promise<void> {
    const src = await readdir(source.buildPath)
    this.log.info({ image: source.tag, context: source.buildPath }, 'Building image')
    const stream = await this.docker.buildImage(
      { context: source.buildPath, src },
      { t: source.tag, rm: true, squash: source.squash },
    )
    await this.followProgress(stream, source.tag)
  }

  private followProgress(stream: NodeJS.ReadableStream, image: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.docker.modem.followProgress(
        stream,
        (err: Error | null, output: ProgressEvent[]) => {
          if (err) {
            reject(err)
            return
          }
          const failed = output.find((event) => event.error !== undefined)
          if (failed?.error !== undefined) {
            reject(new Error(failed.error))
            return
          }
          resolve()
        },
        (event: ProgressEvent) => {
          this.log.debug({ image, ...event }, 'Image progress')
        },
      )
    })
  }

  private toCreateOptions(
    definition: ContainerDefinition,
    netTarget?: RuntimeHandle,
  ): Docker.ContainerCreateOptions {
    const image =
      definition.image.kind === 'pull' ? definition.image.reference : definition.image.tag

    const exposedPorts: Record<string, Record<string, never>> = {}
    const portBindings: Record<string, { HostIp?: string; HostPort: string }[]> = {}
    for (const port of definition.ports) {
      const key = `${port.containerPort}/${port.protocol}`
      exposedPorts[key] = {}
      portBindings[key] = [
        ...(portBindings[key] ?? []),
        port.hostIp
          ? { HostIp: port.hostIp, HostPort: String(port.hostPort) }
          : { HostPort: String(port.hostPort) },
      ]
    }

    // A net dependency joins the donor's namespace by handle, or by name when
    // the donor was started outside this process
    const networkMode =
      definition.net !== undefined
        ? `container:${netTarget ?? definition.net}`
        : definition.network

    const labels: Record<string, string> = { [`${this.labelPrefix}.managed`]: 'true' }
    if (definition.group) labels[`${this.labelPrefix}.group`] = definition.group

    return {
      name: definition.name,
      Image: image,
      Cmd: definition.args.length > 0 ? definition.args : undefined,
      Env: Object.entries(definition.environment).map(([key, value]) => `${key}=${value}`),
      Labels: labels,
      ExposedPorts: exposedPorts,
      HostConfig: {
        CapAdd: definition.capAdd,
        CapDrop: definition.capDrop,
        Devices: definition.devices.map((d) => ({
          PathOnHost: d.pathOnHost,
          PathInContainer: d.pathInContainer,
          CgroupPermissions: d.permissions,
        })),
        Dns: definition.dns,
        Binds: definition.mounts.map(
          (m) => `${m.source}:${m.target}:${m.readOnly ? 'ro' : 'rw'}`,
        ),
        Tmpfs: Object.fromEntries(definition.tmpfs.map((t) => [t.target, t.options ?? ''])),
        PortBindings: portBindings,
        RestartPolicy: {
          Name: definition.restart.name,
          MaximumRetryCount: definition.restart.maximumRetryCount ?? 0,
        },
        NetworkMode: networkMode,
      },
    }
  }

  private isNotRunningError(err: unknown): boolean {
    return err instanceof Error && err.message.includes('is not running')
  }
}
