/**
 * Shared test fixtures using Faker.js
 *
 * Provides factory functions for creating test data across all tests, and an
 * in-process RuntimeGateway that records every call.
 */

import {
  type ContainerDefinition,
  type ContainerName,
  CreateError,
  type GatewayOperation,
  type GroupDefinition,
  type ImageHandle,
  type ImageSource,
  type InspectResult,
  type PullOrBuildOptions,
  type RemoveOptions,
  type RuntimeGateway,
  type RuntimeHandle,
  StartError,
} from '@berth/core'
import { faker } from '@faker-js/faker'
import pino from 'pino'
import type { EngineConfig } from '../lib/lifecycle/engine'

// =============================================================================
// Definition Fixtures
// =============================================================================

export function createContainerName(): ContainerName {
  return `${faker.word.noun().toLowerCase()}-${faker.string.alphanumeric(6).toLowerCase()}`
}

export function createContainerDefinition(
  overrides?: Partial<ContainerDefinition>,
): ContainerDefinition {
  const name = overrides?.name ?? createContainerName()
  return {
    name,
    image: {
      kind: 'pull',
      reference: `${faker.internet.domainWord()}/${name}:${faker.system.semver()}`,
      insecure: false,
    },
    args: [],
    capAdd: [],
    capDrop: [],
    devices: [],
    dns: [],
    environment: { TZ: faker.location.timeZone() },
    mounts: [],
    tmpfs: [],
    ports: [],
    restart: { name: 'always' },
    network: 'bridge',
    dependsOn: [],
    ...overrides,
  }
}

export function createGroupDefinition(overrides?: Partial<GroupDefinition>): GroupDefinition {
  return {
    name: `group-${faker.string.alphanumeric(6).toLowerCase()}`,
    members: [],
    ...overrides,
  }
}

/**
 * Engine timings short enough for tests.
 */
export function createEngineConfig(overrides?: Partial<EngineConfig>): EngineConfig {
  return {
    readyTimeoutMs: 50,
    readyPollMs: 5,
    dependencyTimeoutMs: 50,
    stopTimeoutSeconds: 1,
    retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 2 },
    maxConcurrent: 1,
    ...overrides,
  }
}

export const silentLogger = pino({ level: 'silent' })

// =============================================================================
// Fake Runtime Gateway
// =============================================================================

export type FakeOperation = GatewayOperation | 'lookup'

export interface GatewayCall {
  op: FakeOperation
  /** Container name, or the image reference for pullOrBuild. */
  target: string
  force?: boolean
  netTarget?: RuntimeHandle
}

interface Failure {
  op: FakeOperation
  target: string
  error: Error
  remaining: number
}

interface FakeContainer {
  running: boolean
  exitCode?: number
}

function referenceOf(source: ImageSource): string {
  return source.kind === 'pull' ? source.reference : source.tag
}

/**
 * In-process RuntimeGateway. Handles are `<name>-id`.
 */
export class FakeGateway implements RuntimeGateway {
  readonly name = 'fake'
  readonly calls: GatewayCall[] = []

  private containers = new Map<ContainerName, FakeContainer>()
  private failures: Failure[] = []
  private exitOnStart = new Map<ContainerName, number>()
  private neverReady = new Set<ContainerName>()
  private hooks = new Map<string, () => void>()

  /**
   * Fail the next `times` calls of `op` on `target`.
   */
  failOn(op: FakeOperation, target: string, error: Error, times = Number.POSITIVE_INFINITY): this {
    this.failures.push({ op, target, error, remaining: times })
    return this
  }

  /** The container exits with `code` right after start. */
  exitAfterStart(name: ContainerName, code: number): this {
    this.exitOnStart.set(name, code)
    return this
  }

  /** The container never reports running. */
  stayNotReady(name: ContainerName): this {
    this.neverReady.add(name)
    return this
  }

  /** Run `fn` when `op` is called on `target`, before the call resolves. */
  onCall(op: FakeOperation, target: string, fn: () => void): this {
    this.hooks.set(`${op}:${target}`, fn)
    return this
  }

  /** A container that already exists in the runtime. */
  seed(name: ContainerName, running: boolean): this {
    this.containers.set(name, { running })
    return this
  }

  exists(name: ContainerName): boolean {
    return this.containers.has(name)
  }

  isRunning(name: ContainerName): boolean {
    return this.containers.get(name)?.running ?? false
  }

  /** Targets of every call of `op`, in call order. */
  targets(op: FakeOperation): string[] {
    return this.calls.filter((c) => c.op === op).map((c) => c.target)
  }

  async pullOrBuild(source: ImageSource, options?: PullOrBuildOptions): Promise<ImageHandle> {
    const reference = referenceOf(source)
    this.record({ op: 'pullOrBuild', target: reference, force: options?.force ?? false })
    return `sha256:${reference}`
  }

  async create(definition: ContainerDefinition, netTarget?: RuntimeHandle): Promise<RuntimeHandle> {
    const call: GatewayCall = { op: 'create', target: definition.name }
    if (netTarget !== undefined) call.netTarget = netTarget
    this.record(call)
    if (this.containers.has(definition.name)) {
      throw new CreateError(definition.name, 'name already in use', { transient: false })
    }
    this.containers.set(definition.name, { running: false })
    return `${definition.name}-id`
  }

  async start(handle: RuntimeHandle): Promise<void> {
    const name = this.nameOf(handle)
    this.record({ op: 'start', target: name })
    const container = this.require(name, 'start')
    const exitCode = this.exitOnStart.get(name)
    if (exitCode !== undefined) {
      container.running = false
      container.exitCode = exitCode
      return
    }
    delete container.exitCode
    container.running = true
  }

  async stop(handle: RuntimeHandle): Promise<void> {
    const name = this.nameOf(handle)
    this.record({ op: 'stop', target: name })
    const container = this.require(name, 'stop')
    container.running = false
    container.exitCode = 0
  }

  async remove(handle: RuntimeHandle, options?: RemoveOptions): Promise<void> {
    const name = this.nameOf(handle)
    this.record({ op: 'remove', target: name, force: options?.force ?? false })
    this.containers.delete(name)
  }

  async inspect(handle: RuntimeHandle): Promise<InspectResult> {
    const name = this.nameOf(handle)
    this.record({ op: 'inspect', target: name })
    const container = this.require(name, 'inspect')
    if (this.neverReady.has(name)) {
      return { running: false }
    }
    return container.exitCode === undefined
      ? { running: container.running }
      : { running: container.running, exitCode: container.exitCode }
  }

  async lookup(name: string): Promise<RuntimeHandle | null> {
    this.record({ op: 'lookup', target: name })
    return this.containers.has(name) ? `${name}-id` : null
  }

  private record(call: GatewayCall): void {
    this.calls.push(call)
    this.hooks.get(`${call.op}:${call.target}`)?.()

    const failure = this.failures.find(
      (f) => f.op === call.op && f.target === call.target && f.remaining > 0,
    )
    if (failure) {
      failure.remaining--
      throw failure.error
    }
  }

  private nameOf(handle: RuntimeHandle): ContainerName {
    return handle.endsWith('-id') ? handle.slice(0, -'-id'.length) : handle
  }

  private require(name: ContainerName, op: string): FakeContainer {
    const container = this.containers.get(name)
    if (!container) {
      throw new StartError(name, `no such container (${op})`, { transient: false })
    }
    return container
  }
}
