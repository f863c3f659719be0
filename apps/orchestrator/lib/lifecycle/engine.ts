/**
 * Lifecycle Engine
 *
 * Drives containers through create → start → running → stop → remove in
 * dependency order. The engine is the only writer of container status, and
 * writes it through registry leases. It owns the runtime handles.
 *
 * Runtime failures stay inside their dependency subtree: a container whose
 * dependency did not come up is not started, unrelated chains continue, and
 * every outcome is reported in the run summary.
 */

import { setTimeout as sleep } from 'node:timers/promises'
import {
  CancelledError,
  type ContainerDefinition,
  type ContainerName,
  ContainerNotFoundError,
  type ContainerStatus,
  DependencyUnmetError,
  DependentStillRunningError,
  type GatewayOperation,
  type GroupName,
  ReadinessTimeoutError,
  type RuntimeGateway,
  type RuntimeHandle,
  StartError,
  UnknownGroupError,
} from '@berth/core'
import type { Logger } from '../logger'
import { type DependencyGraph, buildDependencyGraph } from '../graph/dependency-graph'
import {
  gatewayOperationDuration,
  gatewayRetriesTotal,
  runsTotal,
  statusTransitionsTotal,
} from '../metrics'
import type { GroupRegistry, StatusLease } from '../registry/group-registry'
import { type RetryPolicy, withRetry } from './retry'
import { isActive } from './state-machine'

export interface EngineConfig {
  /** How long a started container may take to report running. */
  readyTimeoutMs: number
  readyPollMs: number

  /** How long to wait for a dependency that is not part of the run. */
  dependencyTimeoutMs: number

  /** Grace period given to `stop` before the runtime kills. */
  stopTimeoutSeconds: number

  retry: RetryPolicy

  /** Containers processed at once across independent chains. */
  maxConcurrent: number
}

/**
 * Containers an operation applies to. Both empty means everything registered.
 */
export interface OperationScope {
  groups?: readonly GroupName[]
  containers?: readonly ContainerName[]
}

export interface UpOptions {
  /** Stops issuing start operations once aborted, then rolls back. */
  signal?: AbortSignal

  /** Pull or build images even when present locally. */
  pull?: boolean
}

export interface DownOptions {
  /** Remove containers after stopping them. */
  remove?: boolean

  /** Remove without stopping first. */
  force?: boolean

  signal?: AbortSignal
}

export type RunOperation = 'up' | 'down' | 'update' | 'restart'

export type ContainerOutcome =
  | 'started'
  | 'stopped'
  | 'removed'
  | 'unchanged'
  | 'failed'
  | 'skipped'
  | 'cancelled'
  | 'rolled-back'

export interface ContainerResult {
  name: ContainerName
  outcome: ContainerOutcome
  status: ContainerStatus
  error?: Error
}

export interface RunSummary {
  operation: RunOperation

  /** Processing order of the run. */
  order: ContainerName[]

  /** One entry per container, in processing order. */
  results: ContainerResult[]

  /** Containers whose outcome is `failed` or `skipped`. */
  failed: ContainerName[]

  cancelled: boolean

  /** Containers stopped again after cancellation, in stop order. */
  rolledBack: ContainerName[]
}

interface Run {
  operation: RunOperation
  owner: string
  order: ContainerName[]
  results: Map<ContainerName, ContainerResult>
  signal?: AbortSignal
}

interface Plan {
  graph: DependencyGraph
  order: ContainerName[]
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

function throwIfAborted(name: ContainerName, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError(name)
  }
}

export class LifecycleEngine {
  private handles = new Map<ContainerName, RuntimeHandle>()
  private lastGraph?: DependencyGraph
  private runCounter = 0
  private log: Logger

  constructor(
    private gateway: RuntimeGateway,
    private registry: GroupRegistry,
    private config: EngineConfig,
    logger: Logger,
  ) {
    this.log = logger.child({ component: 'LifecycleEngine' })
  }

  handleOf(name: ContainerName): RuntimeHandle | undefined {
    return this.handles.get(name)
  }

  /**
   * Take ownership of a runtime object created outside this process.
   */
  adoptHandle(name: ContainerName, handle: RuntimeHandle): void {
    this.handles.set(name, handle)
  }

  /**
   * Compute the start order of a scope over the current registry. Structural
   * problems surface here, before any runtime call.
   * @throws UnknownGroupError
   * @throws ContainerNotFoundError
   * @throws UnresolvedDependencyError
   * @throws CycleError
   */
  plan(scope: OperationScope = {}): ContainerName[] {
    return this.prepare(scope).order
  }

  /**
   * Last computed start order, restricted to a group's members when given.
   */
  topology(group?: GroupName): ContainerName[] {
    const graph = this.lastGraph ?? this.prepare({}).graph
    if (group === undefined) {
      return [...graph.startOrder]
    }
    const definition = this.registry.getGroup(group)
    if (!definition) {
      throw new UnknownGroupError(group)
    }
    return graph.scopedStartOrder(definition.members)
  }

  async up(scope: OperationScope = {}, options: UpOptions = {}): Promise<RunSummary> {
    const { graph, order } = this.prepare(scope)
    const run = this.openRun('up', order, options.signal)
    const inRun = new Set(order)
    const startedThisRun: ContainerName[] = []

    await this.schedule(
      order,
      (name) => graph.dependenciesOf(name).filter((d) => inRun.has(d)),
      async (name) => {
        const result = await this.startOne(name, graph, inRun, run, startedThisRun, options)
        run.results.set(name, result)
      },
    )

    const rolledBack = options.signal?.aborted
      ? await this.rollback(graph.scopedStopOrder(startedThisRun), run)
      : []
    return this.closeRun(run, rolledBack)
  }

  async down(scope: OperationScope = {}, options: DownOptions = {}): Promise<RunSummary> {
    const { graph, order: requested } = this.prepare(scope)

    // A live dependent outside the scope would lose its dependency
    const names = new Set(requested)
    for (const name of requested) {
      for (const dependent of graph.transitiveDependents(name)) {
        if (this.mayBeRunning(dependent)) {
          names.add(dependent)
        }
      }
    }

    const order = graph.scopedStopOrder(names)
    const run = this.openRun('down', order, options.signal)

    await this.schedule(
      order,
      (name) => graph.dependentsOf(name).filter((d) => names.has(d)),
      async (name) => {
        const result = await this.stopOne(name, graph, names, run, options)
        run.results.set(name, result)
      },
    )

    return this.closeRun(run, [])
  }

  /**
   * Refresh every image in scope, then recreate the containers. A failed
   * pull or build aborts before anything is stopped.
   */
  async update(scope: OperationScope = {}, options: UpOptions = {}): Promise<RunSummary> {
    const { order } = this.prepare(scope)

    for (const [index, name] of order.entries()) {
      const definition = this.requireDefinition(name)
      try {
        await this.call('pullOrBuild', name, options.signal, () =>
          this.gateway.pullOrBuild(definition.image, { force: true }),
        )
      } catch (err) {
        const error = toError(err)
        this.log.error({ container: name, err: error }, 'Image refresh failed, update aborted')
        const run = this.openRun('update', order, options.signal)
        run.results.set(name, {
          name,
          outcome: 'failed',
          status: this.registry.containerStatus(name).status,
          error,
        })
        for (const other of order.slice(index + 1)) {
          run.results.set(other, {
            name: other,
            outcome: 'skipped',
            status: this.registry.containerStatus(other).status,
          })
        }
        for (const done of order.slice(0, index)) {
          run.results.set(done, {
            name: done,
            outcome: 'unchanged',
            status: this.registry.containerStatus(done).status,
          })
        }
        return this.closeRun(run, [])
      }
    }

    const down = await this.down(scope, { remove: true, signal: options.signal })
    if (down.failed.length > 0 || down.cancelled) {
      return { ...down, operation: 'update' }
    }

    const up = await this.up({ containers: down.order }, { signal: options.signal })
    return { ...up, operation: 'update' }
  }

  /**
   * Stop the scope, with its running dependents, then start the same set
   * again. Nothing is started when the stop did not complete.
   */
  async restart(scope: OperationScope = {}, options: UpOptions = {}): Promise<RunSummary> {
    const down = await this.down(scope, { signal: options.signal })
    if (down.failed.length > 0 || down.cancelled) {
      return { ...down, operation: 'restart' }
    }

    const up = await this.up({ containers: down.order }, options)
    return { ...up, operation: 'restart' }
  }

  // ===========================================================================
  // Startup
  // ===========================================================================

  private async startOne(
    name: ContainerName,
    graph: DependencyGraph,
    inRun: Set<ContainerName>,
    run: Run,
    startedThisRun: ContainerName[],
    options: UpOptions,
  ): Promise<ContainerResult> {
    let lease: StatusLease
    try {
      lease = this.registry.acquire(name, run.owner)
    } catch (err) {
      return this.rejected(name, err)
    }

    try {
      throwIfAborted(name, run.signal)

      if (lease.status === 'running') {
        return { name, outcome: 'unchanged', status: 'running' }
      }

      for (const dependency of graph.dependenciesOf(name)) {
        await this.awaitDependency(name, dependency, inRun.has(dependency), run.signal)
      }

      const definition = this.requireDefinition(name)
      let handle = this.handles.get(name)
      if (handle === undefined) {
        handle = await this.createContainer(definition, options, run.signal)
        this.transition(lease, 'created')
      }

      throwIfAborted(name, run.signal)
      this.transition(lease, 'starting')
      startedThisRun.push(name)

      const started = handle
      this.log.info({ container: name, group: definition.group }, 'Starting container')
      await this.call('start', name, run.signal, () => this.gateway.start(started))
      await this.awaitReady(name, started)

      this.transition(lease, 'running')
      this.log.info({ container: name }, 'Container running')
      return { name, outcome: 'started', status: 'running' }
    } catch (err) {
      return this.failed(lease, err)
    } finally {
      lease.release()
    }
  }

  private async createContainer(
    definition: ContainerDefinition,
    options: UpOptions,
    signal?: AbortSignal,
  ): Promise<RuntimeHandle> {
    const { name } = definition
    await this.call('pullOrBuild', name, signal, () =>
      this.gateway.pullOrBuild(definition.image, { force: options.pull ?? false }),
    )

    const donor = definition.net !== undefined ? this.handles.get(definition.net) : undefined
    const handle = await this.call('create', name, signal, () =>
      this.gateway.create(definition, donor),
    )
    this.handles.set(name, handle)
    this.log.debug({ container: name, handle }, 'Container created')
    return handle
  }

  /**
   * A dependency in the same run must already be running: it was processed
   * first. One outside the run is waited for.
   */
  private async awaitDependency(
    name: ContainerName,
    dependency: ContainerName,
    inRun: boolean,
    signal?: AbortSignal,
  ): Promise<void> {
    const statusOf = () => this.registry.containerStatus(dependency).status

    if (inRun) {
      const status = statusOf()
      if (status !== 'running') {
        throw new DependencyUnmetError(name, dependency, `is ${status}`)
      }
      return
    }

    const deadline = Date.now() + this.config.dependencyTimeoutMs
    while (statusOf() !== 'running') {
      throwIfAborted(name, signal)
      if (Date.now() >= deadline) {
        throw new DependencyUnmetError(
          name,
          dependency,
          `did not reach running within ${this.config.dependencyTimeoutMs}ms`,
        )
      }
      this.log.debug({ container: name, dependency }, 'Waiting for dependency')
      await sleep(this.config.readyPollMs)
    }
  }

  private async awaitReady(name: ContainerName, handle: RuntimeHandle): Promise<void> {
    const deadline = Date.now() + this.config.readyTimeoutMs
    for (;;) {
      const state = await this.call('inspect', name, undefined, () => this.gateway.inspect(handle))
      if (state.running) return
      if (state.exitCode !== undefined) {
        throw new StartError(name, `exited with code ${state.exitCode} before becoming ready`, {
          transient: false,
        })
      }
      if (Date.now() >= deadline) {
        throw new ReadinessTimeoutError(name, this.config.readyTimeoutMs)
      }
      await sleep(this.config.readyPollMs)
    }
  }

  /**
   * Stop what this run started, dependents first. Best effort: a failed
   * stop is reported and the rest continue.
   */
  private async rollback(order: ContainerName[], run: Run): Promise<ContainerName[]> {
    const rolledBack: ContainerName[] = []
    for (const name of order) {
      const handle = this.handles.get(name)
      if (handle === undefined) continue

      let lease: StatusLease
      try {
        lease = this.registry.acquire(name, run.owner)
      } catch (err) {
        run.results.set(name, this.rejected(name, err))
        continue
      }

      try {
        if (lease.status !== 'running' && lease.status !== 'failed') continue
        this.log.info({ container: name }, 'Rolling back container')
        await this.stopContainer(lease, handle)
        run.results.set(name, { name, outcome: 'rolled-back', status: 'stopped' })
        rolledBack.push(name)
      } catch (err) {
        run.results.set(name, this.failed(lease, err))
      } finally {
        lease.release()
      }
    }
    return rolledBack
  }

  // ===========================================================================
  // Shutdown
  // ===========================================================================

  private async stopOne(
    name: ContainerName,
    graph: DependencyGraph,
    inRun: Set<ContainerName>,
    run: Run,
    options: DownOptions,
  ): Promise<ContainerResult> {
    let lease: StatusLease
    try {
      lease = this.registry.acquire(name, run.owner)
    } catch (err) {
      return this.rejected(name, err)
    }

    try {
      throwIfAborted(name, run.signal)

      for (const dependent of graph.dependentsOf(name)) {
        const stillRunning = inRun.has(dependent)
          ? !this.stoppedInRun(run, dependent)
          : this.mayBeRunning(dependent)
        if (stillRunning) {
          const error = new DependentStillRunningError(name, dependent)
          this.log.warn({ container: name, dependent }, error.message)
          return { name, outcome: 'skipped', status: lease.status, error }
        }
      }

      const handle = this.handles.get(name)
      if (options.force) {
        return await this.removeContainer(lease, handle, true)
      }

      let stopped = false
      if (handle !== undefined && (lease.status === 'running' || lease.status === 'failed')) {
        this.log.info({ container: name }, 'Stopping container')
        await this.stopContainer(lease, handle)
        stopped = true
      }

      if (options.remove) {
        return await this.removeContainer(lease, handle, false)
      }
      return stopped
        ? { name, outcome: 'stopped', status: 'stopped' }
        : { name, outcome: 'unchanged', status: lease.status }
    } catch (err) {
      return this.failed(lease, err)
    } finally {
      lease.release()
    }
  }

  /**
   * A failed container that still has a runtime object may be executing:
   * its stop or readiness check failed, not necessarily the process.
   */
  private mayBeRunning(name: ContainerName): boolean {
    const { status } = this.registry.containerStatus(name)
    return isActive(status) || (status === 'failed' && this.handles.has(name))
  }

  private stoppedInRun(run: Run, name: ContainerName): boolean {
    const outcome = run.results.get(name)?.outcome
    return outcome === 'stopped' || outcome === 'removed' || outcome === 'unchanged'
  }

  private async stopContainer(lease: StatusLease, handle: RuntimeHandle): Promise<void> {
    this.transition(lease, 'stopping')
    await this.call('stop', lease.name, undefined, () =>
      this.gateway.stop(handle, this.config.stopTimeoutSeconds),
    )
    this.transition(lease, 'stopped')
  }

  private async removeContainer(
    lease: StatusLease,
    handle: RuntimeHandle | undefined,
    force: boolean,
  ): Promise<ContainerResult> {
    const { name } = lease
    if (lease.status === 'undefined' || lease.status === 'removed') {
      return { name, outcome: 'unchanged', status: lease.status }
    }

    if (handle !== undefined) {
      this.log.info({ container: name, force }, 'Removing container')
      await this.call('remove', name, undefined, () => this.gateway.remove(handle, { force }))
      this.handles.delete(name)
    }
    this.transition(lease, 'removed')
    return { name, outcome: 'removed', status: 'removed' }
  }

  // ===========================================================================
  // Shared
  // ===========================================================================

  private prepare(scope: OperationScope): Plan {
    const groups: GroupName[] = []
    const names: ContainerName[] = []
    const everything = scope.groups === undefined && scope.containers === undefined
    const requestedGroups = everything
      ? this.registry.listGroups().map((g) => g.name)
      : (scope.groups ?? [])

    for (const group of requestedGroups) {
      const definition = this.registry.getGroup(group)
      if (!definition) {
        throw new UnknownGroupError(group)
      }
      groups.push(group)
      names.push(...definition.members)
    }
    for (const name of scope.containers ?? []) {
      if (!this.registry.getContainer(name)) {
        throw new ContainerNotFoundError(name)
      }
      names.push(name)
    }
    if (everything) {
      names.push(...this.registry.listContainers().map((c) => c.name))
    }

    const graph = buildDependencyGraph(
      this.registry.listContainers(),
      this.registry.listGroups(),
      { scope: groups },
    )
    this.lastGraph = graph
    return { graph, order: graph.scopedStartOrder(names) }
  }

  /**
   * Run `task` for every name once its prerequisites are done, at most
   * `maxConcurrent` at a time. Names are picked in `order`, so with one slot
   * the run follows the computed order exactly. Tasks must not reject.
   */
  private async schedule(
    order: ContainerName[],
    prerequisitesOf: (name: ContainerName) => ContainerName[],
    task: (name: ContainerName) => Promise<void>,
  ): Promise<void> {
    const pending = [...order]
    const done = new Set<ContainerName>()
    const active = new Map<ContainerName, Promise<ContainerName>>()
    const limit = Math.max(1, this.config.maxConcurrent)

    while (pending.length > 0 || active.size > 0) {
      for (let i = 0; i < pending.length && active.size < limit; ) {
        const name = pending[i]
        if (prerequisitesOf(name).every((p) => done.has(p))) {
          pending.splice(i, 1)
          active.set(name, task(name).then(() => name))
        } else {
          i++
        }
      }

      if (active.size === 0) break
      const finished = await Promise.race(active.values())
      active.delete(finished)
      done.add(finished)
    }
  }

  /**
   * Run one gateway call with retry, timing each attempt.
   */
  private call<T>(
    operation: GatewayOperation,
    name: ContainerName,
    signal: AbortSignal | undefined,
    fn: () => Promise<T>,
  ): Promise<T> {
    return withRetry(
      async () => {
        const end = gatewayOperationDuration.startTimer({ operation })
        try {
          const result = await fn()
          end({ outcome: 'success' })
          return result
        } catch (err) {
          end({ outcome: 'error' })
          throw err
        }
      },
      {
        ...this.config.retry,
        signal,
        onRetry: (err, attempt, delayMs) => {
          gatewayRetriesTotal.inc({ operation })
          this.log.warn(
            { container: name, operation, attempt, delayMs, err },
            'Transient runtime error, retrying',
          )
        },
      },
    )
  }

  private transition(lease: StatusLease, to: ContainerStatus, error?: Error): void {
    const from = lease.status
    lease.transition(to, error)
    statusTransitionsTotal.inc({ from, to })
    this.log.debug({ container: lease.name, from, to }, 'Status transition')
  }

  /**
   * Record a failure on the container. Cancellation leaves the status as is.
   */
  private failed(lease: StatusLease, err: unknown): ContainerResult {
    const error = toError(err)
    if (error instanceof CancelledError) {
      return { name: lease.name, outcome: 'cancelled', status: lease.status, error }
    }
    this.transition(lease, 'failed', error)
    this.log.error({ container: lease.name, err: error }, 'Container failed')
    return { name: lease.name, outcome: 'failed', status: 'failed', error }
  }

  /**
   * The lease was not granted; status is untouched. A container removed from
   * the registry mid-run reports `undefined`.
   */
  private rejected(name: ContainerName, err: unknown): ContainerResult {
    const error = toError(err)
    this.log.warn({ container: name, err: error }, 'Container skipped')
    const status = this.registry.getContainer(name)
      ? this.registry.containerStatus(name).status
      : 'undefined'
    return { name, outcome: 'failed', status, error }
  }

  private requireDefinition(name: ContainerName): ContainerDefinition {
    const definition = this.registry.getContainer(name)
    if (!definition) {
      throw new ContainerNotFoundError(name)
    }
    return definition
  }

  private openRun(operation: RunOperation, order: ContainerName[], signal?: AbortSignal): Run {
    this.runCounter++
    const run: Run = {
      operation,
      owner: `${operation}-${this.runCounter}`,
      order,
      results: new Map(),
    }
    if (signal) run.signal = signal
    this.log.info({ operation, order }, 'Run planned')
    return run
  }

  private closeRun(run: Run, rolledBack: ContainerName[]): RunSummary {
    const results = run.order.flatMap((name) => {
      const result = run.results.get(name)
      return result ? [result] : []
    })
    const failed = results
      .filter((r) => r.outcome === 'failed' || r.outcome === 'skipped')
      .map((r) => r.name)
    const cancelled = run.signal?.aborted ?? false

    const outcome = cancelled ? 'cancelled' : failed.length > 0 ? 'partial' : 'success'
    runsTotal.inc({ operation: run.operation, outcome })
    this.log.info({ operation: run.operation, failed, cancelled, rolledBack }, 'Run finished')

    return { operation: run.operation, order: run.order, results, failed, cancelled, rolledBack }
  }
}
