/**
 * Berth orchestrator
 *
 * Wires the definition store, group registry, runtime gateway and lifecycle
 * engine from process configuration.
 */

import type { RuntimeGateway } from '@berth/core'
import { DockerGateway } from '@berth/docker'
import type { OrchestratorConfig } from '../lib/config'
import { DefinitionStore } from '../lib/definition/loader'
import { LifecycleEngine } from '../lib/lifecycle/engine'
import { type Logger, createLogger } from '../lib/logger'
import { type RecoveryStats, recoverState } from '../lib/recovery'
import { GroupRegistry } from '../lib/registry/group-registry'

export interface OrchestratorOptions {
  logger?: Logger

  /** Runtime gateway; a DockerGateway from `config.docker` when unset. */
  gateway?: RuntimeGateway

  /** Variables for ${VAR} interpolation in definition files. */
  env?: Record<string, string | undefined>
}

export interface Orchestrator {
  config: OrchestratorConfig
  store: DefinitionStore
  registry: GroupRegistry
  gateway: RuntimeGateway
  engine: LifecycleEngine
  logger: Logger

  /** Definitions rejected while loading; the rest are registered. */
  loadErrors: Error[]

  /** Adopt containers that already exist in the runtime. */
  recover(): Promise<RecoveryStats>
}

/**
 * Load every definition from the store into a fresh registry.
 */
export function loadRegistry(
  store: DefinitionStore,
  logger: Logger,
): { registry: GroupRegistry; errors: Error[] } {
  const log = logger.child({ component: 'Loader' })
  const registry = new GroupRegistry()
  const { groups, containers, errors } = store.load()
  const rejected: Error[] = [...errors]

  for (const group of groups) {
    try {
      registry.register(group)
    } catch (err) {
      if (!(err instanceof Error)) throw err
      rejected.push(err)
    }
  }
  for (const container of containers) {
    try {
      registry.addContainer(container.group ?? '', container)
    } catch (err) {
      if (!(err instanceof Error)) throw err
      rejected.push(err)
    }
  }

  for (const error of rejected) {
    log.error({ err: error }, 'Definition rejected')
  }
  log.info(
    { groups: registry.listGroups().length, containers: registry.listContainers().length },
    'Definitions loaded',
  )
  return { registry, errors: rejected }
}

export function createOrchestrator(
  config: OrchestratorConfig,
  options: OrchestratorOptions = {},
): Orchestrator {
  const logger = options.logger ?? createLogger(config.logLevel)

  const store = new DefinitionStore(config.configDir, {
    defaultNetwork: config.defaultNetwork || undefined,
    env: options.env,
  })
  const { registry, errors } = loadRegistry(store, logger)

  const gateway =
    options.gateway ??
    new DockerGateway({ ...config.docker, labelPrefix: config.labelPrefix, logger })

  const engine = new LifecycleEngine(
    gateway,
    registry,
    {
      readyTimeoutMs: config.readyTimeoutMs,
      readyPollMs: config.readyPollMs,
      dependencyTimeoutMs: config.dependencyTimeoutMs,
      stopTimeoutSeconds: config.stopTimeoutSeconds,
      retry: config.retry,
      maxConcurrent: config.maxConcurrent,
    },
    logger,
  )

  return {
    config,
    store,
    registry,
    gateway,
    engine,
    logger,
    loadErrors: errors,
    recover: () => recoverState(gateway, registry, engine, logger),
  }
}

export { type OrchestratorConfig, loadConfig, config } from '../lib/config'
export { DefinitionStore, interpolateEnvVars } from '../lib/definition/loader'
export {
  mergeDefaults,
  validateContainer,
  validateDefinition,
  validateGroup,
} from '../lib/definition/validate'
export { DependencyGraph, buildDependencyGraph, deriveEdges } from '../lib/graph/dependency-graph'
export type { DependencyEdge, EdgeKind } from '../lib/graph/dependency-graph'
export { LifecycleEngine } from '../lib/lifecycle/engine'
export type {
  ContainerOutcome,
  ContainerResult,
  DownOptions,
  EngineConfig,
  OperationScope,
  RunSummary,
  UpOptions,
} from '../lib/lifecycle/engine'
export { canTransition, isActive } from '../lib/lifecycle/state-machine'
export { backoffDelay, withRetry } from '../lib/lifecycle/retry'
export { GroupRegistry } from '../lib/registry/group-registry'
export type {
  ContainerStatusSnapshot,
  GroupStatusSnapshot,
  StatusLease,
} from '../lib/registry/group-registry'
export { recoverState, type RecoveryStats } from '../lib/recovery'
export { registry as metricsRegistry, writeMetrics } from '../lib/metrics'
export { createLogger, type Logger } from '../lib/logger'
