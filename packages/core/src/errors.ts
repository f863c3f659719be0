/**
 * Domain Error Types
 *
 * Every error carries a stable `code` so callers (CLI, status reporting) can
 * branch on the kind of failure without string matching.
 */

import type { ContainerName, GroupName } from './types'

export interface ValidationIssue {
  /**
   * Dotted path of the offending field, as written in the definition file.
   * @example 'image_build_path'
   * @example 'mounts.1'
   */
  path: string
  message: string
}

/**
 * Invalid container or group definition. Local to one definition.
 */
export class ValidationError extends Error {
  readonly code = 'VALIDATION'
  readonly field: string

  constructor(
    readonly definition: string,
    readonly issues: ValidationIssue[],
  ) {
    const detail = issues.map((i) => `${i.path}: ${i.message}`).join('; ')
    super(`Invalid definition '${definition}': ${detail}`)
    this.name = 'ValidationError'
    this.field = issues[0]?.path ?? '/'
  }
}

/**
 * A dependency names a container that is not registered.
 */
export class UnresolvedDependencyError extends Error {
  readonly code = 'UNRESOLVED_DEPENDENCY'

  constructor(
    readonly container: ContainerName,
    readonly dependency: ContainerName,
    readonly via: 'net' | 'depends_on' | 'master' | 'member',
  ) {
    super(`Container '${container}' references unknown container '${dependency}' via ${via}`)
    this.name = 'UnresolvedDependencyError'
  }
}

/**
 * The dependency relation contains a cycle; no order can be computed.
 */
export class CycleError extends Error {
  readonly code = 'DEPENDENCY_CYCLE'

  /**
   * Containers of the cycle, each exactly once, in dependency direction:
   * every entry depends on the next, and the last depends on the first.
   */
  readonly cycle: ContainerName[]

  constructor(cycle: ContainerName[]) {
    super(`Dependency cycle detected: ${[...cycle, cycle[0]].join(' -> ')}`)
    this.name = 'CycleError'
    this.cycle = cycle
  }
}

/**
 * A dependency did not reach `running`, so the dependent was not started.
 */
export class DependencyUnmetError extends Error {
  readonly code = 'DEPENDENCY_UNMET'

  constructor(
    readonly container: ContainerName,
    readonly dependency: ContainerName,
    reason: string,
  ) {
    super(`Container '${container}' not started: dependency '${dependency}' ${reason}`)
    this.name = 'DependencyUnmetError'
  }
}

/**
 * A container was not stopped because a dependent of it is still running.
 */
export class DependentStillRunningError extends Error {
  readonly code = 'DEPENDENT_RUNNING'

  constructor(
    readonly container: ContainerName,
    readonly dependent: ContainerName,
  ) {
    super(`Container '${container}' not stopped: dependent '${dependent}' is still running`)
    this.name = 'DependentStillRunningError'
  }
}

/**
 * A started container did not report running within the readiness timeout.
 */
export class ReadinessTimeoutError extends Error {
  readonly code = 'READINESS_TIMEOUT'

  constructor(
    readonly container: ContainerName,
    readonly timeoutMs: number,
  ) {
    super(`Container '${container}' did not become ready within ${timeoutMs}ms`)
    this.name = 'ReadinessTimeoutError'
  }
}

/**
 * The run was cancelled before this operation was issued.
 */
export class CancelledError extends Error {
  readonly code = 'CANCELLED'

  constructor(readonly container: ContainerName) {
    super(`Operation on '${container}' cancelled`)
    this.name = 'CancelledError'
  }
}

/**
 * Another operation currently owns the status of this container.
 */
export class ConcurrentOperationError extends Error {
  readonly code = 'CONCURRENT_OPERATION'

  constructor(
    readonly container: ContainerName,
    readonly owner: string,
  ) {
    super(`Container '${container}' is being transitioned by another operation (${owner})`)
    this.name = 'ConcurrentOperationError'
  }
}

/**
 * A status transition not allowed by the lifecycle state machine.
 */
export class InvalidTransitionError extends Error {
  readonly code = 'INVALID_TRANSITION'

  constructor(
    readonly container: ContainerName,
    readonly from: string,
    readonly to: string,
  ) {
    super(`Container '${container}' cannot transition from ${from} to ${to}`)
    this.name = 'InvalidTransitionError'
  }
}

export class DuplicateGroupError extends Error {
  readonly code = 'DUPLICATE_GROUP'

  constructor(readonly group: GroupName) {
    super(`Group '${group}' is already registered`)
    this.name = 'DuplicateGroupError'
  }
}

export class DuplicateContainerError extends Error {
  readonly code = 'DUPLICATE_CONTAINER'

  constructor(
    readonly container: ContainerName,
    readonly existingGroup: GroupName,
  ) {
    super(`Container '${container}' is already registered in group '${existingGroup}'`)
    this.name = 'DuplicateContainerError'
  }
}

export class UnknownGroupError extends Error {
  readonly code = 'UNKNOWN_GROUP'

  constructor(readonly group: GroupName) {
    super(`Group '${group}' is not registered`)
    this.name = 'UnknownGroupError'
  }
}

export class ContainerNotFoundError extends Error {
  readonly code = 'CONTAINER_NOT_FOUND'

  constructor(readonly container: ContainerName) {
    super(`Container '${container}' is not registered`)
    this.name = 'ContainerNotFoundError'
  }
}

// =============================================================================
// Runtime Gateway errors
// =============================================================================

export type GatewayOperation = 'pullOrBuild' | 'create' | 'start' | 'stop' | 'remove' | 'inspect'

export interface GatewayErrorOptions {
  /** Whether retrying the same call may succeed. */
  transient: boolean
  cause?: unknown
}

/**
 * Base class of errors raised by Runtime Gateway implementations.
 */
export class RuntimeGatewayError extends Error {
  readonly code: string = 'GATEWAY'
  readonly transient: boolean

  constructor(
    readonly operation: GatewayOperation,
    readonly target: string,
    message: string,
    options: GatewayErrorOptions,
  ) {
    super(`${operation} ${target}: ${message}`, { cause: options.cause })
    this.name = 'RuntimeGatewayError'
    this.transient = options.transient
  }
}

export class ImageError extends RuntimeGatewayError {
  override readonly code = 'IMAGE'

  constructor(target: string, message: string, options: GatewayErrorOptions) {
    super('pullOrBuild', target, message, options)
    this.name = 'ImageError'
  }
}

export class CreateError extends RuntimeGatewayError {
  override readonly code = 'CREATE'

  constructor(target: string, message: string, options: GatewayErrorOptions) {
    super('create', target, message, options)
    this.name = 'CreateError'
  }
}

export class StartError extends RuntimeGatewayError {
  override readonly code = 'START'

  constructor(target: string, message: string, options: GatewayErrorOptions) {
    super('start', target, message, options)
    this.name = 'StartError'
  }
}

export class StopError extends RuntimeGatewayError {
  override readonly code = 'STOP'

  constructor(target: string, message: string, options: GatewayErrorOptions) {
    super('stop', target, message, options)
    this.name = 'StopError'
  }
}

export class RemoveError extends RuntimeGatewayError {
  override readonly code = 'REMOVE'

  constructor(target: string, message: string, options: GatewayErrorOptions) {
    super('remove', target, message, options)
    this.name = 'RemoveError'
  }
}

export class InspectError extends RuntimeGatewayError {
  override readonly code = 'INSPECT'

  constructor(target: string, message: string, options: GatewayErrorOptions) {
    super('inspect', target, message, options)
    this.name = 'InspectError'
  }
}

/**
 * Type guard for errors that may succeed when retried.
 */
export function isTransientError(err: unknown): boolean {
  return err instanceof RuntimeGatewayError && err.transient
}

/**
 * Type guard for Berth domain errors.
 */
export function isBerthError(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string'
}
