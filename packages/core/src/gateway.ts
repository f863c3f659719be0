/**
 * Runtime Gateway Interface
 *
 * Narrow capability interface over a container runtime:
 * - Docker (via dockerode) in @berth/docker
 *
 * The lifecycle engine only talks to the runtime through this interface, so
 * the runtime can be swapped (or faked in tests) without touching ordering
 * logic. Implementations carry no business logic.
 */

import type { ContainerDefinition, ImageHandle, ImageSource, RuntimeHandle } from './types'

export interface PullOrBuildOptions {
  /**
   * Pull or build even when the image already exists locally.
   * @default false
   */
  force?: boolean
}

export interface RemoveOptions {
  /**
   * Remove a running container without stopping it first.
   * @default false
   */
  force?: boolean
}

/**
 * Observed runtime state of a container.
 */
export interface InspectResult {
  running: boolean

  /** Set once the container has exited. */
  exitCode?: number
}

/**
 * Runtime Gateway.
 *
 * Every method rejects with a RuntimeGatewayError subclass whose `transient`
 * flag tells the engine whether a retry may succeed.
 */
export interface RuntimeGateway {
  /**
   * Gateway name for logging/debugging.
   * @example 'docker'
   */
  readonly name: string

  /**
   * Make the image available locally, pulling or building it as needed.
   * @throws ImageError
   */
  pullOrBuild(source: ImageSource, options?: PullOrBuildOptions): Promise<ImageHandle>

  /**
   * Create (but not start) a container.
   * @param netTarget Handle of the container whose network namespace to join
   * @throws CreateError
   */
  create(definition: ContainerDefinition, netTarget?: RuntimeHandle): Promise<RuntimeHandle>

  /**
   * @throws StartError
   */
  start(handle: RuntimeHandle): Promise<void>

  /**
   * @param timeoutSeconds Seconds to wait before killing
   * @throws StopError
   */
  stop(handle: RuntimeHandle, timeoutSeconds: number): Promise<void>

  /**
   * @throws RemoveError
   */
  remove(handle: RuntimeHandle, options?: RemoveOptions): Promise<void>

  /**
   * Used for readiness polling.
   * @throws InspectError
   */
  inspect(handle: RuntimeHandle): Promise<InspectResult>

  /**
   * Find an existing runtime object by container name.
   * @returns The handle, or null when no such container exists
   * @throws InspectError
   */
  lookup(name: string): Promise<RuntimeHandle | null>
}
