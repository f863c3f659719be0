import type { ContainerStatus } from '@berth/core'

/**
 * Allowed status transitions.
 *
 * The happy path is undefined → created → starting → running → stopping →
 * stopped → removed. Any step may end in `failed`; from `failed` an operator
 * retry may head back toward any target. Forced removal skips the stop.
 */
const transitions: Record<ContainerStatus, readonly ContainerStatus[]> = {
  undefined: ['created', 'failed'],
  created: ['starting', 'removed', 'failed'],
  starting: ['running', 'failed'],
  running: ['stopping', 'removed', 'failed'],
  stopping: ['stopped', 'failed'],
  stopped: ['starting', 'removed', 'failed'],
  failed: ['created', 'starting', 'stopping', 'removed', 'failed'],
  removed: ['created', 'failed'],
}

export function canTransition(from: ContainerStatus, to: ContainerStatus): boolean {
  return transitions[from].includes(to)
}

/** Statuses in which a runtime object is (or may be) executing. */
export function isActive(status: ContainerStatus): boolean {
  return status === 'starting' || status === 'running' || status === 'stopping'
}
