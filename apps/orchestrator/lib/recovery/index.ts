/**
 * Recovery Module
 *
 * Reconciles a freshly loaded registry with the container runtime on startup.
 * Containers are matched by name: the container name is also the runtime name.
 */

import type { RuntimeGateway } from '@berth/core'
import type { LifecycleEngine } from '../lifecycle/engine'
import type { Logger } from '../logger'
import type { GroupRegistry } from '../registry/group-registry'

export interface RecoveryStats {
  /** Registered containers found in the runtime; handle adopted */
  restored: number
  /** Of the restored, those currently running */
  running: number
  /** Registered containers with no runtime object; left `undefined` */
  missing: number
}

/**
 * Reconcile registry status with the runtime.
 *
 * Flow:
 * 1. Look up every registered container by name
 * 2. Found → adopt its handle, status `running` or `stopped` from inspect
 * 3. Not found → leave as `undefined`
 */
export async function recoverState(
  gateway: RuntimeGateway,
  registry: GroupRegistry,
  engine: LifecycleEngine,
  logger: Logger,
): Promise<RecoveryStats> {
  const log = logger.child({ component: 'Recovery' })
  const stats: RecoveryStats = { restored: 0, running: 0, missing: 0 }

  const containers = registry.listContainers()
  log.info({ containers: containers.length }, 'Starting state recovery')

  for (const { name } of containers) {
    const handle = await gateway.lookup(name)
    if (handle === null) {
      stats.missing++
      continue
    }

    engine.adoptHandle(name, handle)
    const state = await gateway.inspect(handle)
    registry.restoreStatus(name, state.running ? 'running' : 'stopped')
    stats.restored++
    if (state.running) stats.running++
    log.debug({ container: name, handle, running: state.running }, 'Container restored')
  }

  log.info(stats, 'State recovery complete')
  return stats
}
