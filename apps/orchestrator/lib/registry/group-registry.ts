/**
 * Group Registry
 *
 * Process-wide catalog of groups, their member containers and the status of
 * each container. Definitions are frozen on admission. Status is written
 * only through leases: one writer per container name at a time.
 */

import {
  ConcurrentOperationError,
  type ContainerDefinition,
  type ContainerName,
  ContainerNotFoundError,
  type ContainerStatus,
  DuplicateContainerError,
  DuplicateGroupError,
  type GroupDefinition,
  type GroupName,
  InvalidTransitionError,
  UnknownGroupError,
  ValidationError,
} from '@berth/core'
import { canTransition } from '../lifecycle/state-machine'

export interface ContainerStatusSnapshot {
  kind: 'container'
  name: ContainerName
  group: GroupName
  status: ContainerStatus
  /** Cause of the last failed transition. */
  error?: Error
  updatedAt: Date
}

export interface GroupStatusSnapshot {
  kind: 'group'
  name: GroupName
  master?: ContainerName
  members: ContainerStatusSnapshot[]
}

/**
 * Exclusive right to write the status of one container.
 */
export interface StatusLease {
  readonly name: ContainerName
  readonly owner: string
  readonly status: ContainerStatus
  /**
   * Compare-and-set against the state machine.
   * @throws InvalidTransitionError
   */
  transition(to: ContainerStatus, error?: Error): void
  release(): void
}

interface StatusEntry {
  status: ContainerStatus
  error?: Error
  updatedAt: Date
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const nested of Object.values(value)) {
      deepFreeze(nested)
    }
  }
  return value
}

export class GroupRegistry {
  private groups = new Map<GroupName, GroupDefinition>()
  private containers = new Map<ContainerName, ContainerDefinition>()
  private statuses = new Map<ContainerName, StatusEntry>()
  private leases = new Map<ContainerName, string>()

  /**
   * @throws DuplicateGroupError
   * @throws DuplicateContainerError when a member is registered in another group
   */
  register(group: GroupDefinition): GroupDefinition {
    if (this.groups.has(group.name)) {
      throw new DuplicateGroupError(group.name)
    }
    for (const member of group.members) {
      const existing = this.containers.get(member)
      if (existing && existing.group !== group.name) {
        throw new DuplicateContainerError(member, existing.group ?? '')
      }
    }

    const frozen = deepFreeze(structuredClone(group))
    this.groups.set(group.name, frozen)
    return frozen
  }

  /**
   * Admit a container to a group. Names are global across groups.
   * @throws UnknownGroupError
   * @throws DuplicateContainerError
   * @throws ValidationError when the definition names another group
   */
  addContainer(groupName: GroupName, definition: ContainerDefinition): ContainerDefinition {
    const group = this.groups.get(groupName)
    if (!group) {
      throw new UnknownGroupError(groupName)
    }
    const existing = this.containers.get(definition.name)
    if (existing) {
      throw new DuplicateContainerError(definition.name, existing.group ?? groupName)
    }
    if (definition.group !== undefined && definition.group !== groupName) {
      throw new ValidationError(definition.name, [
        {
          path: 'group',
          message: `Definition names group '${definition.group}' but is added to '${groupName}'`,
        },
      ])
    }
    const owner = this.findGroupListing(definition.name)
    if (owner && owner !== groupName) {
      throw new DuplicateContainerError(definition.name, owner)
    }

    const frozen = deepFreeze(structuredClone({ ...definition, group: groupName }))
    this.containers.set(frozen.name, frozen)
    this.statuses.set(frozen.name, { status: 'undefined', updatedAt: new Date() })

    if (!group.members.includes(frozen.name)) {
      this.replaceGroup({ ...group, members: [...group.members, frozen.name] })
    }
    return frozen
  }

  /**
   * Forget a container and drop it from its group.
   * @throws ContainerNotFoundError
   * @throws ConcurrentOperationError while an operation holds its status
   */
  removeContainer(name: ContainerName): void {
    const definition = this.requireContainer(name)
    const holder = this.leases.get(name)
    if (holder !== undefined) {
      throw new ConcurrentOperationError(name, holder)
    }

    this.containers.delete(name)
    this.statuses.delete(name)

    const group = definition.group ? this.groups.get(definition.group) : undefined
    if (group) {
      const { master, ...rest } = group
      this.replaceGroup({
        ...rest,
        ...(master !== undefined && master !== name ? { master } : {}),
        members: group.members.filter((m) => m !== name),
      })
    }
  }

  /**
   * @throws UnknownGroupError
   * @throws ValidationError when the container is not a member
   */
  setMaster(groupName: GroupName, container: ContainerName): GroupDefinition {
    const group = this.groups.get(groupName)
    if (!group) {
      throw new UnknownGroupError(groupName)
    }
    if (!group.members.includes(container)) {
      throw new ValidationError(groupName, [
        { path: 'master', message: `'${container}' is not a member of the group` },
      ])
    }
    return this.replaceGroup({ ...group, master: container })
  }

  getContainer(name: ContainerName): ContainerDefinition | undefined {
    return this.containers.get(name)
  }

  getGroup(name: GroupName): GroupDefinition | undefined {
    return this.groups.get(name)
  }

  /** Containers in declaration order. */
  listContainers(): ContainerDefinition[] {
    return [...this.containers.values()]
  }

  listGroups(): GroupDefinition[] {
    return [...this.groups.values()]
  }

  /**
   * Snapshot of a container or, failing that, a group. Never blocks.
   * @throws ContainerNotFoundError when neither exists
   */
  status(name: ContainerName | GroupName): ContainerStatusSnapshot | GroupStatusSnapshot {
    if (this.containers.has(name)) {
      return this.containerStatus(name)
    }
    if (this.groups.has(name)) {
      return this.groupStatus(name)
    }
    throw new ContainerNotFoundError(name)
  }

  containerStatus(name: ContainerName): ContainerStatusSnapshot {
    const definition = this.requireContainer(name)
    const entry = this.statuses.get(name) ?? { status: 'undefined', updatedAt: new Date(0) }
    const snapshot: ContainerStatusSnapshot = {
      kind: 'container',
      name,
      group: definition.group ?? '',
      status: entry.status,
      updatedAt: entry.updatedAt,
    }
    if (entry.error) snapshot.error = entry.error
    return snapshot
  }

  groupStatus(name: GroupName): GroupStatusSnapshot {
    const group = this.groups.get(name)
    if (!group) {
      throw new UnknownGroupError(name)
    }
    const snapshot: GroupStatusSnapshot = {
      kind: 'group',
      name,
      members: group.members
        .filter((member) => this.containers.has(member))
        .map((member) => this.containerStatus(member)),
    }
    if (group.master !== undefined) snapshot.master = group.master
    return snapshot
  }

  /**
   * Take the single-writer lease for a container's status.
   * @throws ContainerNotFoundError
   * @throws ConcurrentOperationError when another operation holds it
   */
  acquire(name: ContainerName, owner: string): StatusLease {
    this.requireContainer(name)
    const holder = this.leases.get(name)
    if (holder !== undefined) {
      throw new ConcurrentOperationError(name, holder)
    }
    this.leases.set(name, owner)

    let released = false
    const current = () => this.statuses.get(name)?.status ?? 'undefined'

    return {
      name,
      owner,
      get status() {
        return current()
      },
      transition: (to, error) => {
        if (released || this.leases.get(name) !== owner) {
          throw new ConcurrentOperationError(name, this.leases.get(name) ?? 'none')
        }
        const from = current()
        if (!canTransition(from, to)) {
          throw new InvalidTransitionError(name, from, to)
        }
        const entry: StatusEntry = { status: to, updatedAt: new Date() }
        if (to === 'failed' && error) entry.error = error
        this.statuses.set(name, entry)
      },
      release: () => {
        if (!released && this.leases.get(name) === owner) {
          this.leases.delete(name)
        }
        released = true
      },
    }
  }

  /**
   * Set a status observed in the runtime, outside the state machine.
   * Only for reconciling a fresh registry with existing containers.
   */
  restoreStatus(name: ContainerName, status: ContainerStatus): void {
    this.requireContainer(name)
    const holder = this.leases.get(name)
    if (holder !== undefined) {
      throw new ConcurrentOperationError(name, holder)
    }
    this.statuses.set(name, { status, updatedAt: new Date() })
  }

  private requireContainer(name: ContainerName): ContainerDefinition {
    const definition = this.containers.get(name)
    if (!definition) {
      throw new ContainerNotFoundError(name)
    }
    return definition
  }

  private findGroupListing(name: ContainerName): GroupName | undefined {
    for (const group of this.groups.values()) {
      if (group.members.includes(name)) return group.name
    }
    return undefined
  }

  private replaceGroup(group: GroupDefinition): GroupDefinition {
    const frozen = deepFreeze(structuredClone(group))
    this.groups.set(group.name, frozen)
    return frozen
  }
}
