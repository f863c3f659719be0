/**
 * Dependency Graph
 *
 * Derives start-order edges from container definitions and groups:
 * - `net`: a container joining another's network namespace
 * - `depends_on`: explicit ordering
 * - `master`: every member of a group starts after the group's master
 *
 * The order is computed with Kahn's algorithm. Among containers whose
 * dependencies are all placed, the one declared first goes next, so the
 * order is stable for a given registry.
 */

import {
  type ContainerDefinition,
  type ContainerName,
  CycleError,
  type GroupDefinition,
  type GroupName,
  UnresolvedDependencyError,
} from '@berth/core'

export type EdgeKind = 'net' | 'depends_on' | 'master'

/**
 * `dependent` starts after `dependency` and stops before it.
 */
export interface DependencyEdge {
  dependent: ContainerName
  dependency: ContainerName
  via: EdgeKind
}

export interface BuildGraphOptions {
  /**
   * Groups whose member lists must fully resolve. Defaults to every group.
   * Unresolved members of other groups do not block the build.
   */
  scope?: readonly GroupName[]
}

export class DependencyGraph {
  /** Start order: every dependency precedes its dependents. */
  readonly startOrder: readonly ContainerName[]
  readonly edges: readonly DependencyEdge[]

  private position: Map<ContainerName, number>
  private dependencies: Map<ContainerName, Set<ContainerName>>
  private dependents: Map<ContainerName, Set<ContainerName>>

  constructor(startOrder: ContainerName[], edges: DependencyEdge[]) {
    this.startOrder = startOrder
    this.edges = edges
    this.position = new Map(startOrder.map((name, index) => [name, index]))
    this.dependencies = new Map(startOrder.map((name) => [name, new Set()]))
    this.dependents = new Map(startOrder.map((name) => [name, new Set()]))
    for (const edge of edges) {
      this.dependencies.get(edge.dependent)?.add(edge.dependency)
      this.dependents.get(edge.dependency)?.add(edge.dependent)
    }
  }

  /** Exact reverse of the start order. */
  get stopOrder(): ContainerName[] {
    return [...this.startOrder].reverse()
  }

  has(name: ContainerName): boolean {
    return this.position.has(name)
  }

  /** Start order restricted to `names`. */
  scopedStartOrder(names: Iterable<ContainerName>): ContainerName[] {
    return this.sortByOrder(names)
  }

  /** Stop order restricted to `names`. */
  scopedStopOrder(names: Iterable<ContainerName>): ContainerName[] {
    return this.sortByOrder(names).reverse()
  }

  /** Direct dependencies, in start order. */
  dependenciesOf(name: ContainerName): ContainerName[] {
    return this.sortByOrder(this.dependencies.get(name) ?? [])
  }

  /** Direct dependents, in start order. */
  dependentsOf(name: ContainerName): ContainerName[] {
    return this.sortByOrder(this.dependents.get(name) ?? [])
  }

  /** Everything that (directly or not) depends on `name`, in start order. */
  transitiveDependents(name: ContainerName): ContainerName[] {
    return this.sortByOrder(this.walk(name, this.dependents))
  }

  /** Everything `name` (directly or not) depends on, in start order. */
  transitiveDependencies(name: ContainerName): ContainerName[] {
    return this.sortByOrder(this.walk(name, this.dependencies))
  }

  private walk(
    start: ContainerName,
    adjacency: Map<ContainerName, Set<ContainerName>>,
  ): Set<ContainerName> {
    const seen = new Set<ContainerName>()
    const stack = [...(adjacency.get(start) ?? [])]
    while (stack.length > 0) {
      const next = stack.pop()
      if (next === undefined || seen.has(next)) continue
      seen.add(next)
      stack.push(...(adjacency.get(next) ?? []))
    }
    return seen
  }

  private sortByOrder(names: Iterable<ContainerName>): ContainerName[] {
    return [...new Set(names)]
      .filter((name) => this.position.has(name))
      .sort((a, b) => (this.position.get(a) ?? 0) - (this.position.get(b) ?? 0))
  }
}

/**
 * Derive edges; fails on references to unregistered containers.
 */
export function deriveEdges(
  containers: readonly ContainerDefinition[],
  groups: readonly GroupDefinition[],
  options: BuildGraphOptions = {},
): DependencyEdge[] {
  const registered = new Set(containers.map((c) => c.name))
  const edges: DependencyEdge[] = []
  const seen = new Set<string>()

  const add = (dependent: ContainerName, dependency: ContainerName, via: EdgeKind) => {
    const key = `${dependent}\u0000${dependency}`
    if (seen.has(key)) return
    seen.add(key)
    edges.push({ dependent, dependency, via })
  }

  for (const container of containers) {
    if (container.net !== undefined) {
      if (!registered.has(container.net)) {
        throw new UnresolvedDependencyError(container.name, container.net, 'net')
      }
      add(container.name, container.net, 'net')
    }
    for (const dependency of container.dependsOn) {
      if (!registered.has(dependency)) {
        throw new UnresolvedDependencyError(container.name, dependency, 'depends_on')
      }
      add(container.name, dependency, 'depends_on')
    }
  }

  const scope = options.scope ? new Set(options.scope) : undefined
  for (const group of groups) {
    if (!scope || scope.has(group.name)) {
      for (const member of group.members) {
        if (!registered.has(member)) {
          throw new UnresolvedDependencyError(group.name, member, 'member')
        }
      }
    }

    const master = group.master
    if (master === undefined || !registered.has(master)) continue
    for (const member of group.members) {
      if (member !== master && registered.has(member)) {
        add(member, master, 'master')
      }
    }
  }

  return edges
}

/**
 * Find one cycle. `adjacency` maps a container to its dependencies, so in
 * the result every entry depends on the next.
 */
function findCycle(
  names: readonly ContainerName[],
  adjacency: Map<ContainerName, ContainerName[]>,
): ContainerName[] {
  const visited = new Set<ContainerName>()
  const inStack = new Set<ContainerName>()
  const path: ContainerName[] = []

  const visit = (node: ContainerName): ContainerName[] | null => {
    visited.add(node)
    inStack.add(node)
    path.push(node)

    for (const neighbor of adjacency.get(node) ?? []) {
      if (!visited.has(neighbor)) {
        const result = visit(neighbor)
        if (result) return result
      } else if (inStack.has(neighbor)) {
        return path.slice(path.indexOf(neighbor))
      }
    }

    inStack.delete(node)
    path.pop()
    return null
  }

  for (const name of names) {
    if (visited.has(name)) continue
    const result = visit(name)
    if (result) return result
  }
  return []
}

/**
 * Build the dependency graph over all registered containers, in
 * declaration order.
 * @throws UnresolvedDependencyError
 * @throws CycleError
 */
export function buildDependencyGraph(
  containers: readonly ContainerDefinition[],
  groups: readonly GroupDefinition[] = [],
  options: BuildGraphOptions = {},
): DependencyGraph {
  const names = containers.map((c) => c.name)
  const declared = new Map(names.map((name, index) => [name, index]))
  const edges = deriveEdges(containers, groups, options)

  // dependency -> dependents, for Kahn
  const downstream = new Map<ContainerName, ContainerName[]>(names.map((n) => [n, []]))
  // dependent -> dependencies, for cycle reporting
  const upstream = new Map<ContainerName, ContainerName[]>(names.map((n) => [n, []]))
  const inDegree = new Map<ContainerName, number>(names.map((n) => [n, 0]))

  for (const edge of edges) {
    downstream.get(edge.dependency)?.push(edge.dependent)
    upstream.get(edge.dependent)?.push(edge.dependency)
    inDegree.set(edge.dependent, (inDegree.get(edge.dependent) ?? 0) + 1)
  }

  const byDeclaration = (a: ContainerName, b: ContainerName) =>
    (declared.get(a) ?? 0) - (declared.get(b) ?? 0)

  const available = names.filter((name) => inDegree.get(name) === 0)
  const order: ContainerName[] = []
  while (available.length > 0) {
    available.sort(byDeclaration)
    const next = available.shift()
    if (next === undefined) break
    order.push(next)

    for (const dependent of downstream.get(next) ?? []) {
      const remaining = (inDegree.get(dependent) ?? 0) - 1
      inDegree.set(dependent, remaining)
      if (remaining === 0) available.push(dependent)
    }
  }

  if (order.length !== names.length) {
    const placed = new Set(order)
    const cycle = findCycle(
      names.filter((n) => !placed.has(n)),
      upstream,
    )
    throw new CycleError(cycle.length > 0 ? cycle : names.filter((n) => !placed.has(n)))
  }

  return new DependencyGraph(order, edges)
}
