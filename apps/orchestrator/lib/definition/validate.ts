/**
 * Definition validation
 *
 * Turns raw (parsed YAML) documents into closed, immutable-ready
 * definitions. Schema errors, mutual exclusions and missing network
 * configuration all surface as a ValidationError naming the field.
 */

import {
  type ContainerDefaults,
  type ContainerDefinition,
  type ContainerDraft,
  type GroupDefinition,
  ValidationError,
  safeParseContainerDefinition,
  safeParseGroupDefinition,
} from '@berth/core'

export type DefinitionKind = 'container' | 'group'

export interface ValidateOptions {
  /** Defaults of the owning group. */
  defaults?: ContainerDefaults

  /**
   * Network for containers that end up with neither `net` nor `network`.
   * When unset such a container is rejected.
   */
  defaultNetwork?: string
}

function nameOf(raw: unknown): string {
  if (typeof raw === 'object' && raw !== null && 'name' in raw && typeof raw.name === 'string') {
    return raw.name
  }
  return '<unnamed>'
}

/**
 * Apply group defaults to a draft. Explicit values always win: collections
 * are replaced wholesale, scalars only fill unset fields. A default network
 * never applies to a container joining another's namespace.
 */
export function mergeDefaults(draft: ContainerDraft, defaults: ContainerDefaults): ContainerDraft {
  return {
    ...draft,
    capAdd: draft.capAdd ?? defaults.capAdd,
    capDrop: draft.capDrop ?? defaults.capDrop,
    devices: draft.devices ?? defaults.devices,
    dns: draft.dns ?? defaults.dns,
    environment: draft.environment ?? defaults.environment,
    mounts: draft.mounts ?? defaults.mounts,
    tmpfs: draft.tmpfs ?? defaults.tmpfs,
    ports: draft.ports ?? defaults.ports,
    restart: draft.restart ?? defaults.restart,
    network: draft.net !== undefined ? draft.network : (draft.network ?? defaults.network),
  }
}

/**
 * Fill remaining unset fields and check the network invariant.
 */
export function finalize(draft: ContainerDraft, defaultNetwork?: string): ContainerDefinition {
  let network = draft.network
  if (draft.net === undefined && network === undefined) {
    if (!defaultNetwork) {
      throw new ValidationError(draft.name, [
        {
          path: 'network',
          message: "One of 'net' or 'network' is required when no default network is configured",
        },
      ])
    }
    network = defaultNetwork
  }

  return {
    name: draft.name,
    group: draft.group,
    image: draft.image,
    args: draft.args ?? [],
    capAdd: draft.capAdd ?? [],
    capDrop: draft.capDrop ?? [],
    devices: draft.devices ?? [],
    dns: draft.dns ?? [],
    environment: draft.environment ?? {},
    mounts: draft.mounts ?? [],
    tmpfs: draft.tmpfs ?? [],
    ports: draft.ports ?? [],
    restart: draft.restart ?? { name: 'always' },
    net: draft.net,
    network,
    dependsOn: draft.dependsOn ?? [],
  }
}

export function validateContainer(raw: unknown, options: ValidateOptions = {}): ContainerDefinition {
  const result = safeParseContainerDefinition(raw)
  if (!result.success) {
    throw new ValidationError(nameOf(raw), result.errors)
  }
  const draft = options.defaults ? mergeDefaults(result.data, options.defaults) : result.data
  return finalize(draft, options.defaultNetwork)
}

export function validateGroup(raw: unknown): GroupDefinition {
  const result = safeParseGroupDefinition(raw)
  if (!result.success) {
    throw new ValidationError(nameOf(raw), result.errors)
  }
  return result.data
}

export function validateDefinition(
  kind: 'container',
  raw: unknown,
  options?: ValidateOptions,
): ContainerDefinition
export function validateDefinition(kind: 'group', raw: unknown): GroupDefinition
export function validateDefinition(
  kind: DefinitionKind,
  raw: unknown,
  options?: ValidateOptions,
): ContainerDefinition | GroupDefinition {
  return kind === 'container' ? validateContainer(raw, options) : validateGroup(raw)
}
