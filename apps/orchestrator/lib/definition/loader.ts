import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from 'node:fs'
import { basename, join } from 'node:path'
import {
  type ContainerDefinition,
  ContainerNotFoundError,
  DuplicateContainerError,
  DuplicateGroupError,
  type GroupDefinition,
  UnknownGroupError,
  ValidationError,
  isImageTag,
  toContainerDocument,
  withImageTag,
} from '@berth/core'
import {
  YAMLParseError,
  parseDocument,
  parse as parseYaml,
  stringify as stringifyYaml,
} from 'yaml'
import { validateContainer, validateGroup } from './validate'

type Env = Record<string, string | undefined>

/** groups.yaml as written on disk: group name → group body */
type GroupsDocument = Record<string, Record<string, unknown>>

export interface DefinitionStoreOptions {
  /** Network for containers that set neither `net` nor `network`. */
  defaultNetwork?: string

  /** Variables for ${VAR} interpolation. */
  env?: Env
}

export interface LoadResult {
  /** Valid groups, in groups.yaml order. */
  groups: GroupDefinition[]

  /** Valid containers, in file name order. */
  containers: ContainerDefinition[]

  /** One entry per rejected definition; valid ones still load. */
  errors: ValidationError[]
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Interpolate environment variables in a string
 * Supports ${VAR} syntax, only replaces if the variable is set
 */
export function interpolateEnvVars(content: string, env: Env): string {
  return content.replace(/\$\{([^}]+)\}/g, (match, varName: string) => {
    const value = env[varName]
    return value === undefined ? match : value
  })
}

/**
 * Definition store
 *
 * Layout of the configuration directory:
 *
 *   groups.yaml            group name → { master, members, defaults }
 *   containers/<name>.yaml one container document per file
 *
 * Reads interpolate ${VAR}; writes keep the uninterpolated text so secrets
 * passed through the environment never land on disk.
 */
export class DefinitionStore {
  private defaultNetwork?: string
  private env: Env

  constructor(
    readonly configDir: string,
    options: DefinitionStoreOptions = {},
  ) {
    this.defaultNetwork = options.defaultNetwork
    this.env = options.env ?? process.env
  }

  get groupsFile(): string {
    return join(this.configDir, 'groups.yaml')
  }

  get containersDir(): string {
    return join(this.configDir, 'containers')
  }

  containerFile(name: string): string {
    return join(this.containersDir, `${name}.yaml`)
  }

  /**
   * Load every group and container definition.
   * A container naming a group it is not listed in is appended to the
   * group's members.
   */
  load(): LoadResult {
    const errors: ValidationError[] = []
    let groups: Map<string, GroupDefinition>
    try {
      groups = this.loadGroups(errors)
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err
      errors.push(err)
      groups = new Map()
    }

    const containers: ContainerDefinition[] = []
    for (const file of this.listContainerFiles()) {
      try {
        containers.push(this.loadContainerFile(file, groups))
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err
        errors.push(err)
      }
    }

    for (const container of containers) {
      const group = container.group ? groups.get(container.group) : undefined
      if (group && !group.members.includes(container.name)) {
        group.members.push(container.name)
      }
    }

    return { groups: [...groups.values()], containers, errors }
  }

  /**
   * Add a group to groups.yaml.
   */
  defineGroup(raw: unknown): GroupDefinition {
    const group = validateGroup(raw)
    const doc = this.readGroupsDocument(false)
    if (group.name in doc) {
      throw new DuplicateGroupError(group.name)
    }

    const body: Record<string, unknown> = {}
    if (isRecord(raw)) {
      for (const [key, value] of Object.entries(raw)) {
        if (key !== 'name') body[key] = value
      }
    }
    doc[group.name] = body
    this.writeGroupsDocument(doc)
    return group
  }

  /**
   * Validate a container file, copy it into the store and append the
   * container to its group's members.
   */
  defineContainer(file: string): ContainerDefinition {
    const groups = this.loadGroups([])
    const definition = this.loadContainerFile(file, groups)
    const groupName = definition.group ?? ''
    if (!groups.has(groupName)) {
      throw new UnknownGroupError(groupName)
    }

    const target = this.containerFile(definition.name)
    if (existsSync(target)) {
      const existing = parseYaml(readFileSync(target, 'utf-8'))
      const existingGroup =
        isRecord(existing) && typeof existing.group === 'string' ? existing.group : groupName
      throw new DuplicateContainerError(definition.name, existingGroup)
    }
    for (const group of groups.values()) {
      if (group.name !== groupName && group.members.includes(definition.name)) {
        throw new DuplicateContainerError(definition.name, group.name)
      }
    }

    mkdirSync(this.containersDir, { recursive: true })
    writeFileSync(target, readFileSync(file, 'utf-8'), 'utf-8')

    const doc = this.readGroupsDocument(false)
    const body = doc[groupName] ?? {}
    const members = this.membersOf(body)
    if (!members.includes(definition.name)) {
      body.members = [...members, definition.name]
      doc[groupName] = body
      this.writeGroupsDocument(doc)
    }

    return definition
  }

  /**
   * Make a member the group's master.
   */
  setMaster(groupName: string, container: string): GroupDefinition {
    const doc = this.readGroupsDocument(false)
    const body = doc[groupName]
    if (!body) {
      throw new UnknownGroupError(groupName)
    }
    if (!this.membersOf(body).includes(container)) {
      throw new ValidationError(groupName, [
        { path: 'master', message: `'${container}' is not a member of the group` },
      ])
    }

    body.master = container
    const group = validateGroup({ ...body, name: groupName })
    this.writeGroupsDocument(doc)
    return group
  }

  /**
   * Delete a container file and drop the container from every group.
   */
  removeContainer(name: string): void {
    const file = this.containerFile(name)
    if (!existsSync(file)) {
      throw new ContainerNotFoundError(name)
    }

    const doc = this.readGroupsDocument(false)
    let changed = false
    for (const body of Object.values(doc)) {
      const members = this.membersOf(body)
      if (members.includes(name)) {
        body.members = members.filter((m) => m !== name)
        changed = true
      }
      if (body.master === name) {
        delete body.master
        changed = true
      }
    }

    unlinkSync(file)
    if (changed) this.writeGroupsDocument(doc)
  }

  /**
   * Set the image tag of a container, on the pulled reference or on the
   * built image's tag. The rest of the file, comments included, is kept.
   */
  setTag(name: string, tag: string): ContainerDefinition {
    const file = this.containerFile(name)
    if (!existsSync(file)) {
      throw new ContainerNotFoundError(name)
    }
    if (!isImageTag(tag)) {
      throw new ValidationError(name, [
        { path: 'tag', message: `'${tag}' is not a valid image tag` },
      ])
    }

    const doc = parseDocument(readFileSync(file, 'utf-8'))
    if (doc.errors.length > 0) {
      throw new ValidationError(basename(file), [{ path: '/', message: doc.errors[0].message }])
    }
    const image = doc.get('image')
    const built = doc.get('tag')
    if (typeof image === 'string') {
      doc.set('image', withImageTag(image, tag))
    } else if (typeof built === 'string') {
      doc.set('tag', withImageTag(built, tag))
    } else {
      throw new ValidationError(name, [{ path: 'image', message: 'No image reference to tag' }])
    }

    const content = doc.toString()
    const raw = parseYaml(interpolateEnvVars(content, this.env))
    const definition = this.toDefinition(raw, this.loadGroups([]))
    writeFileSync(file, content, 'utf-8')
    return definition
  }

  /**
   * Render the normalized definition of a container as YAML, optionally
   * writing it to a file.
   */
  dump(name: string, output?: string): string {
    const file = this.containerFile(name)
    if (!existsSync(file)) {
      throw new ContainerNotFoundError(name)
    }

    const definition = this.loadContainerFile(file, this.loadGroups([]))
    const content = stringifyYaml(toContainerDocument(definition), { indent: 2 })
    if (output) {
      writeFileSync(output, content, 'utf-8')
    }
    return content
  }

  private loadGroups(errors: ValidationError[]): Map<string, GroupDefinition> {
    const groups = new Map<string, GroupDefinition>()
    for (const [name, body] of Object.entries(this.readGroupsDocument(true))) {
      try {
        groups.set(name, validateGroup({ ...body, name }))
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err
        errors.push(err)
      }
    }
    return groups
  }

  private loadContainerFile(
    file: string,
    groups: Map<string, GroupDefinition>,
  ): ContainerDefinition {
    return this.toDefinition(this.readYaml(file, true), groups)
  }

  private toDefinition(raw: unknown, groups: Map<string, GroupDefinition>): ContainerDefinition {
    const group = isRecord(raw) && typeof raw.group === 'string' ? groups.get(raw.group) : undefined

    const definition = validateContainer(raw, {
      defaults: group?.defaults,
      defaultNetwork: this.defaultNetwork,
    })
    if (definition.group === undefined) {
      throw new ValidationError(definition.name, [
        { path: 'group', message: 'Every container must belong to a group' },
      ])
    }
    return definition
  }

  private listContainerFiles(): string[] {
    let files: string[]
    try {
      files = readdirSync(this.containersDir)
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return []
      }
      throw error
    }

    return files
      .filter((file) => file.endsWith('.yaml') || file.endsWith('.yml'))
      .sort()
      .map((file) => join(this.containersDir, file))
      .filter((path) => statSync(path).isFile())
  }

  /**
   * @throws ValidationError when the file is not well-formed YAML
   */
  private readYaml(file: string, interpolate: boolean): unknown {
    const content = readFileSync(file, 'utf-8')
    try {
      return parseYaml(interpolate ? interpolateEnvVars(content, this.env) : content)
    } catch (err) {
      if (!(err instanceof YAMLParseError)) throw err
      const [summary = err.message] = err.message.split('\n')
      throw new ValidationError(basename(file), [{ path: '/', message: summary }])
    }
  }

  private readGroupsDocument(interpolate: boolean): GroupsDocument {
    if (!existsSync(this.groupsFile)) return {}

    const raw = this.readYaml(this.groupsFile, interpolate)
    if (raw === null || raw === undefined) return {}
    if (!isRecord(raw)) {
      throw new ValidationError('groups.yaml', [
        { path: '/', message: 'Expected a mapping of group name to group definition' },
      ])
    }

    const doc: GroupsDocument = {}
    for (const [name, body] of Object.entries(raw)) {
      if (body === null) {
        doc[name] = {}
      } else if (isRecord(body)) {
        doc[name] = body
      } else {
        throw new ValidationError(name, [{ path: '/', message: 'Expected a mapping' }])
      }
    }
    return doc
  }

  private writeGroupsDocument(doc: GroupsDocument): void {
    mkdirSync(this.configDir, { recursive: true })
    writeFileSync(this.groupsFile, stringifyYaml(doc, { indent: 2 }), 'utf-8')
  }

  private membersOf(body: Record<string, unknown>): string[] {
    const members = body.members
    if (!Array.isArray(members)) return []
    return members.filter((member): member is string => typeof member === 'string')
  }
}
