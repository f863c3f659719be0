import { z } from 'zod'
import { snakeToCamelKeys } from '../case-convert'
import type {
  ContainerDefinition,
  ContainerDraft,
  GroupDefinition,
  ImageSource,
  PulledImage,
} from '../types'
import {
  formatDevice,
  formatMount,
  formatPort,
  formatRestart,
  formatTmpfs,
  parseDevice,
  parseEnvironmentList,
  parseMount,
  parsePort,
  parseRestart,
  parseTmpfs,
} from './options'

/**
 * Wrap a throwing string parser as a zod transform that reports a custom issue
 */
function parsed<I, T>(parse: (value: I) => T) {
  return (value: I, ctx: z.RefinementCtx): T => {
    try {
      return parse(value)
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      })
      return z.NEVER
    }
  }
}

/**
 * YAML writes an empty key (`net:`) as null; treat it as absent.
 */
export function dropNullKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value
  }
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== null))
}

// Container and group names double as Docker container names
const namePattern = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/
export const containerName = z
  .string()
  .regex(namePattern, 'Must start with a letter or digit and contain only [a-zA-Z0-9_.-]')
export const groupName = containerName

const stringList = z.array(z.string().min(1))

export const mountSchema = z.string().transform(parsed(parseMount))
export const portSchema = z
  .union([z.string(), z.number().int()])
  .transform(parsed((value) => parsePort(typeof value === 'number' ? `${value}:${value}` : value)))
export const deviceSchema = z.string().transform(parsed(parseDevice))
export const tmpfsSchema = z.string().transform(parsed(parseTmpfs))
export const restartSchema = z.string().transform(parsed(parseRestart))

/**
 * Environment as a KEY=value list or as a mapping. Scalar mapping values are
 * stringified (YAML reads `PUID: 1000` as a number).
 */
export const environmentSchema = z
  .union([
    z.array(z.string()),
    z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])),
  ])
  .transform(
    parsed((value): Record<string, string> => {
      if (Array.isArray(value)) return parseEnvironmentList(value)
      return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, String(v)]))
    }),
  )

/**
 * Image arguments as a list, or as one string split on whitespace
 */
export const imageArgsSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : value.split(/\s+/).filter(Boolean)))

const defaultsShape = {
  cap_add: stringList.optional().describe('Linux capabilities to add'),
  cap_drop: stringList.optional().describe('Linux capabilities to drop'),
  devices: z.array(deviceSchema).optional().describe('Host devices (host[:container[:perms]])'),
  dns: stringList.optional().describe('DNS servers'),
  environment: environmentSchema.optional().describe('Environment variables'),
  mounts: z.array(mountSchema).optional().describe('Bind mounts (host:container[:ro|rw])'),
  tmpfs: z.array(tmpfsSchema).optional().describe('Tmpfs mounts (path[:options])'),
  ports: z.array(portSchema).optional().describe('Published ports ([ip:]host:container[/proto])'),
  restart: restartSchema.optional().describe('Restart policy (default "always")'),
  network: z.string().min(1).optional().describe('Named runtime network'),
}

/**
 * Group-scoped container defaults. Same keys and forms as a container file.
 */
export const containerDefaultsSchema = z
  .object(defaultsShape)
  .strict()
  .transform((raw) => snakeToCamelKeys(raw))

const containerDocumentSchema = z
  .object({
    name: containerName.describe('Unique container name'),
    group: groupName.optional().describe('Owning group'),

    // Image source: either a pulled image or a local build
    image: z.string().min(1).optional().describe('Image reference to pull'),
    image_args: imageArgsSchema.optional().describe('Arguments passed after the image'),
    image_insecure: z.boolean().optional().describe('Registry is served over plain HTTP'),
    image_username: z.string().min(1).optional().describe('Registry username'),
    image_password: z.string().min(1).optional().describe('Registry password'),
    image_build_path: z.string().min(1).optional().describe('Directory holding the Dockerfile'),
    image_build_squash: z.boolean().optional().describe('Squash built layers'),
    tag: z.string().min(1).optional().describe('Tag of the built image'),

    ...defaultsShape,

    net: containerName.optional().describe('Container whose network namespace to join'),
    depends_on: z.array(containerName).optional().describe('Explicit start-order dependencies'),
  })
  .strict()

type ContainerDocumentInput = z.infer<typeof containerDocumentSchema>

type IssueReporter = (path: (string | number)[], message: string) => void

function imageSource(raw: ContainerDocumentInput, report: IssueReporter): ImageSource | null {
  const issue = (path: string, message: string) => report([path], message)

  if (raw.image !== undefined && raw.image_build_path !== undefined) {
    issue('image_build_path', "Mutually exclusive with 'image'")
    return null
  }

  if (raw.image_build_path !== undefined) {
    for (const key of ['image_insecure', 'image_username', 'image_password'] as const) {
      if (raw[key] !== undefined) issue(key, "Only valid with 'image'")
    }
    if (raw.tag === undefined) {
      issue('tag', "Required with 'image_build_path'")
      return null
    }
    return {
      kind: 'build',
      buildPath: raw.image_build_path,
      tag: raw.tag,
      squash: raw.image_build_squash ?? false,
    }
  }

  if (raw.image === undefined) {
    issue('image', "One of 'image' or 'image_build_path' is required")
    return null
  }
  if (raw.tag !== undefined) issue('tag', "Only valid with 'image_build_path'")
  if (raw.image_build_squash !== undefined) {
    issue('image_build_squash', "Only valid with 'image_build_path'")
  }
  if (raw.image_username !== undefined && raw.image_password === undefined) {
    issue('image_password', "Required with 'image_username'")
  }
  if (raw.image_password !== undefined && raw.image_username === undefined) {
    issue('image_username', "Required with 'image_password'")
  }

  const source: PulledImage = {
    kind: 'pull',
    reference: raw.image,
    insecure: raw.image_insecure ?? false,
  }
  if (raw.image_username !== undefined) source.username = raw.image_username
  if (raw.image_password !== undefined) source.password = raw.image_password
  return source
}

/**
 * Container definition schema.
 * Accepts the snake_case document and yields a camelCase ContainerDraft;
 * unset fields stay unset so group defaults can be merged afterwards.
 */
export const containerDefinitionSchema = z.preprocess(
  dropNullKeys,
  containerDocumentSchema.transform((raw, ctx): ContainerDraft => {
    let valid = true
    const report: IssueReporter = (path, message) => {
      valid = false
      ctx.addIssue({ code: z.ZodIssueCode.custom, path, message })
    }

    const image = imageSource(raw, report)
    if (raw.net !== undefined && raw.network !== undefined) {
      report(['network'], "Mutually exclusive with 'net'")
    }
    if (raw.net === raw.name) {
      report(['net'], 'A container cannot join its own network namespace')
    }
    const selfIndex = raw.depends_on?.indexOf(raw.name) ?? -1
    if (selfIndex !== -1) {
      report(['depends_on', selfIndex], 'A container cannot depend on itself')
    }

    if (image === null || !valid) {
      return z.NEVER
    }

    const {
      image: _image,
      image_args,
      image_insecure: _insecure,
      image_username: _username,
      image_password: _password,
      image_build_path: _buildPath,
      image_build_squash: _squash,
      tag: _tag,
      depends_on,
      ...rest
    } = raw

    return {
      ...snakeToCamelKeys(rest),
      image,
      args: image_args,
      dependsOn: depends_on,
    }
  }),
)

/**
 * Group definition schema. `master` must be one of `members`.
 */
export const groupDefinitionSchema = z.preprocess(
  dropNullKeys,
  z
    .object({
      name: groupName.describe('Unique group name'),
      members: z.array(containerName).default([]).describe('Member containers, in order'),
      master: containerName.optional().describe('Member every other member starts after'),
      defaults: containerDefaultsSchema.optional().describe('Defaults applied to members'),
    })
    .strict()
    .superRefine((group, ctx) => {
      const seen = new Set<string>()
      group.members.forEach((member, index) => {
        if (seen.has(member)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['members', index],
            message: `Duplicate member '${member}'`,
          })
        }
        seen.add(member)
      })
      if (group.master !== undefined && !seen.has(group.master)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['master'],
          message: `Master '${group.master}' is not a member of the group`,
        })
      }
    }),
)

// =============================================================================
// Validation utilities
// =============================================================================

export interface SchemaIssue {
  path: string
  message: string
}

/**
 * Parse result type
 */
export type ParseResult<T> = { success: true; data: T } | { success: false; errors: SchemaIssue[] }

function toIssues(error: z.ZodError): SchemaIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.') || '/',
    message: issue.message,
  }))
}

/**
 * Safely parse a container document, returning result with errors
 */
export function safeParseContainerDefinition(data: unknown): ParseResult<ContainerDraft> {
  const result = containerDefinitionSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }
  return { success: false, errors: toIssues(result.error) }
}

/**
 * Safely parse a group document, returning result with errors
 */
export function safeParseGroupDefinition(data: unknown): ParseResult<GroupDefinition> {
  const result = groupDefinitionSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }
  return { success: false, errors: toIssues(result.error) }
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * snake_case document form of a container definition, as written to YAML
 */
export interface ContainerDocument {
  name: string
  group?: string
  image?: string
  image_args?: string[]
  image_insecure?: boolean
  image_username?: string
  image_password?: string
  image_build_path?: string
  image_build_squash?: boolean
  tag?: string
  cap_add?: string[]
  cap_drop?: string[]
  devices?: string[]
  dns?: string[]
  environment?: Record<string, string>
  mounts?: string[]
  tmpfs?: string[]
  ports?: string[]
  restart?: string
  net?: string
  network?: string
  depends_on?: string[]
}

/**
 * Convert a definition back to its document form. Empty collections are omitted.
 */
export function toContainerDocument(definition: ContainerDefinition): ContainerDocument {
  const { image } = definition
  const doc: ContainerDocument = { name: definition.name }
  if (definition.group) doc.group = definition.group

  if (image.kind === 'pull') {
    doc.image = image.reference
    if (image.insecure) doc.image_insecure = true
    if (image.username !== undefined) doc.image_username = image.username
    if (image.password !== undefined) doc.image_password = image.password
  } else {
    doc.image_build_path = image.buildPath
    doc.tag = image.tag
    if (image.squash) doc.image_build_squash = true
  }

  if (definition.args.length > 0) doc.image_args = definition.args
  if (definition.capAdd.length > 0) doc.cap_add = definition.capAdd
  if (definition.capDrop.length > 0) doc.cap_drop = definition.capDrop
  if (definition.devices.length > 0) doc.devices = definition.devices.map(formatDevice)
  if (definition.dns.length > 0) doc.dns = definition.dns
  if (Object.keys(definition.environment).length > 0) doc.environment = definition.environment
  if (definition.mounts.length > 0) doc.mounts = definition.mounts.map(formatMount)
  if (definition.tmpfs.length > 0) doc.tmpfs = definition.tmpfs.map(formatTmpfs)
  if (definition.ports.length > 0) doc.ports = definition.ports.map(formatPort)
  doc.restart = formatRestart(definition.restart)
  if (definition.net) doc.net = definition.net
  if (definition.network) doc.network = definition.network
  if (definition.dependsOn.length > 0) doc.depends_on = definition.dependsOn
  return doc
}
