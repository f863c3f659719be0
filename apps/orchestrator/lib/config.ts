import { resolve } from 'node:path'

/**
 * Orchestrator process configuration, read from the environment.
 */
export interface OrchestratorConfig {
  /** Directory holding groups.yaml and containers/*.yaml */
  configDir: string

  docker: DockerConnection

  /**
   * Network given to containers that set neither `net` nor `network`.
   * Empty string disables the fallback.
   */
  defaultNetwork: string

  readyTimeoutMs: number
  readyPollMs: number
  dependencyTimeoutMs: number
  stopTimeoutSeconds: number

  retry: {
    maxAttempts: number
    baseDelayMs: number
    maxDelayMs: number
  }

  /** Containers started concurrently across independent chains. */
  maxConcurrent: number

  logLevel: string
  labelPrefix: string
}

export type DockerConnection = { socketPath: string } | { host: string; port: number }

type Env = Record<string, string | undefined>

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key]
  if (value === undefined) return defaultValue
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? defaultValue : parsed
}

function getEnvString(env: Env, key: string, defaultValue: string): string {
  return env[key] ?? defaultValue
}

function getEnvPath(env: Env, key: string, defaultValue: string): string {
  const value = env[key] ?? defaultValue
  // Resolve relative paths from current working directory
  return value.startsWith('/') ? value : resolve(process.cwd(), value)
}

/**
 * Parse a DOCKER_HOST value.
 * @example 'unix:///var/run/docker.sock'
 * @example 'tcp://192.168.1.100:2375'
 */
export function parseDockerHost(value: string): DockerConnection {
  if (value.startsWith('unix://')) {
    return { socketPath: value.slice('unix://'.length) }
  }
  if (value.startsWith('tcp://')) {
    const url = new URL(value)
    return { host: url.hostname, port: url.port ? Number.parseInt(url.port, 10) : 2375 }
  }
  if (value.startsWith('/')) {
    return { socketPath: value }
  }
  throw new Error(`Unsupported DOCKER_HOST '${value}': expected unix://, tcp:// or a socket path`)
}

export function loadConfig(env: Env = process.env): OrchestratorConfig {
  const dockerHost = env.DOCKER_HOST
  return {
    configDir: getEnvPath(env, 'BERTH_CONFIG_DIR', '/etc/berth'),
    docker: dockerHost
      ? parseDockerHost(dockerHost)
      : { socketPath: '/var/run/docker.sock' },
    defaultNetwork: getEnvString(env, 'BERTH_DEFAULT_NETWORK', 'bridge'),

    readyTimeoutMs: getEnvNumber(env, 'BERTH_READY_TIMEOUT_MS', 30 * 1000),
    readyPollMs: getEnvNumber(env, 'BERTH_READY_POLL_MS', 500),
    dependencyTimeoutMs: getEnvNumber(env, 'BERTH_DEPENDENCY_TIMEOUT_MS', 30 * 1000),
    stopTimeoutSeconds: getEnvNumber(env, 'BERTH_STOP_TIMEOUT_S', 10),

    retry: {
      maxAttempts: getEnvNumber(env, 'BERTH_RETRY_MAX_ATTEMPTS', 3),
      baseDelayMs: getEnvNumber(env, 'BERTH_RETRY_BASE_DELAY_MS', 500),
      maxDelayMs: getEnvNumber(env, 'BERTH_RETRY_MAX_DELAY_MS', 8 * 1000),
    },

    maxConcurrent: Math.max(1, getEnvNumber(env, 'BERTH_MAX_CONCURRENT', 1)),

    logLevel: getEnvString(env, 'BERTH_LOG_LEVEL', 'info'),
    labelPrefix: getEnvString(env, 'BERTH_LABEL_PREFIX', 'berth'),
  }
}

export const config: OrchestratorConfig = loadConfig()
