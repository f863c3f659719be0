/**
 * Prometheus Metrics Module
 *
 * Central registry and exports for all Berth metrics.
 * Follows Prometheus naming conventions with berth_ prefix.
 */

export { registry, startTime, systemInfo } from './registry'

export * from './lifecycle'
export { writeMetrics } from './export'
