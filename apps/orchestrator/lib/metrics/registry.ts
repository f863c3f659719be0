/**
 * Prometheus Registry
 *
 * Central registry for all metrics. Separated to avoid circular imports.
 */

import { Gauge, Registry } from 'prom-client'

// Custom registry (allows isolation in tests)
export const registry = new Registry()

export const systemInfo = new Gauge({
  name: 'berth_info',
  help: 'Static info about the Berth instance',
  labelNames: ['version'],
  registers: [registry],
})
systemInfo.set({ version: '0.1.0' }, 1)

export const startTime = new Gauge({
  name: 'berth_start_time_seconds',
  help: 'Unix timestamp when the process started',
  registers: [registry],
})
startTime.set(Math.floor(Date.now() / 1000))
