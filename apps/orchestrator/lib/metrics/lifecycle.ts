/**
 * Lifecycle Metrics
 *
 * Status transitions, runtime gateway calls and orchestration runs.
 */

import { Counter, Histogram } from 'prom-client'
import { registry } from './registry'

// Pulls and builds dominate; stop waits out the grace period
const gatewayBuckets = [0.05, 0.1, 0.5, 1, 2, 5, 10, 30, 60, 120]

export const statusTransitionsTotal = new Counter({
  name: 'berth_status_transitions_total',
  help: 'Container status transitions',
  labelNames: ['from', 'to'],
  registers: [registry],
})

export const gatewayOperationDuration = new Histogram({
  name: 'berth_gateway_operation_duration_seconds',
  help: 'Duration of runtime gateway calls, per attempt',
  labelNames: ['operation', 'outcome'],
  buckets: gatewayBuckets,
  registers: [registry],
})

export const gatewayRetriesTotal = new Counter({
  name: 'berth_gateway_retries_total',
  help: 'Runtime gateway calls retried after a transient error',
  labelNames: ['operation'],
  registers: [registry],
})

export const runsTotal = new Counter({
  name: 'berth_runs_total',
  help: 'Completed up/down/update/restart runs',
  labelNames: ['operation', 'outcome'],
  registers: [registry],
})
