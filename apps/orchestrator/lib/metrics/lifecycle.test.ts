import { StartError } from '@berth/core'
import { describe, expect, test } from 'vitest'
import {
  FakeGateway,
  createContainerDefinition,
  createEngineConfig,
  silentLogger,
} from '../../test/fixtures'
import { LifecycleEngine } from '../lifecycle/engine'
import { GroupRegistry } from '../registry/group-registry'
import { gatewayRetriesTotal, registry, runsTotal, statusTransitionsTotal } from '.'

describe('lifecycle metrics', () => {
  test('count transitions, retries and runs', async () => {
    const groups = new GroupRegistry()
    groups.register({ name: 'media', members: [] })
    groups.addContainer('media', createContainerDefinition({ name: 'vpn' }))
    const gateway = new FakeGateway()
    gateway.failOn('start', 'vpn', new StartError('vpn', 'daemon busy', { transient: true }), 1)
    const engine = new LifecycleEngine(gateway, groups, createEngineConfig(), silentLogger)

    await engine.up()

    const transitions = (await statusTransitionsTotal.get()).values
    expect(transitions.find((v) => v.labels.to === 'running')?.value).toBe(1)
    expect(transitions.find((v) => v.labels.to === 'created')?.labels.from).toBe('undefined')

    const retries = (await gatewayRetriesTotal.get()).values
    expect(retries.find((v) => v.labels.operation === 'start')?.value).toBe(1)

    const runs = (await runsTotal.get()).values
    expect(runs.map((v) => [v.labels.operation, v.labels.outcome, v.value])).toEqual([
      ['up', 'success', 1],
    ])

    expect(await registry.metrics()).toContain('berth_gateway_operation_duration_seconds_bucket')
  })
})
