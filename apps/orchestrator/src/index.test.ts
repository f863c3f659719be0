import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ValidationError } from '@berth/core'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { FakeGateway, silentLogger } from '../test/fixtures'
import { createOrchestrator, loadConfig } from '.'

const groupsYaml = `
media:
  master: vpn
  members:
    - vpn
  defaults:
    network: media
`

const vpnYaml = `
name: vpn
group: media
image: qmcgaw/gluetun
cap_add: [NET_ADMIN]
`

const torrentYaml = `
name: torrent
group: media
image: qbittorrent
net: vpn
`

const brokenYaml = `
name: broken
group: media
image: nginx
image_build_path: /srv/build/nginx
`

describe('createOrchestrator', () => {
  let baseDir: string

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'berth-orchestrator-'))
    await mkdir(join(baseDir, 'containers'))
    await writeFile(join(baseDir, 'groups.yaml'), groupsYaml)
    await writeFile(join(baseDir, 'containers', 'vpn.yaml'), vpnYaml)
    await writeFile(join(baseDir, 'containers', 'torrent.yaml'), torrentYaml)
    await writeFile(join(baseDir, 'containers', 'broken.yaml'), brokenYaml)
  })

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true })
  })

  function create(gateway: FakeGateway) {
    const config = loadConfig({
      BERTH_CONFIG_DIR: baseDir,
      BERTH_READY_TIMEOUT_MS: '50',
      BERTH_READY_POLL_MS: '5',
      BERTH_RETRY_BASE_DELAY_MS: '1',
    })
    return createOrchestrator(config, { gateway, logger: silentLogger, env: {} })
  }

  test('registers valid definitions and reports rejected ones', () => {
    const orchestrator = create(new FakeGateway())

    expect(orchestrator.loadErrors).toHaveLength(1)
    expect(orchestrator.loadErrors[0]).toBeInstanceOf(ValidationError)
    expect(orchestrator.registry.listContainers().map((c) => c.name)).toEqual(['torrent', 'vpn'])
    expect(orchestrator.registry.getGroup('media')?.members).toEqual(['vpn', 'torrent'])
  })

  test('starts a group in dependency order', async () => {
    const gateway = new FakeGateway()
    const orchestrator = create(gateway)

    const summary = await orchestrator.engine.up({ groups: ['media'] })

    expect(summary.failed).toEqual([])
    expect(gateway.targets('start')).toEqual(['vpn', 'torrent'])
    expect(orchestrator.engine.topology('media')).toEqual(['vpn', 'torrent'])
  })

  test('recovers containers started by a previous process', async () => {
    const gateway = new FakeGateway()
    await create(gateway).engine.up()

    const restarted = create(gateway)
    const stats = await restarted.recover()

    expect(stats).toEqual({ restored: 2, running: 2, missing: 0 })
    expect(restarted.registry.containerStatus('torrent').status).toBe('running')
  })
})
