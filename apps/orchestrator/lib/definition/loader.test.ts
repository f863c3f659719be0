/**
 * Definition Store Tests
 */

import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import {
  ContainerNotFoundError,
  DuplicateContainerError,
  DuplicateGroupError,
  UnknownGroupError,
  ValidationError,
} from '@berth/core'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { DefinitionStore, interpolateEnvVars } from './loader'

const groupsYaml = `
media:
  master: vpn
  members:
    - vpn
  defaults:
    restart: unless-stopped
    network: media
`

const vpnYaml = `
name: vpn
group: media
image: qmcgaw/gluetun
cap_add:
  - NET_ADMIN
environment:
  VPN_KEY: \${VPN_KEY}
`

const torrentYaml = `
name: torrent
group: media
image: qbittorrent
net: vpn
`

describe('DefinitionStore', () => {
  let baseDir: string
  let store: DefinitionStore

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), 'berth-store-'))
    await mkdir(join(baseDir, 'containers'))
    await writeFile(join(baseDir, 'groups.yaml'), groupsYaml)
    await writeFile(join(baseDir, 'containers', 'vpn.yaml'), vpnYaml)
    store = new DefinitionStore(baseDir, {
      defaultNetwork: 'bridge',
      env: { VPN_KEY: 'test-secret' },
    })
  })

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true })
  })

  describe('load', () => {
    test('loads groups and containers with group defaults applied', async () => {
      await writeFile(join(baseDir, 'containers', 'torrent.yaml'), torrentYaml)

      const { groups, containers, errors } = store.load()

      expect(errors).toEqual([])
      expect(groups.map((g) => g.name)).toEqual(['media'])
      expect(containers.map((c) => c.name)).toEqual(['torrent', 'vpn'])

      const vpn = containers[1]
      expect(vpn.environment).toEqual({ VPN_KEY: 'test-secret' })
      expect(vpn.restart).toEqual({ name: 'unless-stopped' })
      expect(vpn.network).toBe('media')

      const torrent = containers[0]
      expect(torrent.net).toBe('vpn')
      expect(torrent.network).toBeUndefined()
    })

    test('appends containers missing from their group members', async () => {
      await writeFile(join(baseDir, 'containers', 'torrent.yaml'), torrentYaml)

      const { groups } = store.load()

      expect(groups[0].members).toEqual(['vpn', 'torrent'])
    })

    test('reports invalid containers without dropping valid ones', async () => {
      await writeFile(
        join(baseDir, 'containers', 'bad.yaml'),
        'name: bad\ngroup: media\nimage: nginx\ntag: v1\n',
      )

      const { containers, errors } = store.load()

      expect(containers.map((c) => c.name)).toEqual(['vpn'])
      expect(errors).toHaveLength(1)
      expect(errors[0]).toBeInstanceOf(ValidationError)
      expect(errors[0].field).toBe('tag')
    })

    test('reports a malformed file without dropping valid ones', async () => {
      await writeFile(join(baseDir, 'containers', 'broken.yaml'), 'name: [broken\n')

      const { containers, errors } = store.load()

      expect(containers.map((c) => c.name)).toEqual(['vpn'])
      expect(errors).toHaveLength(1)
      expect(errors[0]).toBeInstanceOf(ValidationError)
      expect(errors[0].definition).toBe('broken.yaml')
      expect(errors[0].field).toBe('/')
    })

    test('reports a malformed groups.yaml and still loads containers', async () => {
      await writeFile(join(baseDir, 'groups.yaml'), 'media: [broken\n')

      const { groups, containers, errors } = store.load()

      expect(groups).toEqual([])
      expect(containers.map((c) => c.name)).toEqual(['vpn'])
      expect(errors.map((e) => e.definition)).toEqual(['groups.yaml'])
    })

    test('rejects a container without a group', async () => {
      await writeFile(join(baseDir, 'containers', 'loose.yaml'), 'name: loose\nimage: nginx\n')

      const { errors } = store.load()

      expect(errors.map((e) => e.field)).toEqual(['group'])
    })

    test('returns nothing for an empty config directory', async () => {
      const empty = new DefinitionStore(join(baseDir, 'missing'))

      expect(empty.load()).toEqual({ groups: [], containers: [], errors: [] })
    })
  })

  describe('defineGroup', () => {
    test('adds a group to groups.yaml', () => {
      store.defineGroup({ name: 'backup', members: [] })

      expect(store.load().groups.map((g) => g.name)).toEqual(['media', 'backup'])
    })

    test('rejects an existing group', () => {
      expect(() => store.defineGroup({ name: 'media' })).toThrow(DuplicateGroupError)
    })
  })

  describe('defineContainer', () => {
    test('copies the file verbatim and appends the member', async () => {
      const source = join(baseDir, 'web.yaml')
      const content = 'name: web\ngroup: media\nimage: nginx\nenvironment:\n  - KEY=${VPN_KEY}\n'
      await writeFile(source, content)

      const definition = store.defineContainer(source)

      expect(definition.environment).toEqual({ KEY: 'test-secret' })
      expect(await readFile(join(baseDir, 'containers', 'web.yaml'), 'utf-8')).toBe(content)
      expect(store.load().groups[0].members).toEqual(['vpn', 'web'])
    })

    test('rejects a container that already exists', async () => {
      const source = join(baseDir, 'vpn-copy.yaml')
      await writeFile(source, vpnYaml)

      expect(() => store.defineContainer(source)).toThrow(DuplicateContainerError)
    })

    test('rejects an unknown group', async () => {
      const source = join(baseDir, 'web.yaml')
      await writeFile(source, 'name: web\ngroup: nowhere\nimage: nginx\n')

      expect(() => store.defineContainer(source)).toThrow(UnknownGroupError)
      expect(existsSync(join(baseDir, 'containers', 'web.yaml'))).toBe(false)
    })
  })

  describe('setMaster', () => {
    test('persists the master of a group', async () => {
      const source = join(baseDir, 'torrent.yaml')
      await writeFile(source, torrentYaml)
      store.defineContainer(source)

      const group = store.setMaster('media', 'torrent')

      expect(group.master).toBe('torrent')
      expect(store.load().groups[0].master).toBe('torrent')
    })

    test('rejects a container that is not a member', () => {
      expect(() => store.setMaster('media', 'torrent')).toThrow(
        "Invalid definition 'media': master: 'torrent' is not a member of the group",
      )
    })

    test('rejects an unknown group', () => {
      expect(() => store.setMaster('backup', 'vpn')).toThrow(UnknownGroupError)
    })
  })

  describe('removeContainer', () => {
    test('deletes the file and clears membership', () => {
      store.removeContainer('vpn')

      const { groups, containers } = store.load()
      expect(containers).toEqual([])
      expect(groups[0].members).toEqual([])
      expect(groups[0].master).toBeUndefined()
    })

    test('rejects an unknown container', () => {
      expect(() => store.removeContainer('ghost')).toThrow(ContainerNotFoundError)
    })
  })

  describe('setTag', () => {
    test('retags a pulled image and keeps the rest of the file', async () => {
      const definition = store.setTag('vpn', 'v3.1')

      expect(definition.image).toEqual({
        kind: 'pull',
        reference: 'qmcgaw/gluetun:v3.1',
        insecure: false,
      })
      const content = await readFile(join(baseDir, 'containers', 'vpn.yaml'), 'utf-8')
      expect(content).toContain('image: qmcgaw/gluetun:v3.1\n')
      expect(content).toContain('VPN_KEY: ${VPN_KEY}\n')
    })

    test('sets the tag of a built image', async () => {
      await writeFile(
        join(baseDir, 'containers', 'app.yaml'),
        'name: app\ngroup: media\nimage_build_path: /srv/app\ntag: app:1\n',
      )

      const definition = store.setTag('app', 'v2')

      expect(definition.image).toMatchObject({ kind: 'build', tag: 'app:v2' })
      expect(await readFile(join(baseDir, 'containers', 'app.yaml'), 'utf-8')).toContain(
        'tag: app:v2\n',
      )
    })

    test('rejects a malformed tag without touching the file', async () => {
      expect(() => store.setTag('vpn', 'not a tag')).toThrow(ValidationError)
      expect(await readFile(join(baseDir, 'containers', 'vpn.yaml'), 'utf-8')).toBe(vpnYaml)
    })

    test('rejects an unknown container', () => {
      expect(() => store.setTag('ghost', 'v2')).toThrow(ContainerNotFoundError)
    })
  })

  describe('dump', () => {
    test('renders the normalized definition', async () => {
      await writeFile(join(baseDir, 'containers', 'torrent.yaml'), torrentYaml)

      expect(store.dump('torrent')).toBe(
        'name: torrent\ngroup: media\nimage: qbittorrent\nrestart: unless-stopped\nnet: vpn\n',
      )
    })

    test('writes to an output file', async () => {
      const output = join(baseDir, 'vpn.dump.yaml')

      store.dump('vpn', output)

      expect(await readFile(output, 'utf-8')).toContain('network: media\n')
    })
  })
})

describe('interpolateEnvVars', () => {
  test('keeps unknown variables untouched', () => {
    expect(interpolateEnvVars('${A}-${B}', { A: 'x' })).toBe('x-${B}')
  })
})
