import { ValidationError } from '@berth/core'
import { describe, expect, test } from 'vitest'
import { mergeDefaults, validateContainer, validateDefinition, validateGroup } from './validate'

describe('validateContainer', () => {
  test('fills defaults for unset fields', () => {
    const definition = validateContainer(
      { name: 'web', image: 'nginx' },
      { defaultNetwork: 'bridge' },
    )

    expect(definition).toEqual({
      name: 'web',
      image: { kind: 'pull', reference: 'nginx', insecure: false },
      args: [],
      capAdd: [],
      capDrop: [],
      devices: [],
      dns: [],
      environment: {},
      mounts: [],
      tmpfs: [],
      ports: [],
      restart: { name: 'always' },
      network: 'bridge',
      dependsOn: [],
    })
  })

  test('requires net or network without a default network', () => {
    const err = (() => {
      try {
        validateContainer({ name: 'web', image: 'nginx' })
      } catch (e) {
        return e
      }
    })()

    expect(err).toBeInstanceOf(ValidationError)
    expect(err).toMatchObject({ field: 'network', definition: 'web' })
  })

  test('keeps net without falling back to the default network', () => {
    const definition = validateContainer(
      { name: 'torrent', image: 'qbittorrent', net: 'vpn' },
      { defaultNetwork: 'bridge' },
    )

    expect(definition.net).toBe('vpn')
    expect(definition.network).toBeUndefined()
  })

  test('names the offending field on schema errors', () => {
    expect(() =>
      validateContainer({ name: 'proxy', image: 'nginx', image_build_path: '/srv/build', tag: 'x' }),
    ).toThrow("Invalid definition 'proxy': image_build_path: Mutually exclusive with 'image'")
  })

  test('applies group defaults below explicit values', () => {
    const definition = validateContainer(
      { name: 'torrent', image: 'qbittorrent', net: 'vpn', dns: ['1.1.1.1'] },
      {
        defaults: {
          dns: ['8.8.4.4'],
          capAdd: ['NET_ADMIN'],
          restart: { name: 'unless-stopped' },
          network: 'media',
        },
      },
    )

    expect(definition.dns).toEqual(['1.1.1.1'])
    expect(definition.capAdd).toEqual(['NET_ADMIN'])
    expect(definition.restart).toEqual({ name: 'unless-stopped' })
    expect(definition.network).toBeUndefined()
  })
})

describe('mergeDefaults', () => {
  test('replaces collections wholesale', () => {
    const merged = mergeDefaults(
      {
        name: 'app',
        image: { kind: 'pull', reference: 'app', insecure: false },
        environment: { TZ: 'UTC' },
      },
      { environment: { PUID: '1000', TZ: 'Europe/Paris' } },
    )

    expect(merged.environment).toEqual({ TZ: 'UTC' })
  })

  test('fills an unset network from the group', () => {
    const merged = mergeDefaults(
      { name: 'app', image: { kind: 'pull', reference: 'app', insecure: false } },
      { network: 'media' },
    )

    expect(merged.network).toBe('media')
  })
})

describe('validateGroup', () => {
  test('returns the group definition', () => {
    expect(validateGroup({ name: 'media', members: ['vpn', 'torrent'], master: 'vpn' })).toEqual({
      name: 'media',
      members: ['vpn', 'torrent'],
      master: 'vpn',
    })
  })

  test('throws a ValidationError naming the field', () => {
    expect(() => validateGroup({ name: 'media', members: [], master: 'vpn' })).toThrow(
      "Invalid definition 'media': master: Master 'vpn' is not a member of the group",
    )
  })
})

describe('validateDefinition', () => {
  test('dispatches on kind', () => {
    expect(validateDefinition('group', { name: 'media' }).members).toEqual([])
    expect(
      validateDefinition('container', { name: 'web', image: 'nginx', network: 'host' }).network,
    ).toBe('host')
  })
})
