import { describe, expect, test } from 'vitest'
import {
  formatPort,
  formatRestart,
  parseDevice,
  parseEnvironmentList,
  parseMount,
  parsePort,
  parseRestart,
  parseTmpfs,
  withImageTag,
} from './options'

describe('parseMount', () => {
  test('defaults to read-write', () => {
    expect(parseMount('/srv/media:/downloads')).toEqual({
      source: '/srv/media',
      target: '/downloads',
      readOnly: false,
    })
  })

  test('parses read-only mode', () => {
    expect(parseMount('/etc/app:/config:ro').readOnly).toBe(true)
  })

  test('rejects a mount without a container path', () => {
    expect(() => parseMount('/srv/media')).toThrow(
      "Malformed mount '/srv/media': expected host:container[:ro|rw]",
    )
  })

  test('rejects an unknown mode', () => {
    expect(() => parseMount('/a:/b:rx')).toThrow("Malformed mount '/a:/b:rx': mode must be ro or rw")
  })
})

describe('parsePort', () => {
  test('parses host:container as tcp', () => {
    expect(parsePort('8181:8181')).toEqual({ hostPort: 8181, containerPort: 8181, protocol: 'tcp' })
  })

  test('parses host ip and protocol', () => {
    expect(parsePort('127.0.0.1:53:5353/udp')).toEqual({
      hostIp: '127.0.0.1',
      hostPort: 53,
      containerPort: 5353,
      protocol: 'udp',
    })
  })

  test('rejects out of range ports', () => {
    expect(() => parsePort('70000:80')).toThrow("Malformed port '70000:80': 70000 is out of range")
  })

  test('rejects a bare port', () => {
    expect(() => parsePort('80')).toThrow(/expected \[ip:\]host:container/)
  })

  test('formats back with protocol', () => {
    expect(formatPort(parsePort('8080:80'))).toBe('8080:80/tcp')
  })
})

describe('parseDevice', () => {
  test('mirrors the host path by default', () => {
    expect(parseDevice('/dev/net/tun')).toEqual({
      pathOnHost: '/dev/net/tun',
      pathInContainer: '/dev/net/tun',
      permissions: 'rwm',
    })
  })

  test('rejects unknown permissions', () => {
    expect(() => parseDevice('/dev/sda:/dev/xvda:rx')).toThrow(/permissions must combine/)
  })
})

describe('parseTmpfs', () => {
  test('splits options at the first colon', () => {
    expect(parseTmpfs('/tmp:size=3G,uid=1000')).toEqual({ target: '/tmp', options: 'size=3G,uid=1000' })
  })

  test('accepts a bare path', () => {
    expect(parseTmpfs('/run')).toEqual({ target: '/run' })
  })

  test('rejects a relative target', () => {
    expect(() => parseTmpfs('tmp')).toThrow(/must be an absolute path/)
  })
})

describe('parseRestart', () => {
  test('parses plain policies', () => {
    expect(parseRestart('unless-stopped')).toEqual({ name: 'unless-stopped' })
  })

  test('parses on-failure with a retry count', () => {
    const policy = parseRestart('on-failure:5')
    expect(policy).toEqual({ name: 'on-failure', maximumRetryCount: 5 })
    expect(formatRestart(policy)).toBe('on-failure:5')
  })

  test('rejects a retry count on other policies', () => {
    expect(() => parseRestart('always:3')).toThrow(/only on-failure takes a retry count/)
  })

  test('rejects unknown policies', () => {
    expect(() => parseRestart('sometimes')).toThrow(/Unknown restart policy 'sometimes'/)
  })
})

describe('parseEnvironmentList', () => {
  test('keeps everything after the first equals sign', () => {
    expect(parseEnvironmentList(['TZ=UTC', 'OPTS=a=b'])).toEqual({ TZ: 'UTC', OPTS: 'a=b' })
  })

  test('rejects entries without a key', () => {
    expect(() => parseEnvironmentList(['=value'])).toThrow(
      "Malformed environment entry '=value': expected KEY=value",
    )
  })
})

describe('withImageTag', () => {
  test('appends a tag to an untagged reference', () => {
    expect(withImageTag('nginx', 'v2')).toBe('nginx:v2')
    expect(withImageTag('registry:5000/app', 'v2')).toBe('registry:5000/app:v2')
  })

  test('replaces an existing tag or digest', () => {
    expect(withImageTag('registry:5000/app:1.0', 'v2')).toBe('registry:5000/app:v2')
    expect(withImageTag('app@sha256:abc', 'v2')).toBe('app:v2')
  })

  test('rejects a malformed tag', () => {
    expect(() => withImageTag('nginx', 'bad tag')).toThrow("Malformed image tag 'bad tag'")
  })
})
