import type {
  ContainerStatusSnapshot,
  GroupStatusSnapshot,
  RunSummary,
} from '@berth/orchestrator'

/** Longest outcome name ('rolled-back') */
const OUTCOME_WIDTH = 11

function widthOf(names: string[]): number {
  return names.reduce((max, name) => Math.max(max, name.length), 0)
}

/**
 * One header line, then one line per container.
 * @example
 * up: 1 failed
 *   vpn      started      running
 *   torrent  failed       failed  start torrent: boom
 */
export function formatSummary(summary: RunSummary): string {
  const width = widthOf(summary.results.map((r) => r.name))
  const lines = summary.results.map((result) => {
    const line = `  ${result.name.padEnd(width)}  ${result.outcome.padEnd(OUTCOME_WIDTH)}  ${result.status}`
    return result.error ? `${line}  ${result.error.message}` : line
  })

  let verdict = 'ok'
  if (summary.cancelled) {
    verdict = `cancelled, rolled back ${summary.rolledBack.length}`
  } else if (summary.failed.length > 0) {
    verdict = `${summary.failed.length} failed`
  }
  return [`${summary.operation}: ${verdict}`, ...lines].join('\n')
}

export function formatStatus(snapshot: ContainerStatusSnapshot | GroupStatusSnapshot): string {
  if (snapshot.kind === 'container') {
    const line = `${snapshot.name} (${snapshot.group}): ${snapshot.status}`
    return snapshot.error ? `${line}\n  ${snapshot.error.message}` : line
  }

  const header = snapshot.master ? `${snapshot.name} (master: ${snapshot.master})` : snapshot.name
  const width = widthOf(snapshot.members.map((m) => m.name))
  const lines = snapshot.members.map((member) => {
    const line = `  ${member.name.padEnd(width)}  ${member.status}`
    return member.error ? `${line}  ${member.error.message}` : line
  })
  return [header, ...lines].join('\n')
}
