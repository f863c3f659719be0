#!/usr/bin/env tsx
import { isBerthError } from '@berth/core'
import {
  type Orchestrator,
  type RunSummary,
  createOrchestrator,
  loadConfig,
  writeMetrics,
} from '@berth/orchestrator'
import { program } from 'commander'
import { formatStatus, formatSummary } from './format'

program
  .name('berth')
  .description('Dependency-ordered lifecycle management for groups of Docker containers')
  .version('0.1.0')
  .option('-c, --config-dir <dir>', 'Configuration directory (BERTH_CONFIG_DIR)')
  .option('-m, --metrics <file>', 'Write Prometheus metrics of the run to a file')

function open(): Orchestrator {
  const { configDir } = program.opts<{ configDir?: string }>()
  const env = configDir ? { ...process.env, BERTH_CONFIG_DIR: configDir } : process.env
  const orchestrator = createOrchestrator(loadConfig(env))
  for (const error of orchestrator.loadErrors) {
    console.error(error.message)
  }
  return orchestrator
}

/**
 * Reconcile with the runtime first, so the engine sees what already exists.
 */
async function openWithRuntime(): Promise<Orchestrator> {
  const orchestrator = open()
  await orchestrator.recover()
  return orchestrator
}

/**
 * First Ctrl-C cancels the run (rolling back what it started); the second
 * exits immediately.
 */
function cancelOnInterrupt(): AbortSignal {
  const controller = new AbortController()
  process.once('SIGINT', () => {
    console.error('Cancelling, press Ctrl-C again to exit')
    controller.abort()
    process.once('SIGINT', () => process.exit(130))
  })
  return controller.signal
}

async function report(summary: RunSummary): Promise<void> {
  console.log(formatSummary(summary))
  if (summary.failed.length > 0 || summary.cancelled) {
    process.exitCode = 1
  }

  const { metrics } = program.opts<{ metrics?: string }>()
  if (metrics) {
    await writeMetrics(metrics)
  }
}

function fail(e: unknown, fallback: string): never {
  const message = e instanceof Error ? e.message : fallback
  console.error(isBerthError(e) ? `${e.code}: ${message}` : message)
  process.exit(1)
}

// ─────────────────────────────────────────────────────────────────────────────
// Group Commands
// ─────────────────────────────────────────────────────────────────────────────

program
  .command('group:define <name>')
  .description('Define a new, empty group')
  .option('-n, --network <network>', 'Default network for members')
  .option('-r, --restart <policy>', 'Default restart policy for members')
  .action((name: string, options: { network?: string; restart?: string }) => {
    try {
      const defaults: Record<string, string> = {}
      if (options.network) defaults.network = options.network
      if (options.restart) defaults.restart = options.restart
      const raw = Object.keys(defaults).length > 0 ? { name, defaults } : { name }
      const group = open().store.defineGroup(raw)
      console.log(`Defined group ${group.name}`)
    } catch (e) {
      fail(e, 'Group definition failed')
    }
  })

program
  .command('group:list')
  .description('List groups and their members')
  .action(() => {
    try {
      const { registry } = open()
      for (const group of registry.listGroups()) {
        const master = group.master ? ` (master: ${group.master})` : ''
        console.log(`${group.name}${master}: ${group.members.join(', ') || '(no members)'}`)
      }
    } catch (e) {
      fail(e, 'Listing groups failed')
    }
  })

program
  .command('group:info <name>')
  .description('Show a group definition and its start order')
  .action((name: string) => {
    try {
      const { registry, engine } = open()
      const group = registry.getGroup(name)
      if (!group) {
        console.error(`Group '${name}' is not registered`)
        process.exit(1)
      }
      console.log(JSON.stringify(group, null, 2))
      console.log(`Start order: ${engine.plan({ groups: [name] }).join(' -> ')}`)
    } catch (e) {
      fail(e, 'Group info failed')
    }
  })

program
  .command('group:set-master <group> <container>')
  .description('Make a member the group master')
  .action((group: string, container: string) => {
    try {
      open().store.setMaster(group, container)
      console.log(`${container} is now the master of ${group}`)
    } catch (e) {
      fail(e, 'Setting master failed')
    }
  })

program
  .command('group:start <group...>')
  .description('Start groups in dependency order')
  .option('--pull', 'Pull or build images even when present locally')
  .action(async (groups: string[], options: { pull?: boolean }) => {
    try {
      const { engine } = await openWithRuntime()
      await report(
        await engine.up({ groups }, { signal: cancelOnInterrupt(), pull: options.pull }),
      )
    } catch (e) {
      fail(e, 'Group start failed')
    }
  })

program
  .command('group:stop <group...>')
  .description('Stop groups in reverse dependency order')
  .option('--remove', 'Remove containers after stopping')
  .option('--force', 'Remove without stopping first')
  .action(async (groups: string[], options: { remove?: boolean; force?: boolean }) => {
    try {
      const { engine } = await openWithRuntime()
      await report(
        await engine.down(
          { groups },
          { remove: options.remove, force: options.force, signal: cancelOnInterrupt() },
        ),
      )
    } catch (e) {
      fail(e, 'Group stop failed')
    }
  })

program
  .command('group:update <group...>')
  .description('Refresh images, then recreate and start the group containers')
  .action(async (groups: string[]) => {
    try {
      const { engine } = await openWithRuntime()
      await report(await engine.update({ groups }, { signal: cancelOnInterrupt() }))
    } catch (e) {
      fail(e, 'Group update failed')
    }
  })

// ─────────────────────────────────────────────────────────────────────────────
// Container Commands
// ─────────────────────────────────────────────────────────────────────────────

program
  .command('container:define <file>')
  .description('Validate a container definition file and add it to its group')
  .action((file: string) => {
    try {
      const definition = open().store.defineContainer(file)
      console.log(`Defined container ${definition.name} in group ${definition.group}`)
    } catch (e) {
      fail(e, 'Container definition failed')
    }
  })

program
  .command('container:list')
  .description('List containers')
  .option('-g, --group <group>', 'Only members of this group')
  .action((options: { group?: string }) => {
    try {
      const { registry } = open()
      for (const container of registry.listContainers()) {
        if (options.group && container.group !== options.group) continue
        const image =
          container.image.kind === 'pull'
            ? container.image.reference
            : `${container.image.tag} (build ${container.image.buildPath})`
        console.log(`${container.name}\t${container.group}\t${image}`)
      }
    } catch (e) {
      fail(e, 'Listing containers failed')
    }
  })

program
  .command('container:dump <name>')
  .description('Print the normalized definition of a container')
  .option('-o, --output <file>', 'Write to a file instead')
  .action((name: string, options: { output?: string }) => {
    try {
      const content = open().store.dump(name, options.output)
      if (options.output) {
        console.log(`Wrote ${options.output}`)
      } else {
        process.stdout.write(content)
      }
    } catch (e) {
      fail(e, 'Dump failed')
    }
  })

program
  .command('container:start <name...>')
  .description('Start containers once their dependencies are running')
  .option('--pull', 'Pull or build images even when present locally')
  .action(async (containers: string[], options: { pull?: boolean }) => {
    try {
      const { engine } = await openWithRuntime()
      await report(
        await engine.up({ containers }, { signal: cancelOnInterrupt(), pull: options.pull }),
      )
    } catch (e) {
      fail(e, 'Container start failed')
    }
  })

program
  .command('container:stop <name...>')
  .description('Stop containers, and any running dependents first')
  .option('--remove', 'Remove containers after stopping')
  .option('--force', 'Remove without stopping first')
  .action(async (containers: string[], options: { remove?: boolean; force?: boolean }) => {
    try {
      const { engine } = await openWithRuntime()
      await report(
        await engine.down(
          { containers },
          { remove: options.remove, force: options.force, signal: cancelOnInterrupt() },
        ),
      )
    } catch (e) {
      fail(e, 'Container stop failed')
    }
  })

program
  .command('container:restart <name...>')
  .description('Stop containers with their running dependents, then start them again')
  .action(async (containers: string[]) => {
    try {
      const { engine } = await openWithRuntime()
      await report(await engine.restart({ containers }, { signal: cancelOnInterrupt() }))
    } catch (e) {
      fail(e, 'Container restart failed')
    }
  })

program
  .command('container:update <name...>')
  .description('Refresh container images, then recreate and start the containers')
  .action(async (containers: string[]) => {
    try {
      const { engine } = await openWithRuntime()
      await report(await engine.update({ containers }, { signal: cancelOnInterrupt() }))
    } catch (e) {
      fail(e, 'Container update failed')
    }
  })

program
  .command('container:tag <name> <tag>')
  .description('Set the image tag in a container definition')
  .action((name: string, tag: string) => {
    try {
      const definition = open().store.setTag(name, tag)
      const image =
        definition.image.kind === 'pull' ? definition.image.reference : definition.image.tag
      console.log(`${name} now uses ${image}`)
    } catch (e) {
      fail(e, 'Tagging failed')
    }
  })

program
  .command('container:remove <name>')
  .description('Remove a container from the runtime and from its group')
  .option('--force', 'Remove without stopping first')
  .action(async (name: string, options: { force?: boolean }) => {
    try {
      const { engine, store } = await openWithRuntime()
      const summary = await engine.down(
        { containers: [name] },
        { remove: true, force: options.force },
      )
      await report(summary)
      if (summary.failed.length === 0) {
        store.removeContainer(name)
        console.log(`Removed ${name} from its group`)
      }
    } catch (e) {
      fail(e, 'Container removal failed')
    }
  })

// ─────────────────────────────────────────────────────────────────────────────
// Reporting
// ─────────────────────────────────────────────────────────────────────────────

program
  .command('status <name>')
  .description(
    'Status of a container or of every member of a group, as observed in the runtime. ' +
      'Each command runs in its own process, so only running and stopped are reported; ' +
      'failures show in the summary of the run that hit them.',
  )
  .action(async (name: string) => {
    try {
      const { registry } = await openWithRuntime()
      console.log(formatStatus(registry.status(name)))
    } catch (e) {
      fail(e, 'Status failed')
    }
  })

program
  .command('topology [group]')
  .description('Computed start order, for all containers or one group')
  .action((group: string | undefined) => {
    try {
      const order = open().engine.topology(group)
      order.forEach((name, index) => {
        console.log(`${String(index + 1).padStart(3)}. ${name}`)
      })
    } catch (e) {
      fail(e, 'Topology failed')
    }
  })

program.parseAsync().catch((e: unknown) => fail(e, 'Command failed'))
