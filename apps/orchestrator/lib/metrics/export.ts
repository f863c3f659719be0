import { writeFile } from 'node:fs/promises'
import { registry } from './registry'

/**
 * Write the current metrics in the Prometheus text format, e.g. into the
 * directory of a node_exporter textfile collector.
 */
export async function writeMetrics(file: string): Promise<void> {
  await writeFile(file, await registry.metrics(), 'utf-8')
}
