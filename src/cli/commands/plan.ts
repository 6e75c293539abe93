/**
 * `deptrack plan` command
 *
 * Dry-runs a graph file through the scheduler loop: every poll starts all
 * ready targets, then finishes them (or fails the ones named with --fail).
 * Prints the resulting waves and whether the run succeeded or stalled.
 *
 * Usage:
 *   deptrack plan graph.yaml
 *   deptrack plan graph.yaml --fail compile
 *   deptrack plan graph.yaml --readiness legacy --output-format json
 *
 * Exit codes:
 *   0  - every target finished
 *   1  - unexpected system error
 *   2  - file not found, parse error, validation error, bad configuration,
 *        an unknown target passed to --fail, or an unknown flag value
 *   3  - the run stalled: some targets failed or were never started
 */

import type { Command } from 'commander'
import { ConfigError } from '../../core/errors.js'
import { loadConfig } from '../../modules/config/config-loader.js'
import { OutputFormatSchema, ReadinessModeSchema } from '../../modules/config/config-schema.js'
import type { DeptrackConfig } from '../../modules/config/config-schema.js'
import type { DepTree } from '../../modules/dep-tree/dep-tree.js'
import type { TreeSummary } from '../../modules/dep-tree/types.js'
import { buildTree } from '../../modules/graph-file/graph-builder.js'
import type { GraphTargetAttribs } from '../../modules/graph-file/graph-builder.js'
import { childLogger, createLogger } from '../../utils/logger.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR, loadGraphFile } from '../utils/load-graph.js'
import { parseFlag } from '../utils/parse-flag.js'

export const PLAN_EXIT_STALLED = 3

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PlanActionOptions {
  filePath: string
  /** Target keys to report as failed instead of finished */
  fail?: string[]
  /** Raw --readiness value; validated before use */
  readiness?: string
  /** Raw --output-format value; validated before use */
  outputFormat?: string
  projectDir?: string
}

export interface PlanWaveEntry {
  id: string
  outcome: 'finished' | 'failed'
}

export interface PlanResult {
  waves: PlanWaveEntry[][]
  summary: TreeSummary
}

// ---------------------------------------------------------------------------
// simulateRun
// ---------------------------------------------------------------------------

/**
 * Drive `tree` to completion the way a scheduler would: poll ready(), start
 * everything returned, then report each outcome. Wave entries are sorted by id.
 */
export function simulateRun(
  tree: DepTree<GraphTargetAttribs>,
  failIds: ReadonlySet<string>,
): PlanResult {
  const waves: PlanWaveEntry[][] = []
  const idOf = (handle: number): string => tree.attribs(handle)?.id ?? tree.name(handle)

  for (let ready = tree.ready(); ready.length > 0; ready = tree.ready()) {
    for (const handle of ready) tree.start(handle)

    const wave: PlanWaveEntry[] = []
    for (const handle of ready) {
      const id = idOf(handle)
      if (failIds.has(id)) {
        tree.fail(handle)
        wave.push({ id, outcome: 'failed' })
      } else {
        tree.finish(handle)
        wave.push({ id, outcome: 'finished' })
      }
    }
    wave.sort((a, b) => a.id.localeCompare(b.id))
    waves.push(wave)
  }

  return { waves, summary: tree.summarize() }
}

// ---------------------------------------------------------------------------
// Renderers
// ---------------------------------------------------------------------------

export function renderPlanHuman(result: PlanResult, idOf: (handle: number) => string): string {
  const lines = result.waves.map((wave, index) => {
    const entries = wave.map((entry) => (entry.outcome === 'failed' ? `${entry.id} (failed)` : entry.id))
    return `Wave ${String(index + 1)}: ${entries.join(', ')}`
  })

  const { summary } = result
  if (summary.succeeded) {
    lines.push('', `Outcome: succeeded (${String(summary.finished.length)} targets finished)`)
  } else {
    const failed = summary.failed.map(idOf)
    const unstarted = summary.unstarted.map(idOf)
    lines.push(
      '',
      `Outcome: stalled, ${String(failed.length)} failed (${failed.join(', ')}), ` +
        `${String(unstarted.length)} never started (${unstarted.join(', ')})`,
    )
  }
  return lines.join('\n')
}

export function renderPlanJson(result: PlanResult, idOf: (handle: number) => string): string {
  const { summary } = result
  return JSON.stringify(
    {
      waves: result.waves,
      succeeded: summary.succeeded,
      finished: summary.finished.map(idOf),
      failed: summary.failed.map(idOf),
      unstarted: summary.unstarted.map(idOf),
    },
    null,
    2,
  )
}

// ---------------------------------------------------------------------------
// runPlanAction - testable core logic
// ---------------------------------------------------------------------------

export async function runPlanAction(options: PlanActionOptions): Promise<number> {
  const readiness = parseFlag(ReadinessModeSchema, '--readiness', options.readiness)
  if (!readiness.ok) return readiness.exitCode
  const outputFormat = parseFlag(OutputFormatSchema, '--output-format', options.outputFormat)
  if (!outputFormat.ok) return outputFormat.exitCode

  let config: DeptrackConfig
  try {
    config = await loadConfig({
      projectDir: options.projectDir,
      overrides: {
        ...(readiness.value !== undefined ? { readiness: readiness.value } : {}),
        ...(outputFormat.value !== undefined ? { output_format: outputFormat.value } : {}),
      },
    })
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return EXIT_USAGE_ERROR
    }
    throw err
  }

  const loaded = loadGraphFile(options.filePath)
  if (!loaded.ok) return loaded.exitCode

  const failIds = new Set(options.fail ?? [])
  for (const id of failIds) {
    if (loaded.graph.targets[id] === undefined) {
      process.stderr.write(`Error: --fail names unknown target "${id}"\n`)
      return EXIT_USAGE_ERROR
    }
  }

  const logger = childLogger(createLogger('dep-tree', { level: config.log_level }), {
    file: options.filePath,
  })
  const { tree, ids } = buildTree(loaded.graph, { readiness: config.readiness, logger })
  const result = simulateRun(tree, failIds)
  const idOf = (handle: number): string => ids[handle] ?? String(handle)

  if (config.output_format === 'json') {
    process.stdout.write(renderPlanJson(result, idOf) + '\n')
  } else {
    process.stdout.write(renderPlanHuman(result, idOf) + '\n')
  }

  return result.summary.succeeded ? EXIT_SUCCESS : PLAN_EXIT_STALLED
}

// ---------------------------------------------------------------------------
// registerPlanCommand
// ---------------------------------------------------------------------------

export function registerPlanCommand(program: Command): void {
  program
    .command('plan <file>')
    .description('Dry-run a graph file and print the order targets become ready')
    .option('--fail <ids...>', 'Targets to report as failed')
    .option('--readiness <mode>', 'Readiness mode: strict or legacy')
    .option('--output-format <format>', 'Output format: human or json')
    .action(
      async (
        file: string,
        opts: { fail?: string[]; readiness?: string; outputFormat?: string },
      ) => {
        const exitCode = await runPlanAction({
          filePath: file,
          fail: opts.fail,
          readiness: opts.readiness,
          outputFormat: opts.outputFormat,
        })
        process.exitCode = exitCode
      },
    )
}

