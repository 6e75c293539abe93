/**
 * `deptrack graph` command
 *
 * Loads a graph YAML/JSON file, removes redundant (transitively implied)
 * dependencies and prints what is left.
 *
 * Usage:
 *   deptrack graph graph.yaml                         Render reduced dependencies
 *   deptrack graph graph.yaml --output-format json    Emit JSON adjacency document
 *
 * Exit codes:
 *   0  - success
 *   1  - unexpected system error
 *   2  - file not found, parse error, validation error, bad configuration
 *        or an unknown --output-format value
 */

import type { Command } from 'commander'
import { ConfigError } from '../../core/errors.js'
import { loadConfig } from '../../modules/config/config-loader.js'
import { OutputFormatSchema } from '../../modules/config/config-schema.js'
import type { LogLevelValue, OutputFormat } from '../../modules/config/config-schema.js'
import { buildTree } from '../../modules/graph-file/graph-builder.js'
import type { BuiltGraph } from '../../modules/graph-file/graph-builder.js'
import type { GraphFile } from '../../modules/graph-file/schemas.js'
import { createLogger } from '../../utils/logger.js'
import { EXIT_SUCCESS, EXIT_USAGE_ERROR, loadGraphFile } from '../utils/load-graph.js'
import { parseFlag } from '../utils/parse-flag.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GraphActionOptions {
  filePath: string
  /** Raw --output-format value; falls back to the configured output_format */
  outputFormat?: string
  /** Directory searched for .deptrack.yaml (default: cwd) */
  projectDir?: string
}

export interface ReducedGraph {
  built: BuiltGraph
  /** Edge count as declared in the file (duplicates collapsed) */
  declaredEdges: number
  /** Edge count after reduction */
  keptEdges: number
  removedEdges: number
}

// ---------------------------------------------------------------------------
// Reduction
// ---------------------------------------------------------------------------

/**
 * Build the tree for `graph` and reduce it.
 */
export function reduceGraph(graph: GraphFile, built: BuiltGraph = buildTree(graph)): ReducedGraph {
  const { tree } = built
  const declaredEdges = tree.handles().reduce((sum, h) => sum + tree.dependsOn(h).length, 0)
  const removedEdges = tree.simplify()
  return {
    built,
    declaredEdges,
    keptEdges: declaredEdges - removedEdges,
    removedEdges,
  }
}

export function summaryLine(reduced: ReducedGraph): string {
  const targetCount = reduced.built.tree.size
  return (
    `${String(targetCount)} targets, ${String(reduced.keptEdges)} edges ` +
    `(${String(reduced.removedEdges)} redundant removed)`
  )
}

// ---------------------------------------------------------------------------
// Human renderer
// ---------------------------------------------------------------------------

/**
 * Render one block per target, in file order, listing its reduced dependencies.
 */
export function renderHuman(reduced: ReducedGraph): string {
  const { tree, ids } = reduced.built
  const lines: string[] = []

  for (const handle of tree.handles()) {
    const id = ids[handle] ?? String(handle)
    const name = tree.name(handle)
    let line = name === id ? `[ ${id} ]` : `[ ${id} "${name}" ]`

    const description = tree.attribs(handle)?.description
    if (description !== undefined) {
      const truncated = description.length > 60 ? `${description.slice(0, 57)}...` : description
      line += ` ${truncated}`
    }

    const deps = tree.dependsOn(handle)
    if (deps.length === 0) {
      line += ' [root]'
    }
    lines.push(line)

    for (const dep of deps) {
      lines.push(`  --> depends on: ${ids[dep] ?? String(dep)}`)
    }
  }

  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// JSON renderer
// ---------------------------------------------------------------------------

interface JsonTarget {
  id: string
  name: string
  depends_on: string[]
  dependents: string[]
  /** Declared dependencies dropped as redundant */
  redundant: string[]
}

interface JsonOutput {
  version: string
  targets: Record<string, JsonTarget>
  summary: string
}

export function renderJson(graph: GraphFile, reduced: ReducedGraph): string {
  const { tree, ids } = reduced.built
  const idOf = (handle: number): string => ids[handle] ?? String(handle)
  const targets: Record<string, JsonTarget> = {}

  for (const handle of tree.handles()) {
    const id = idOf(handle)
    const dependsOn = tree.dependsOn(handle).map(idOf)
    const declared = [...new Set(graph.targets[id]?.depends_on ?? [])]
    targets[id] = {
      id,
      name: tree.name(handle),
      depends_on: dependsOn,
      dependents: tree.dependedBy(handle).map(idOf),
      redundant: declared.filter((dep) => !dependsOn.includes(dep)),
    }
  }

  const output: JsonOutput = {
    version: graph.version,
    targets,
    summary: summaryLine(reduced),
  }
  return JSON.stringify(output, null, 2)
}

// ---------------------------------------------------------------------------
// runGraphAction - testable core logic
// ---------------------------------------------------------------------------

/**
 * Core action for the graph command.
 *
 * Returns an exit code. Separated from Commander integration for testability.
 */
export async function runGraphAction(options: GraphActionOptions): Promise<number> {
  const flag = parseFlag(OutputFormatSchema, '--output-format', options.outputFormat)
  if (!flag.ok) return flag.exitCode

  let outputFormat: OutputFormat
  let logLevel: LogLevelValue
  try {
    const config = await loadConfig({
      projectDir: options.projectDir,
      overrides: flag.value !== undefined ? { output_format: flag.value } : {},
    })
    outputFormat = config.output_format
    logLevel = config.log_level
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return EXIT_USAGE_ERROR
    }
    throw err
  }

  const loaded = loadGraphFile(options.filePath)
  if (!loaded.ok) return loaded.exitCode

  const logger = createLogger('dep-tree', { level: logLevel })
  const reduced = reduceGraph(loaded.graph, buildTree(loaded.graph, { logger }))

  if (outputFormat === 'json') {
    process.stdout.write(renderJson(loaded.graph, reduced) + '\n')
  } else {
    process.stdout.write(renderHuman(reduced) + '\n')
    process.stdout.write(`\n${summaryLine(reduced)}\n`)
  }

  return EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// registerGraphCommand
// ---------------------------------------------------------------------------

/**
 * Register the `deptrack graph` command with the CLI program.
 */
export function registerGraphCommand(program: Command): void {
  program
    .command('graph <file>')
    .description('Show a graph file with redundant dependencies removed')
    .option('--output-format <format>', 'Output format: human or json')
    .action(async (file: string, opts: { outputFormat?: string }) => {
      const exitCode = await runGraphAction({
        filePath: file,
        outputFormat: opts.outputFormat,
      })
      process.exitCode = exitCode
    })
}

