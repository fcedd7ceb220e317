import { stat } from 'fs/promises'
import { join } from 'path'
import { Command } from 'commander'
import { BenchmarkOrchestrator, verifyBuildArtifacts } from './benchmark-orchestrator.js'
import {
  combineResultFiles,
  findResultsFiles,
  sortResults,
  validateResults
} from './combine.js'
import {
  RUNS_WARNING_THRESHOLD,
  defaultOutputDir,
  parseList,
  resolveConfig
} from './config.js'
import { SuiteAbortedError, errorMessage } from './errors.js'
import { createConsoleLogger } from './logger.js'
import { formatDuration, outputFormatter } from './output-formatters.js'
import { RESULTS_FILE_NAME, readResultSet, writeResultSet } from './results-store.js'
import { METHOD_ORDER } from './types.js'
import type { Logger, Method, OutputFormat, ResultSet } from './types.js'

const availableFormats: OutputFormat[] = ['table', 'json', 'csv']

function isMethod(value: string): value is Method {
  return METHOD_ORDER.some((method) => method === value)
}

const EXIT_FAILURE = 1
const EXIT_INTERRUPTED = 130

export interface ProgramDeps {
  logger?: Logger
  exit?: (code: number) => void
}

interface RunOptions {
  runs?: string
  outputDir?: string
  scenarios?: string
  methods?: string
  shard?: string
  timeBinary?: string
  sudo: boolean
  warmupMs?: string
  graceMs?: string
  timeoutMs?: string
  format: string
  verbose: boolean
}

interface CombineOptions {
  inputFiles?: string[]
  inputDir?: string
  output: string
  validate: boolean
  sort: boolean
}

interface ReportOptions {
  format: string
}

class CliError extends Error {
  constructor(message: string, readonly exitCode: number = EXIT_FAILURE) {
    super(message)
  }
}

function parseFormat(value: string): OutputFormat {
  const format = availableFormats.find((candidate) => candidate === value)
  if (!format) {
    throw new CliError(`Invalid format: ${value}. Available: ${availableFormats.join(', ')}`)
  }
  return format
}

function render(results: ResultSet, format: OutputFormat): string {
  switch (format) {
    case 'table':
      return outputFormatter.formatTable(results) + '\n' + outputFormatter.formatSummary(results)
    case 'json':
      return outputFormatter.formatJSON(results)
    case 'csv':
      return outputFormatter.formatCSV(results)
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    return false
  }
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const exit = deps.exit ?? ((code: number) => process.exit(code))
  const baseLogger = deps.logger

  const handle = <TArgs extends unknown[]>(action: (...args: TArgs) => Promise<void>) =>
    async (...args: TArgs): Promise<void> => {
      try {
        await action(...args)
      } catch (error) {
        const logger = baseLogger ?? createConsoleLogger()
        if (error instanceof SuiteAbortedError) {
          logger.error(error.message)
          if (error.results.length > 0) {
            logger.info(`Partial results (${error.results.length} records) were saved before stopping`)
          }
          exit(error.reason === 'interrupted' ? EXIT_INTERRUPTED : EXIT_FAILURE)
          return
        }
        logger.error(errorMessage(error))
        exit(error instanceof CliError ? error.exitCode : EXIT_FAILURE)
      }
    }

  const program = new Command()

  program
    .name('tracer-overhead-bench')
    .description('Compare the per-call overhead of userspace session tracing and kernel probe tracing')
    .version('0.1.0')

  program
    .command('run')
    .description('Run the benchmark suite against a build directory')
    .argument('<build-dir>', 'Path to the build directory (e.g., ./build)')
    .option('-r, --runs <number>', 'Repetitions per scenario and method (default: 10)')
    .option('-o, --output-dir <dir>', 'Directory for results.json and temporary traces')
    .option('-s, --scenarios <list>', 'Comma-separated simulated work values (μs) to run, e.g. 0,5,50')
    .option('-m, --methods <list>', 'Comma-separated methods to run (baseline, session, daemon)')
    .option('--shard <id>', 'Prefix for session names and trace files when suites share a host')
    .option('--time-binary <path>', 'Timing wrapper to run the workload under', '/usr/bin/time')
    .option('--no-sudo', 'Launch and signal the daemon tracer without sudo')
    .option('--warmup-ms <ms>', 'Wait after launching the daemon tracer before measuring')
    .option('--grace-ms <ms>', 'Wait for the daemon tracer to exit before killing it')
    .option('--timeout-ms <ms>', 'Per-trial workload timeout')
    .option('-f, --format <format>', 'Output format (table, json, csv)', 'table')
    .option('-v, --verbose', 'Verbose output', false)
    .action(handle(async (buildDir: string, options: RunOptions) => {
      const format = parseFormat(options.format)
      const logger = baseLogger ?? createConsoleLogger({ verbose: options.verbose })

      let methods: Method[] | undefined
      if (options.methods !== undefined) {
        const requested = parseList(options.methods)
        const unknown = requested.filter((method) => !isMethod(method))
        if (unknown.length > 0) {
          throw new CliError(`Invalid method(s): ${unknown.join(', ')}. Available: ${METHOD_ORDER.join(', ')}`)
        }
        methods = requested.filter(isMethod)
      }

      const config = resolveConfig({
        buildDir,
        outputDir: options.outputDir ?? process.env.TRACER_BENCH_OUTPUT_DIR ?? defaultOutputDir(new Date()),
        runs: options.runs,
        scenarios: options.scenarios === undefined ? undefined : parseList(options.scenarios).map(Number),
        methods,
        shardId: options.shard,
        timeBinary: options.timeBinary,
        privilegePrefix: options.sudo ? ['sudo'] : [],
        warmupMs: options.warmupMs === undefined ? undefined : Number(options.warmupMs),
        gracePeriodMs: options.graceMs === undefined ? undefined : Number(options.graceMs),
        trialTimeoutMs: options.timeoutMs === undefined ? undefined : Number(options.timeoutMs),
        verbose: options.verbose
      })

      if (config.runs > RUNS_WARNING_THRESHOLD) {
        logger.warn(`${config.runs} runs will take a very long time`)
      }

      logger.info('🚀 Tracer overhead benchmark')
      logger.info('📋 Configuration:')
      logger.info(`   Build Directory: ${config.buildDir}`)
      logger.info(`   Output Directory: ${config.outputDir}`)
      logger.info(`   Repetitions: ${config.runs}`)
      logger.info(`   Methods: ${config.methods.join(', ')}`)
      logger.info('')

      await verifyBuildArtifacts(config)

      const controller = new AbortController()
      const onInterrupt = () => {
        if (controller.signal.aborted) {
          logger.error('Interrupted again, exiting immediately')
          exit(EXIT_INTERRUPTED)
          return
        }
        logger.warn('Interrupt received, stopping after the current trial (Ctrl-C again to force)')
        controller.abort()
      }

      const orchestrator = new BenchmarkOrchestrator({ config, logger, signal: controller.signal })
      orchestrator.events.on('pair:complete', ({ method, record }) => {
        logger.info(
          `    ⚡ ${method}: ${formatDuration(record.avgTimePerCallNs)} ± ${formatDuration(record.confidence95Margin)} per call`
        )
      })

      process.on('SIGINT', onInterrupt)
      let results: ResultSet
      try {
        results = await orchestrator.run()
      } finally {
        process.off('SIGINT', onInterrupt)
      }

      logger.info('')
      logger.info(render(results, format))
    }))

  program
    .command('combine')
    .description('Combine results.json files from parallel benchmark runs')
    .option('-i, --input-files <files...>', 'Input results.json files to combine')
    .option('-d, --input-dir <dir>', 'Directory to search recursively for results.json files')
    .requiredOption('-o, --output <file>', 'Output file path for the combined results')
    .option('--validate', 'Check the combined results cover every scenario and method', false)
    .option('--no-sort', 'Keep input order instead of sorting by scenario and method')
    .action(handle(async (options: CombineOptions) => {
      const logger = baseLogger ?? createConsoleLogger()
      const inputFiles = [...(options.inputFiles ?? [])]

      if (options.inputDir !== undefined) {
        if (!(await isDirectory(options.inputDir))) {
          throw new CliError(`Input directory not found: ${options.inputDir}`)
        }
        const found = await findResultsFiles(options.inputDir)
        logger.info(`🔍 Found ${found.length} ${RESULTS_FILE_NAME} files in ${options.inputDir}`)
        inputFiles.push(...found)
      }

      if (inputFiles.length === 0) {
        throw new CliError('No input files specified. Use -i or -d to specify input files.')
      }

      logger.info('🔗 Combining benchmark results')
      let combined = await combineResultFiles(inputFiles, logger)
      if (combined.length === 0) {
        throw new CliError('No results were loaded')
      }

      if (options.sort) {
        combined = sortResults(combined)
      }

      if (options.validate) {
        const report = validateResults(combined)
        logger.info('\nValidation:')
        logger.info(`  Scenarios found: ${report.scenarios.join(', ')}`)
        logger.info(`  Methods found: ${report.methods.join(', ')}`)
        logger.info(`  Total results: ${report.total}`)
        for (const warning of report.warnings) {
          logger.warn(warning)
        }
      }

      await writeResultSet(options.output, combined)
      logger.info(`\n✅ Combined ${combined.length} results into ${options.output}`)
    }))

  program
    .command('report')
    .description('Print an existing results.json as a table, JSON or CSV')
    .argument('<results>', 'Path to results.json or the directory containing it')
    .option('-f, --format <format>', 'Output format (table, json, csv)', 'table')
    .action(handle(async (resultsPath: string, options: ReportOptions) => {
      const format = parseFormat(options.format)
      const logger = baseLogger ?? createConsoleLogger()
      const file = (await isDirectory(resultsPath)) ? join(resultsPath, RESULTS_FILE_NAME) : resultsPath

      const results = await readResultSet(file)
      logger.info(render(results, format))
    }))

  program.addHelpText('after', `
Examples:
  $ tracer-overhead-bench run ./build
  $ tracer-overhead-bench run ./build -r 50 --scenarios 0,5 --shard ci-1
  $ tracer-overhead-bench combine -d benchmark_artifacts -o combined/results.json --validate
  $ tracer-overhead-bench report benchmark_results_20250101_120000 --format csv

Methods:
  baseline    Workload without instrumentation
  session     Userspace session tracer injected with LD_PRELOAD
  daemon      Kernel probe tracer running as a privileged background daemon
`)

  return program
}
