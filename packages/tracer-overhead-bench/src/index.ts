export * from './types.js'
export * from './errors.js'
export * from './scenarios.js'
export * from './logger.js'
export * from './process-adapter.js'
export * from './output-parsers.js'
export * from './resource-monitor.js'
export * from './artifacts.js'
export * from './timing.js'
export * from './session-manager.js'
export * from './daemon-tracer.js'
export * from './trial-runner.js'
export * from './aggregator.js'
export * from './results-store.js'
export * from './combine.js'
export * from './config.js'
export * from './output-formatters.js'
export * from './benchmark-orchestrator.js'
export { createProgram } from './program.js'
export type { ProgramDeps } from './program.js'
