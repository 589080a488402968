export type { HealthReport, HealthThresholds } from './health'
export { buildFieldHealthReport, computeStatus, worstStatus } from './health'
export * from './parsers'
export { compileProbe, describeProbe } from './probes'
export type { ProbeVersion } from './registry'
export {
  DEFAULT_PROBE_VERSION,
  parseProbeVersion,
  ProbeRegistry,
  ProbeVersionSchema,
} from './registry'
export { SelectorResolver } from './resolver'
export type {
  Absent,
  FieldDiagnostic,
  FieldHealth,
  FieldKey,
  HealthStatus,
  Probe,
  ProbeResult,
  ProbeSpec,
  ProbeTable,
  RawContent,
  Resolution,
} from './types'
