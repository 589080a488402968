// Functional scraper APIs

export type {
  BuildOptions,
  CodeOutcome,
  CodeState,
  CorpusBuilderOptions,
  CorpusResult,
  CorpusSummary,
  FailureEntry,
  FailureStage,
} from './corpus'
export { buildCorpus, canTransition, CODE_TRANSITIONS, CodeTracker, CorpusBuilder } from './corpus'
export type {
  AssemblyHints,
  AssemblyResult,
  OccupationAssemblerOptions,
  ScrapeOccupationOptions,
  ScrapeOccupationResult,
} from './occupation'
export { OccupationAssembler, occupationUrl, scrapeOccupation } from './occupation'
export type {
  DiscoverOptions,
  DiscoveryResult,
  FamilyFailure,
  OccupationTarget,
} from './occupation-index'
export {
  ALL_FAMILY_IDS,
  discoverOccupations,
  familyIndexUrl,
  parseFamilyIndex,
  SUMMARY_LINK_SELECTORS,
} from './occupation-index'
