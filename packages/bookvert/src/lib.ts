export { identity, compareNames, toCandidate, type Candidate } from './catalogue/candidate.js';
export { groupCatalogues, catalogueKey, catalogueLabel, isAmbiguous, type Catalogue } from './catalogue/group.js';
export { parsePickRule, parsePickRules, parseRanges, formatFrom, formatTo } from './policy/parse.js';
export { applySelector, compareSpecificity, matchesFrom, mostSpecificRule, resolveCatalogue, resolveCatalogues } from './policy/resolve.js';
export type { PickFrom, PickRule, PickTo } from './policy/types.js';
export { startSession, transition, isFinal, type SessionInput, type SessionState } from './interactive/session.js';
export {
  runInteractive,
  summarizeCandidate,
  summarizeCatalogue,
  type CandidateChoice,
  type CandidateSummary,
  type CatalogueChoice,
  type CatalogueSummary,
  type InteractiveOutcome,
  type ResolutionUi,
} from './interactive/protocol.js';
export { TerminalUi } from './interactive/terminal.js';
export { aggregate, outputName, type NamingOptions } from './resolution/aggregate.js';
export { planBooks, filterIncluded, type RunContext } from './resolution/plan.js';
export type { BookPlan, Resolution, ResolvedCatalogue } from './resolution/types.js';
export { scanBooks, walkBooks } from './scanner/walker.js';
export { buildArchives, writeCbz, pageName, type BuildOptions, type BuildSummary } from './archive/cbz.js';
export { comicInfoXml } from './archive/comicInfo.js';
export { loadConfig, DEFAULT_CONFIG } from './shared/config.js';
export { Logger } from './shared/logger.js';
export * from './shared/errors.js';
export { MANGA_VALUES, type BookvertConfig, type ComicMetadata, type Manga, type PageFile, type ScannedBook } from './shared/types.js';
