export * from './types';
export * from './errors';
export { parseRoster, buildRoster, catalogueFactionTag, normalizeKeyword } from './parser/roster-parser';
export { readRosterDocument } from './parser/document';
export type { RosterData, RawForce, RawSelection } from './parser/document';
export { RosterNormalizer } from './normalizer/roster-normalizer';
export type { FactionDirectory, NormalizerOptions } from './normalizer/roster-normalizer';
export { createAliasTable, createRenameTable } from './normalizer/tables';
export type { FactionAlias, UnitRename, LookupTable } from './normalizer/tables';
export { StratagemRepository, compareStratagems } from './repository/stratagem-repository';
export type { RepositoryContents } from './repository/stratagem-repository';
export { loadReferenceSnapshot, loadSnapshotFile } from './repository/snapshot-loader';
export type { ReferenceData } from './repository/snapshot-loader';
export { PHASES, parsePhaseLabel } from './repository/phases';
export { evaluate, effectiveFactions } from './engine/eligibility-engine';
export { compilePredicate } from './engine/predicates';
export { createRosterAnalyzer, createRosterAnalyzerFromConfig } from './pipeline';
export type { AnalyzerOptions, RosterAnalysis, RosterAnalyzer } from './pipeline';
export { formatAnalysis } from './report-format';
export { loadConfig } from './config';
export type { AppConfig } from './config';
export { createLogger } from './utils/logger';
export type { Logger, LogLevel } from './utils/logger';
