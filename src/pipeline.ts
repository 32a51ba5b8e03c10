/**
 * Roster analysis pipeline: bytes -> parse -> normalize -> evaluate
 */

import type { EvaluationOptions, EvaluationReport, Roster } from './types';
import { DocumentTooLargeError } from './errors';
import { parseRoster } from './parser/roster-parser';
import { RosterNormalizer } from './normalizer/roster-normalizer';
import { evaluate } from './engine/eligibility-engine';
import type { ReferenceData } from './repository/snapshot-loader';
import { loadSnapshotFile } from './repository/snapshot-loader';
import { DEFAULT_MAX_DOCUMENT_BYTES } from './config';
import type { AppConfig } from './config';
import type { Logger } from './utils/logger';
import { createLogger, defaultLogger } from './utils/logger';

export interface AnalyzerOptions {
  reference: ReferenceData;
  maxDocumentBytes?: number;
  evaluation?: EvaluationOptions;
  logger?: Logger;
}

export interface RosterAnalysis {
  roster: Roster;
  report: EvaluationReport;
}

export interface RosterAnalyzer {
  readonly reference: ReferenceData;
  analyze(raw: Uint8Array | string): RosterAnalysis;
}

function documentSize(raw: Uint8Array | string): number {
  return typeof raw === 'string' ? Buffer.byteLength(raw, 'utf-8') : raw.byteLength;
}

export function createRosterAnalyzer(options: AnalyzerOptions): RosterAnalyzer {
  const { reference } = options;
  const logger = options.logger ?? defaultLogger;
  const limit = options.maxDocumentBytes ?? DEFAULT_MAX_DOCUMENT_BYTES;
  const normalizer = new RosterNormalizer({
    factions: reference.repository,
    aliases: reference.aliases,
    renames: reference.renames,
    logger
  });

  return {
    reference,
    analyze(raw) {
      const size = documentSize(raw);
      if (size > limit) {
        throw new DocumentTooLargeError(size, limit);
      }

      const roster = normalizer.normalize(parseRoster(raw, limit));
      logger.debug(`Parsed roster "${roster.armyName ?? 'unnamed'}": ${roster.units.length} units, ${roster.detachments.length} detachments`);
      for (const diagnostic of roster.diagnostics) {
        if (diagnostic.code === 'empty-keywords') {
          logger.warn(`Unit "${diagnostic.unitName}" (${diagnostic.unitId}) has no keywords`);
        }
      }

      const report = evaluate(roster, reference.repository, options.evaluation, logger);
      logger.info(`Evaluated ${roster.units.length} units against snapshot ${reference.repository.version}: ${report.results.length} stratagems apply`);
      return { roster, report };
    }
  };
}

/**
 * Build an analyzer from loaded configuration, reading the snapshot from disk
 */
export function createRosterAnalyzerFromConfig(config: AppConfig): RosterAnalyzer {
  const logger = createLogger(config.logLevel);
  return createRosterAnalyzer({
    reference: loadSnapshotFile(config.snapshotPath, logger),
    maxDocumentBytes: config.maxDocumentBytes,
    evaluation: config.evaluation,
    logger
  });
}
