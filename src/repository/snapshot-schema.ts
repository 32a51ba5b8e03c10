/**
 * Shapes of the reference snapshot file. The top level is checked as a whole,
 * entries one by one so a bad entry only costs itself.
 */

import { z } from 'zod';
import type { UnitPredicate } from '../types';

export const SnapshotSchema = z.object({
  version: z.string().min(1),
  factions: z.array(z.unknown()),
  factionAliases: z.array(z.unknown()).default([]),
  unitRenames: z.array(z.unknown()).default([]),
  stratagems: z.array(z.unknown())
});

export const FactionEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  parentId: z.string().min(1).nullable().optional()
});

export const FactionAliasEntrySchema = z.object({
  alias: z.string().min(1),
  factionId: z.string().min(1)
});

export const UnitRenameEntrySchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1)
});

export const UnitPredicateSchema: z.ZodType<UnitPredicate> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({
      kind: z.literal('keywords'),
      all: z.array(z.string().min(1)).min(1),
      none: z.array(z.string().min(1)).optional()
    }),
    z.object({
      kind: z.literal('unit-name'),
      names: z.array(z.string().min(1)).min(1)
    }),
    z.object({
      kind: z.literal('any'),
      of: z.array(UnitPredicateSchema).min(1)
    })
  ])
);

export const FactionScopeEntrySchema = z.union([
  z.object({ kind: z.literal('generic') }),
  z.object({ kind: z.literal('factions'), factionIds: z.array(z.string().min(1)) }),
  z.array(z.string().min(1))
]);

export const StratagemEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  type: z.string().default('Stratagem'),
  phase: z.string().min(1),
  cost: z.number().int().min(0),
  factionScope: FactionScopeEntrySchema.optional(),
  eligibility: z
    .object({
      units: z.unknown().optional(),
      detachment: z.string().min(1).optional(),
      armyOfRenown: z.string().min(1).optional()
    })
    .default({}),
  description: z.string().optional()
});

export type SnapshotDocument = z.infer<typeof SnapshotSchema>;
export type FactionEntry = z.infer<typeof FactionEntrySchema>;
export type StratagemEntry = z.infer<typeof StratagemEntrySchema>;

/**
 * Flatten zod issues into one line for logs and load issues
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
