/**
 * Unit predicate compilation
 * A predicate is checked for structure once per evaluation, then tested
 * against every unit.
 */

import type { Unit, UnitPredicate } from '../types';
import { normalizeKeyword } from '../parser/roster-parser';

export type UnitTest = (unit: Unit) => boolean;

export type CompiledPredicate =
  | { valid: true; test: UnitTest }
  | { valid: false; reason: string };

function isStringList(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string' && item.trim() !== '');
}

function keywordTest(all: readonly string[], none: readonly string[]): UnitTest {
  const required = all.map(normalizeKeyword);
  const excluded = none.map(normalizeKeyword);
  return unit => {
    const keywords = new Set(unit.keywords.map(normalizeKeyword));
    return required.every(keyword => keywords.has(keyword)) &&
      !excluded.some(keyword => keywords.has(keyword));
  };
}

function nameTest(names: readonly string[]): UnitTest {
  const wanted = new Set(names.map(name => name.trim().toLowerCase()));
  return unit => wanted.has(unit.canonicalName.trim().toLowerCase());
}

/**
 * Validate and compile a predicate. Anything malformed compiles to a
 * reason instead of a test.
 */
export function compilePredicate(predicate: UnitPredicate): CompiledPredicate {
  switch (predicate.kind) {
    case 'keywords': {
      if (!isStringList(predicate.all) || predicate.all.length === 0) {
        return { valid: false, reason: 'keywords predicate needs a non-empty "all" list' };
      }
      const none = predicate.none ?? [];
      if (!isStringList(none)) {
        return { valid: false, reason: 'keywords predicate has an invalid "none" list' };
      }
      return { valid: true, test: keywordTest(predicate.all, none) };
    }

    case 'unit-name':
      if (!isStringList(predicate.names) || predicate.names.length === 0) {
        return { valid: false, reason: 'unit-name predicate needs a non-empty "names" list' };
      }
      return { valid: true, test: nameTest(predicate.names) };

    case 'any': {
      if (!Array.isArray(predicate.of) || predicate.of.length === 0) {
        return { valid: false, reason: 'any predicate needs a non-empty "of" list' };
      }
      const tests: UnitTest[] = [];
      for (const inner of predicate.of) {
        const compiled = compilePredicate(inner);
        if (!compiled.valid) return compiled;
        tests.push(compiled.test);
      }
      return { valid: true, test: unit => tests.some(test => test(unit)) };
    }

    case 'unrecognized':
      return { valid: false, reason: predicate.reason };

    default: {
      const unknown: never = predicate;
      return { valid: false, reason: `unrecognized predicate ${JSON.stringify(unknown)}` };
    }
  }
}
