/**
 * Stratagem Repository - read-only catalogue of factions and stratagems
 *
 * Built once from a reference snapshot. Every query result is computed at
 * construction and frozen, so one instance can serve any number of
 * evaluations at the same time.
 */

import type { Faction, MalformedReferenceEntry, Stratagem } from '../types';
import type { FactionDirectory } from '../normalizer/roster-normalizer';
import { PHASES, phaseRank } from './phases';
import type { Phase } from './phases';

// ============================================================================
// TYPES
// ============================================================================

export interface RepositoryContents {
    version: string;
    factions: readonly Faction[];
    stratagems: readonly Stratagem[];
    issues?: readonly MalformedReferenceEntry[];
}

// ============================================================================
// ORDERING
// ============================================================================

/**
 * Canonical result order: phase, then cost, then id
 */
export function compareStratagems(a: Stratagem, b: Stratagem): number {
    const byPhase = phaseRank(a.phase) - phaseRank(b.phase);
    if (byPhase !== 0) return byPhase;
    if (a.cost !== b.cost) return a.cost - b.cost;
    if (a.id === b.id) return 0;
    return a.id < b.id ? -1 : 1;
}

function sortedList(stratagems: Iterable<Stratagem>): readonly Stratagem[] {
    return Object.freeze(Array.from(stratagems).sort(compareStratagems));
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        Object.values(value).forEach((child: unknown) => deepFreeze(child));
    }
    return value;
}

// ============================================================================
// REPOSITORY
// ============================================================================

export class StratagemRepository implements FactionDirectory {
    readonly version: string;
    readonly loadIssues: readonly MalformedReferenceEntry[];

    private readonly factionsById = new Map<string, Faction>();
    private readonly factionsByName = new Map<string, Faction>();
    private readonly ancestors = new Map<string, readonly string[]>();
    private readonly stratagemsById = new Map<string, Stratagem>();
    private readonly byFaction = new Map<string, readonly Stratagem[]>();
    private readonly byPhase = new Map<Phase, readonly Stratagem[]>();
    private readonly generic: readonly Stratagem[];

    constructor(contents: RepositoryContents) {
        this.version = contents.version;
        this.loadIssues = deepFreeze([...(contents.issues ?? [])]);

        for (const faction of contents.factions) {
            if (this.factionsById.has(faction.id)) continue;
            const frozen = deepFreeze({ ...faction });
            this.factionsById.set(frozen.id, frozen);
            const key = frozen.name.toLowerCase();
            if (!this.factionsByName.has(key)) {
                this.factionsByName.set(key, frozen);
            }
        }

        for (const id of this.factionsById.keys()) {
            this.ancestors.set(id, Object.freeze(this.walkAncestors(id)));
        }

        for (const stratagem of contents.stratagems) {
            if (this.stratagemsById.has(stratagem.id)) continue;
            this.stratagemsById.set(stratagem.id, deepFreeze(structuredClone(stratagem)));
        }

        const all = Array.from(this.stratagemsById.values());
        this.generic = sortedList(all.filter(stratagem => stratagem.factionScope.kind === 'generic'));

        for (const id of this.factionsById.keys()) {
            const lineage = new Set([id, ...this.ancestorsOf(id)]);
            const scoped = all.filter(stratagem =>
                stratagem.factionScope.kind === 'factions' &&
                stratagem.factionScope.factionIds.some(scopeId => lineage.has(scopeId))
            );
            this.byFaction.set(id, sortedList([...this.generic, ...scoped]));
        }

        for (const phase of PHASES) {
            this.byPhase.set(phase, sortedList(all.filter(stratagem =>
                stratagem.phase === phase || stratagem.phase === 'any'
            )));
        }
    }

    // Parent chain, nearest first. Stops at a repeated faction.
    private walkAncestors(id: string): string[] {
        const chain: string[] = [];
        const seen = new Set([id]);
        let parentId = this.factionsById.get(id)?.parentId;
        while (parentId !== undefined && !seen.has(parentId) && this.factionsById.has(parentId)) {
            chain.push(parentId);
            seen.add(parentId);
            parentId = this.factionsById.get(parentId)?.parentId;
        }
        return chain;
    }

    // ========================================================================
    // FACTIONS
    // ========================================================================

    getFaction(id: string): Faction | undefined {
        return this.factionsById.get(id);
    }

    /**
     * Case-insensitive exact match on the faction name
     */
    findFactionByName(name: string): Faction | undefined {
        return this.factionsByName.get(name.trim().toLowerCase());
    }

    getFactions(): readonly Faction[] {
        return Array.from(this.factionsById.values());
    }

    ancestorsOf(id: string): readonly string[] {
        return this.ancestors.get(id) ?? [];
    }

    /**
     * True when the factions are the same or one descends from the other
     */
    isRelated(a: string, b: string): boolean {
        return a === b || this.ancestorsOf(a).includes(b) || this.ancestorsOf(b).includes(a);
    }

    // ========================================================================
    // STRATAGEMS
    // ========================================================================

    getStratagem(id: string): Stratagem | undefined {
        return this.stratagemsById.get(id);
    }

    /**
     * Stratagems with no faction scope, available to every army
     */
    genericStratagems(): readonly Stratagem[] {
        return this.generic;
    }

    /**
     * Generic stratagems plus those scoped to the faction or any of its ancestors
     */
    stratagemsForFaction(factionId: string): readonly Stratagem[] {
        return this.byFaction.get(factionId) ?? this.generic;
    }

    /**
     * Stratagems usable in the phase, including the 'any' phase ones
     */
    stratagemsForPhase(phase: Phase): readonly Stratagem[] {
        return this.byPhase.get(phase) ?? [];
    }

    get size(): number {
        return this.stratagemsById.size;
    }
}
