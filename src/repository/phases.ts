/**
 * Game phases in canonical order. Results are sorted by this order.
 */
export const PHASES = [
    'any',
    'before-battle',
    'command',
    'movement',
    'shooting',
    'charge',
    'fight'
] as const;

export type Phase = typeof PHASES[number];

const PHASE_RANK = new Map<Phase, number>(PHASES.map((phase, index) => [phase, index]));

// Label fragments used by the reference data ("Enemy Fight phase", "Any time", ...)
const LABEL_ALIASES = new Map<string, Phase>([
    ['any', 'any'],
    ['any time', 'any'],
    ['any phase', 'any'],
    ['any of your phases', 'any'],
    ['before battle', 'before-battle'],
    ['during deployment', 'before-battle'],
    ['deployment', 'before-battle'],
    ['command', 'command'],
    ['movement', 'movement'],
    ['shooting', 'shooting'],
    ['charge', 'charge'],
    ['fight', 'fight']
]);

export function isPhase(value: string): value is Phase {
    return PHASES.some(phase => phase === value);
}

export function phaseRank(phase: Phase): number {
    return PHASE_RANK.get(phase) ?? PHASES.length;
}

/**
 * Map a phase label onto a canonical phase.
 * Combined labels ("Shooting or Fight phase") resolve to the first phase named.
 */
export function parsePhaseLabel(label: string): Phase | undefined {
    const trimmed = label.trim().toLowerCase();
    if (isPhase(trimmed)) return trimmed;

    const first = trimmed.split(/\s+or\s+/)[0];
    const cleaned = first
        .replace(/^(?:at the )?(?:start|end) of (?:the |your |any (?=\S+\s+phase))?/, '')
        .replace(/^(?:(?:enemy|your|opponent['’]s)\s+)+/, '')
        .replace(/\s*phase$/, '')
        .trim();

    return LABEL_ALIASES.get(first) ?? LABEL_ALIASES.get(cleaned);
}
