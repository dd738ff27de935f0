/**
 * Drill Engine - Progress State Machine
 *
 * unlearned -> shown -> learned -> (mastered)
 *     ^                    |
 *     +---- demotion ------+   (N consecutive wrong answers, default 2)
 *
 * `mastered` is derived from the attempt log and never stored.
 */

import {
    Attempt,
    DEFAULT_DRILL_CONFIG,
    DrillEngineConfig,
    Fact,
    FactState,
    FactStatus,
    ProgressStore,
} from './types';
import { NotFoundError } from './errors';
import { isMastered } from './mastery';

// =============================================================================
// LOOKUPS
// =============================================================================

export function requireFact(store: ProgressStore, factId: string): Fact {
    const fact = store.getFact(factId);
    if (!fact) {
        throw new NotFoundError('fact', factId);
    }
    return fact;
}

/**
 * Status from a (possibly absent) state record plus the mastery check
 */
export function deriveFactStatus(state: FactState | null, mastered: boolean): FactStatus {
    if (!state || (state.learnedAt === null && state.lastShownAt === null)) {
        return 'unlearned';
    }
    if (state.learnedAt === null) {
        return 'shown';
    }
    return mastered ? 'mastered' : 'learned';
}

export function getFactStatus(
    store: ProgressStore,
    factId: string,
    userId: string,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): FactStatus {
    const state = store.getFactState(factId, userId);
    if (!state || state.learnedAt === null) {
        return deriveFactStatus(state, false);
    }
    return deriveFactStatus(state, isMastered(store, factId, userId, config));
}

export function isFactLearned(store: ProgressStore, factId: string, userId: string): boolean {
    const state = store.getFactState(factId, userId);
    return state !== null && state.learnedAt !== null;
}

/**
 * Facts with no learned timestamp, in creation order (includes "shown")
 */
export function getUnlearnedFacts(store: ProgressStore, domainId: string, userId: string): Fact[] {
    return store.getFacts(domainId).filter(fact => !isFactLearned(store, fact.id, userId));
}

/**
 * Learned but not yet mastered facts, in creation order
 */
export function getLearnedFacts(
    store: ProgressStore,
    domainId: string,
    userId: string,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): Fact[] {
    return store
        .getFacts(domainId)
        .filter(fact => isFactLearned(store, fact.id, userId) && !isMastered(store, fact.id, userId, config));
}

/**
 * Every fact with a learned timestamp, mastered or not
 */
export function getAllLearnedFacts(store: ProgressStore, domainId: string, userId: string): Fact[] {
    return store.getFacts(domainId).filter(fact => isFactLearned(store, fact.id, userId));
}

export function getAttemptCount(store: ProgressStore, factId: string, userId: string): number {
    return store.countAttempts(factId, userId);
}

// =============================================================================
// TRANSITIONS
// =============================================================================

/**
 * Record that a fact was displayed. Leaves learnedAt untouched.
 */
export function markShown(store: ProgressStore, factId: string, userId: string, now: Date = new Date()): FactState {
    requireFact(store, factId);
    return store.transaction(() => {
        const state = store.getOrCreateFactState(factId, userId);
        return store.updateFactState({ ...state, lastShownAt: now });
    });
}

/**
 * The only transition into `learned`
 */
export function markLearned(store: ProgressStore, factId: string, userId: string, now: Date = new Date()): FactState {
    requireFact(store, factId);
    return store.transaction(() => {
        const state = store.getOrCreateFactState(factId, userId);
        return store.updateFactState({ ...state, learnedAt: now, lastShownAt: now });
    });
}

export interface AttemptInput {
    factId: string;
    fieldName: string;
    correct: boolean;
    userId: string;
    sessionId: string | null;
    timestamp?: Date;
}

/**
 * Append to the attempt log. Counters are updated separately by
 * updateConsecutive so the log stays truthful if that update fails.
 */
export function recordAttempt(store: ProgressStore, input: AttemptInput): Attempt {
    requireFact(store, input.factId);
    return store.appendAttempt({
        factId: input.factId,
        userId: input.userId,
        fieldName: input.fieldName,
        correct: input.correct,
        sessionId: input.sessionId,
        timestamp: input.timestamp ?? new Date(),
    });
}

/**
 * Pure counter step. Demotion clears learnedAt and both counters.
 */
export function applyConsecutiveResult(
    state: FactState,
    correct: boolean,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): { state: FactState; demoted: boolean } {
    if (correct) {
        return {
            state: { ...state, consecutiveCorrect: state.consecutiveCorrect + 1, consecutiveWrong: 0 },
            demoted: false,
        };
    }

    const consecutiveWrong = state.consecutiveWrong + 1;
    if (consecutiveWrong >= config.progress.demoteAfterConsecutiveWrong) {
        return {
            state: { ...state, learnedAt: null, consecutiveCorrect: 0, consecutiveWrong: 0 },
            demoted: true,
        };
    }

    return {
        state: { ...state, consecutiveCorrect: 0, consecutiveWrong },
        demoted: false,
    };
}

/**
 * Apply one answer to the per-fact counters. Not idempotent: callers must
 * feed answers one at a time, in order. Returns true when the fact was demoted.
 */
export function updateConsecutive(
    store: ProgressStore,
    factId: string,
    userId: string,
    correct: boolean,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): boolean {
    return store.transaction(() => {
        const current = store.getOrCreateFactState(factId, userId);
        const { state, demoted } = applyConsecutiveResult(current, correct, config);
        store.updateFactState(state);
        return demoted;
    });
}

/**
 * A freshly learned fact has proven itself (default: 2 correct in a row)
 */
export function hasTwoConsecutiveCorrect(
    store: ProgressStore,
    factId: string,
    userId: string,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): boolean {
    const state = store.getFactState(factId, userId);
    return state !== null && state.consecutiveCorrect >= config.progress.provenAfterConsecutiveCorrect;
}

/**
 * Delete the user's fact states and attempts for every fact in the domain
 */
export function resetDomainProgress(store: ProgressStore, domainId: string, userId: string): void {
    if (!store.getDomain(domainId)) {
        throw new NotFoundError('domain', domainId);
    }
    store.deleteProgress(domainId, userId);
}
