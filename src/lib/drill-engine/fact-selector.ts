/**
 * Drill Engine - Fact Selector
 *
 * Decides which fact to quiz (or show) next. Priority:
 * 1. Any unlearned fact -> null (caller shows a fact instead)
 * 2. Every Nth question -> random mastered fact (reinforcement)
 * 3. Least-practiced learned-but-unmastered fact, random among ties
 */

import {
    DEFAULT_DRILL_CONFIG,
    DrillEngineConfig,
    Fact,
    ProgressStore,
    RandomSource,
    SelectionReason,
} from './types';
import { defaultRandom, pickRandom } from './random';
import { getMasteredFacts } from './mastery';
import { getLearnedFacts, getUnlearnedFacts, isFactLearned } from './progress';

export interface FactSelection {
    fact: Fact;
    reason: SelectionReason;
}

// =============================================================================
// QUIZ SELECTION
// =============================================================================

export function selectNextFactWithReason(
    store: ProgressStore,
    domainId: string,
    questionCount: number,
    userId: string,
    random: RandomSource = defaultRandom,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): FactSelection | null {
    if (getUnlearnedFacts(store, domainId, userId).length > 0) {
        return null;
    }

    const interval = config.selection.reinforcementInterval;
    if (questionCount > 0 && questionCount % interval === 0) {
        const reinforcement = pickRandom(random, getMasteredFacts(store, domainId, userId, config));
        if (reinforcement) {
            return { fact: reinforcement, reason: 'REINFORCEMENT' };
        }
    }

    const learned = getLearnedFacts(store, domainId, userId, config);
    if (learned.length === 0) {
        return null;
    }

    const counts = learned.map(fact => ({ fact, count: store.countAttempts(fact.id, userId) }));
    const minCount = Math.min(...counts.map(c => c.count));
    const leastPracticed = counts.filter(c => c.count === minCount).map(c => c.fact);

    const fact = pickRandom(random, leastPracticed);
    return fact ? { fact, reason: 'LEAST_PRACTICED' } : null;
}

export function selectNextFact(
    store: ProgressStore,
    domainId: string,
    questionCount: number,
    userId: string,
    random: RandomSource = defaultRandom,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): Fact | null {
    return selectNextFactWithReason(store, domainId, questionCount, userId, random, config)?.fact ?? null;
}

/**
 * Random learned-but-unmastered fact other than `excludeFactId`, used for the
 * review question after a new fact proves itself
 */
export function selectReviewFact(
    store: ProgressStore,
    domainId: string,
    userId: string,
    excludeFactId: string | null,
    random: RandomSource = defaultRandom,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): Fact | null {
    const candidates = getLearnedFacts(store, domainId, userId, config).filter(f => f.id !== excludeFactId);
    return pickRandom(random, candidates) ?? null;
}

/**
 * Review-mastered mode: the fact whose newest attempt is oldest.
 * Never-attempted facts come first, then creation order.
 */
export function selectLeastRecentlyAttemptedFact(
    store: ProgressStore,
    domainId: string,
    userId: string
): Fact | null {
    let best: Fact | null = null;
    let bestTime = Number.POSITIVE_INFINITY;

    for (const fact of store.getFacts(domainId)) {
        const [newest] = store.getAttempts(fact.id, userId, 1);
        const time = newest ? newest.timestamp.getTime() : Number.NEGATIVE_INFINITY;
        if (best === null || time < bestTime) {
            best = fact;
            bestTime = time;
        }
    }

    return best;
}

// =============================================================================
// SHOW SELECTION
// =============================================================================

/**
 * Least recently shown unlearned fact (never-shown first, then creation order)
 */
export function getNextUnlearnedFact(store: ProgressStore, domainId: string, userId: string): Fact | null {
    const unlearned = getUnlearnedFacts(store, domainId, userId);

    let best: Fact | null = null;
    let bestTime = Number.POSITIVE_INFINITY;

    for (const fact of unlearned) {
        const shownAt = store.getFactState(fact.id, userId)?.lastShownAt ?? null;
        const time = shownAt ? shownAt.getTime() : Number.NEGATIVE_INFINITY;
        if (best === null || time < bestTime) {
            best = fact;
            bestTime = time;
        }
    }

    return best;
}

/**
 * Earliest unlearned fact that precedes a learned fact in creation order
 * (typically a demoted fact)
 */
export function findOutOfOrderFact(store: ProgressStore, domainId: string, userId: string): Fact | null {
    const facts = store.getFacts(domainId);
    const learnedFlags = facts.map(fact => isFactLearned(store, fact.id, userId));

    const lastLearnedIndex = learnedFlags.lastIndexOf(true);
    if (lastLearnedIndex < 0) {
        return null;
    }

    for (let i = 0; i < lastLearnedIndex; i++) {
        if (!learnedFlags[i]) {
            return facts[i];
        }
    }
    return null;
}

export function getNextFactToShow(store: ProgressStore, domainId: string, userId: string): FactSelection | null {
    const outOfOrder = findOutOfOrderFact(store, domainId, userId);
    if (outOfOrder) {
        return { fact: outOfOrder, reason: 'OUT_OF_ORDER' };
    }

    const next = getNextUnlearnedFact(store, domainId, userId);
    return next ? { fact: next, reason: 'UNLEARNED' } : null;
}
