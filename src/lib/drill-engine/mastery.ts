/**
 * Drill Engine - Mastery Evaluator
 *
 * A fact is mastered when, among the user's most recent attempts on it
 * (default window 7), at least `requiredCorrect` (default 6) are correct AND
 * the newest one is correct. Attempts on every quizzed field count toward the
 * same window.
 */

import { Attempt, DEFAULT_DRILL_CONFIG, DrillEngineConfig, Fact, ProgressStore } from './types';

/**
 * Classify an attempt window (newest first)
 */
export function evaluateMasteryWindow(
    attemptsNewestFirst: readonly Pick<Attempt, 'correct'>[],
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): boolean {
    const { windowSize, requiredCorrect } = config.mastery;
    const recent = attemptsNewestFirst.slice(0, windowSize);

    if (recent.length < windowSize) {
        return false;
    }

    // A single most-recent miss always blocks mastery
    if (!recent[0].correct) {
        return false;
    }

    const correctCount = recent.filter(a => a.correct).length;
    return correctCount >= requiredCorrect;
}

export function isMastered(
    store: ProgressStore,
    factId: string,
    userId: string,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): boolean {
    const attempts = store.getAttempts(factId, userId, config.mastery.windowSize);
    return evaluateMasteryWindow(attempts, config);
}

export function getMasteredFacts(
    store: ProgressStore,
    domainId: string,
    userId: string,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): Fact[] {
    return store.getFacts(domainId).filter(fact => isMastered(store, fact.id, userId, config));
}

export function getUnmasteredFacts(
    store: ProgressStore,
    domainId: string,
    userId: string,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): Fact[] {
    return store.getFacts(domainId).filter(fact => !isMastered(store, fact.id, userId, config));
}
