/**
 * Drill Engine - Progress Reporter
 *
 * Read-only summaries over fact states and the attempt log.
 */

import { DEFAULT_DRILL_CONFIG, Domain, DrillEngineConfig, FactStatus, ProgressStore } from './types';
import { getFactStatus, isFactLearned } from './progress';
import { isMastered } from './mastery';

export const PROGRESS_SYMBOLS: Record<FactStatus, string> = {
    unlearned: '·',
    shown: '-',
    learned: '+',
    mastered: '*',
};

export interface DomainProgress {
    domain: Domain;
    totalFacts: number;
    learnedCount: number;
    masteredCount: number;
    attemptCount: number;
    timeSpentMinutes: number;
    progressString: string;
}

// =============================================================================
// TIME HELPERS
// =============================================================================

export function startOfUtcDay(at: Date): Date {
    return new Date(Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate()));
}

/**
 * Whole minutes between the first and last timestamp (oldest first)
 */
export function minutesBetweenFirstAndLast(times: readonly Date[]): number {
    if (times.length < 2) {
        return 0;
    }
    const first = times[0].getTime();
    const last = times[times.length - 1].getTime();
    return Math.floor((last - first) / 60_000);
}

/**
 * "45m", "2h", "1h 30m"
 */
export function formatTimeSpent(minutes: number): string {
    if (minutes < 60) {
        return `${minutes}m`;
    }
    const hours = Math.floor(minutes / 60);
    const rest = minutes % 60;
    return rest === 0 ? `${hours}h` : `${hours}h ${rest}m`;
}

// =============================================================================
// REPORTS
// =============================================================================

/**
 * One symbol per fact in creation order, e.g. "*+-··"
 */
export function getProgressString(
    store: ProgressStore,
    domainId: string,
    userId: string,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): string {
    if (!store.getDomain(domainId)) {
        return '';
    }
    return store
        .getFacts(domainId)
        .map(fact => PROGRESS_SYMBOLS[getFactStatus(store, fact.id, userId, config)])
        .join('');
}

export function getDomainProgress(
    store: ProgressStore,
    domainId: string,
    userId: string,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): DomainProgress | null {
    const domain = store.getDomain(domainId);
    if (!domain) {
        return null;
    }

    const facts = store.getFacts(domainId);

    return {
        domain,
        totalFacts: facts.length,
        learnedCount: facts.filter(f => isFactLearned(store, f.id, userId)).length,
        masteredCount: facts.filter(f => isMastered(store, f.id, userId, config)).length,
        attemptCount: facts.reduce((sum, f) => sum + store.countAttempts(f.id, userId), 0),
        timeSpentMinutes: minutesBetweenFirstAndLast(store.getUserAttemptTimes(userId, domainId)),
        progressString: getProgressString(store, domainId, userId, config),
    };
}

export function getQuestionsAnsweredToday(store: ProgressStore, userId: string, now: Date = new Date()): number {
    return store.countAttemptsSince(userId, startOfUtcDay(now));
}

/**
 * Rough estimate: first attempt to last attempt across every domain
 */
export function getTotalTimeSpent(store: ProgressStore, userId: string): number {
    return minutesBetweenFirstAndLast(store.getUserAttemptTimes(userId));
}

export function getUniqueSessionCount(store: ProgressStore, userId: string): number {
    return store.countSessions(userId);
}
