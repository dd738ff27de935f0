/**
 * Drill Engine - Streak Tracker
 *
 * Daily engagement counter. Calendar days are UTC; repeated calls on the
 * same day change nothing.
 */

import { ProgressStore, StreakState } from './types';
import { getQuestionsAnsweredToday } from './progress-report';

export interface StreakUpdate {
    state: StreakState;
    changed: boolean;
}

export interface StreakInfo extends StreakState {
    questionsToday: number;
    goalCompleted: boolean;
    goalPercentage: number;
    streakAtRisk: boolean;
}

// =============================================================================
// CALENDAR
// =============================================================================

/** YYYY-MM-DD in UTC */
export function toCalendarDate(at: Date): string {
    return at.toISOString().slice(0, 10);
}

export function previousCalendarDate(at: Date): string {
    const day = new Date(Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate() - 1));
    return toCalendarDate(day);
}

// =============================================================================
// TRANSITIONS
// =============================================================================

/**
 * Pure streak step for an activity at `now`
 */
export function advanceStreak(state: StreakState, now: Date): StreakUpdate {
    const today = toCalendarDate(now);
    if (state.lastPracticeDate === today) {
        return { state, changed: false };
    }

    const currentStreak = state.lastPracticeDate === previousCalendarDate(now) ? state.currentStreak + 1 : 1;

    return {
        state: {
            ...state,
            currentStreak,
            longestStreak: Math.max(state.longestStreak, currentStreak),
            lastPracticeDate: today,
        },
        changed: true,
    };
}

export function updateStreak(store: ProgressStore, userId: string, now: Date = new Date()): StreakUpdate {
    const update = advanceStreak(store.getStreakState(userId), now);
    if (update.changed) {
        store.updateStreakState(update.state);
    }
    return update;
}

/**
 * Practiced yesterday, not yet today
 */
export function isStreakAtRisk(store: ProgressStore, userId: string, now: Date = new Date()): boolean {
    const state = store.getStreakState(userId);
    return state.currentStreak > 0 && state.lastPracticeDate === previousCalendarDate(now);
}

export function getStreakInfo(store: ProgressStore, userId: string, now: Date = new Date()): StreakInfo {
    const state = store.getStreakState(userId);
    const questionsToday = getQuestionsAnsweredToday(store, userId, now);

    return {
        ...state,
        questionsToday,
        goalCompleted: questionsToday >= state.dailyGoal,
        goalPercentage: Math.min(100, Math.floor((questionsToday / state.dailyGoal) * 100)),
        streakAtRisk: isStreakAtRisk(store, userId, now),
    };
}
