/**
 * Drill Engine - Doom-Loop Agent
 *
 * Frustration detection and recovery within one session.
 *
 * Responsibilities:
 * - Rolling window of the most recent answers
 * - Trigger detection (default: 3 wrong among the last 4)
 * - Recovery fact selection (learned, unmastered, best success rate)
 * - Recovery cycle bookkeeping (show once, then N forced questions)
 * - Exit after consecutive in-session correct answers
 */

import {
    DEFAULT_DRILL_CONFIG,
    DoomLoopState,
    DrillEngineConfig,
    Fact,
    ProgressStore,
    RecentAnswer,
} from '../types';
import { isMastered } from '../mastery';
import { getAllLearnedFacts } from '../progress';

// =============================================================================
// STATE
// =============================================================================

export function initializeDoomLoopState(): DoomLoopState {
    return {
        active: false,
        recentAnswers: [],
        consecutiveCorrectInSession: 0,
        recoveryFactId: null,
        questionsRemaining: 0,
    };
}

/**
 * True when the window is full and holds at least `triggerWrongCount` misses
 */
export function checkDoomLoopTrigger(
    recentAnswers: readonly RecentAnswer[],
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): boolean {
    const { windowSize, triggerWrongCount } = config.doomLoop;
    if (recentAnswers.length < windowSize) {
        return false;
    }
    const wrongCount = recentAnswers.slice(-windowSize).filter(a => !a.correct).length;
    return wrongCount >= triggerWrongCount;
}

export interface DoomLoopUpdate {
    state: DoomLoopState;
    entered: boolean;
    exited: boolean;
}

/**
 * Fold one answer into the session's doom-loop state
 */
export function updateDoomLoopState(
    state: DoomLoopState,
    answer: RecentAnswer,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): DoomLoopUpdate {
    const recentAnswers = [...state.recentAnswers, answer].slice(-config.doomLoop.windowSize);
    const consecutiveCorrectInSession = answer.correct ? state.consecutiveCorrectInSession + 1 : 0;

    let updated: DoomLoopState = { ...state, recentAnswers, consecutiveCorrectInSession };
    let entered = false;
    let exited = false;

    if (!updated.active && checkDoomLoopTrigger(recentAnswers, config)) {
        updated = { ...updated, active: true };
        entered = true;
    }

    if (updated.active && consecutiveCorrectInSession >= config.doomLoop.exitConsecutiveCorrect) {
        updated = { ...updated, active: false, recoveryFactId: null, questionsRemaining: 0 };
        exited = true;
    }

    return { state: updated, entered, exited };
}

/**
 * Facts answered wrongly within the current window
 */
export function getFailedFactIds(state: DoomLoopState): string[] {
    return [...new Set(state.recentAnswers.filter(a => !a.correct).map(a => a.factId))];
}

// =============================================================================
// RECOVERY CYCLE
// =============================================================================

/** Active loop with no recovery fact chosen yet */
export function needsRecoveryFact(state: DoomLoopState): boolean {
    return state.active && state.recoveryFactId === null;
}

export function beginRecovery(
    state: DoomLoopState,
    recoveryFactId: string,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): DoomLoopState {
    return { ...state, recoveryFactId, questionsRemaining: config.doomLoop.recoveryQuestions };
}

export function hasRecoveryQuestion(state: DoomLoopState): boolean {
    return state.active && state.recoveryFactId !== null && state.questionsRemaining > 0;
}

export function consumeRecoveryQuestion(state: DoomLoopState): DoomLoopState {
    return { ...state, questionsRemaining: Math.max(0, state.questionsRemaining - 1) };
}

export function clearRecovery(state: DoomLoopState): DoomLoopState {
    return { ...state, recoveryFactId: null, questionsRemaining: 0 };
}

// =============================================================================
// RECOVERY FACT SELECTION
// =============================================================================

export function getSuccessRate(
    store: ProgressStore,
    factId: string,
    userId: string,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): number {
    const attempts = store.getAttempts(factId, userId);
    if (attempts.length === 0) {
        return config.doomLoop.neutralSuccessRate;
    }
    return attempts.filter(a => a.correct).length / attempts.length;
}

/**
 * Easiest learned, unmastered fact outside the recent failures.
 * Falls back to the first unmastered learned fact, then the first learned one.
 */
export function selectRecoveryFact(
    store: ProgressStore,
    domainId: string,
    excludedFactIds: readonly string[],
    userId: string,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): Fact | null {
    const learned = getAllLearnedFacts(store, domainId, userId);
    if (learned.length === 0) {
        return null;
    }

    const unmastered = learned.filter(fact => !isMastered(store, fact.id, userId, config));
    const candidates = unmastered.filter(fact => !excludedFactIds.includes(fact.id));

    if (candidates.length === 0) {
        return unmastered[0] ?? learned[0];
    }

    let best = candidates[0];
    let bestRate = getSuccessRate(store, best.id, userId, config);
    for (const fact of candidates.slice(1)) {
        const rate = getSuccessRate(store, fact.id, userId, config);
        if (rate > bestRate) {
            best = fact;
            bestRate = rate;
        }
    }
    return best;
}
