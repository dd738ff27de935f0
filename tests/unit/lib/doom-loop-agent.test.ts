/**
 * Tests for the Doom-Loop Agent
 *
 * Trigger detection, rolling window updates, exit after consecutive correct
 * answers and recovery fact selection.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
    beginRecovery,
    checkDoomLoopTrigger,
    clearRecovery,
    consumeRecoveryQuestion,
    getFailedFactIds,
    getSuccessRate,
    hasRecoveryQuestion,
    initializeDoomLoopState,
    needsRecoveryFact,
    selectRecoveryFact,
    updateDoomLoopState,
} from '@/lib/drill-engine/agents/doom-loop-agent';
import { markLearned } from '@/lib/drill-engine/progress';
import { DoomLoopState, Domain, Fact, RecentAnswer } from '@/lib/drill-engine/types';
import { SqliteProgressStore } from '@/lib/db/progress-store';
import { createTestStore, createTestUserId, recordResults, seedDomain } from '../utils/test-data';

const answers = (...results: boolean[]): RecentAnswer[] =>
    results.map((correct, i) => ({ factId: `fact-${i}`, correct }));

function feed(state: DoomLoopState, results: boolean[]): DoomLoopState {
    return results.reduce((current, correct) => updateDoomLoopState(current, { factId: 'fact-x', correct }).state, state);
}

describe('Doom-Loop Agent', () => {
    describe('checkDoomLoopTrigger', () => {
        it('should not trigger before the window is full', () => {
            expect(checkDoomLoopTrigger(answers(false, false, false))).toBe(false);
        });

        it('should trigger on 3 wrong out of 4', () => {
            expect(checkDoomLoopTrigger(answers(false, true, false, false))).toBe(true);
            expect(checkDoomLoopTrigger(answers(false, false, false, false))).toBe(true);
        });

        it('should not trigger on 2 wrong out of 4', () => {
            expect(checkDoomLoopTrigger(answers(true, false, true, false))).toBe(false);
        });

        it('should only look at the last 4 answers', () => {
            expect(checkDoomLoopTrigger(answers(false, false, true, true, false, true))).toBe(false);
        });
    });

    describe('updateDoomLoopState', () => {
        it('should keep a rolling window of 4 answers', () => {
            const state = feed(initializeDoomLoopState(), [true, true, true, true, true, true]);
            expect(state.recentAnswers).toHaveLength(4);
        });

        it('should enter the loop on the answer that completes the pattern', () => {
            const state = feed(initializeDoomLoopState(), [true, false, false]);
            expect(state.active).toBe(false);

            const update = updateDoomLoopState(state, { factId: 'fact-x', correct: false });
            expect(update.entered).toBe(true);
            expect(update.state.active).toBe(true);
        });

        it('should not re-enter while already active', () => {
            const active = feed(initializeDoomLoopState(), [false, false, false, false]);
            const update = updateDoomLoopState(active, { factId: 'fact-x', correct: false });

            expect(update.entered).toBe(false);
            expect(update.state.active).toBe(true);
        });

        it('should track consecutive correct answers in the session', () => {
            const state = feed(initializeDoomLoopState(), [true, true, false, true, true]);
            expect(state.consecutiveCorrectInSession).toBe(2);
        });

        it('should exit after 3 consecutive correct answers and drop recovery', () => {
            let state = feed(initializeDoomLoopState(), [false, false, false, false]);
            state = beginRecovery(state, 'fact-recovery');
            state = feed(state, [true, true]);
            expect(state.active).toBe(true);

            const update = updateDoomLoopState(state, { factId: 'fact-recovery', correct: true });
            expect(update.exited).toBe(true);
            expect(update.state.active).toBe(false);
            expect(update.state.recoveryFactId).toBeNull();
            expect(update.state.questionsRemaining).toBe(0);
        });

        it('should not report an exit when the loop was never active', () => {
            const update = updateDoomLoopState(feed(initializeDoomLoopState(), [true, true]), { factId: 'a', correct: true });
            expect(update.exited).toBe(false);
        });
    });

    describe('recovery cycle', () => {
        it('should need a recovery fact only while active without one', () => {
            const active = feed(initializeDoomLoopState(), [false, false, false, false]);
            expect(needsRecoveryFact(initializeDoomLoopState())).toBe(false);
            expect(needsRecoveryFact(active)).toBe(true);
            expect(needsRecoveryFact(beginRecovery(active, 'fact-1'))).toBe(false);
        });

        it('should force two questions, then run dry', () => {
            const active = feed(initializeDoomLoopState(), [false, false, false, false]);
            let state = beginRecovery(active, 'fact-1');
            expect(state.questionsRemaining).toBe(2);
            expect(hasRecoveryQuestion(state)).toBe(true);

            state = consumeRecoveryQuestion(state);
            expect(hasRecoveryQuestion(state)).toBe(true);

            state = consumeRecoveryQuestion(state);
            expect(hasRecoveryQuestion(state)).toBe(false);
            expect(state.recoveryFactId).toBe('fact-1');

            state = clearRecovery(state);
            expect(needsRecoveryFact(state)).toBe(true);
        });

        it('should list each failed fact once', () => {
            const state: DoomLoopState = {
                ...initializeDoomLoopState(),
                recentAnswers: [
                    { factId: 'a', correct: false },
                    { factId: 'b', correct: true },
                    { factId: 'a', correct: false },
                    { factId: 'c', correct: false },
                ],
            };
            expect(getFailedFactIds(state)).toEqual(['a', 'c']);
        });
    });

    describe('selectRecoveryFact', () => {
        let store: SqliteProgressStore;
        let domain: Domain;
        let facts: Fact[];
        let userId: string;

        beforeEach(() => {
            store = createTestStore();
            ({ domain, facts } = seedDomain(store));
            userId = createTestUserId();
        });

        it('should return null when nothing is learned', () => {
            expect(selectRecoveryFact(store, domain.id, [], userId)).toBeNull();
        });

        it('should prefer the highest success rate', () => {
            [0, 1, 2, 3].forEach(i => markLearned(store, facts[i].id, userId));
            recordResults(store, facts[0].id, userId, [true, false]);
            recordResults(store, facts[1].id, userId, [true, true, false]);
            recordResults(store, facts[3].id, userId, [false]);

            expect(selectRecoveryFact(store, domain.id, [], userId)?.id).toBe(facts[1].id);
        });

        it('should score a fact without attempts as neutral', () => {
            [0, 1].forEach(i => markLearned(store, facts[i].id, userId));
            recordResults(store, facts[0].id, userId, [true, false, false, true, false]);

            expect(getSuccessRate(store, facts[1].id, userId)).toBe(0.5);
            expect(selectRecoveryFact(store, domain.id, [], userId)?.id).toBe(facts[1].id);
        });

        it('should break ties by creation order', () => {
            [0, 1, 2, 3].forEach(i => markLearned(store, facts[i].id, userId));
            recordResults(store, facts[0].id, userId, [true, false]);
            recordResults(store, facts[1].id, userId, [true, true, false]);
            recordResults(store, facts[3].id, userId, [false]);

            // facts[0] (1/2) and facts[2] (neutral) tie once facts[1] is excluded
            expect(selectRecoveryFact(store, domain.id, [facts[1].id], userId)?.id).toBe(facts[0].id);
        });

        it('should skip mastered facts', () => {
            [0, 1].forEach(i => markLearned(store, facts[i].id, userId));
            recordResults(store, facts[0].id, userId, [true, true, true, true, true, true, true]);
            recordResults(store, facts[1].id, userId, [false]);

            expect(selectRecoveryFact(store, domain.id, [], userId)?.id).toBe(facts[1].id);
        });

        it('should fall back to the first unmastered fact when all are excluded', () => {
            [0, 1, 2].forEach(i => markLearned(store, facts[i].id, userId));
            recordResults(store, facts[0].id, userId, [true, true, true, true, true, true, true]);

            const excluded = [facts[1].id, facts[2].id];
            expect(selectRecoveryFact(store, domain.id, excluded, userId)?.id).toBe(facts[1].id);
        });

        it('should fall back to the first learned fact when all are mastered', () => {
            [1, 2].forEach(i => markLearned(store, facts[i].id, userId));
            recordResults(store, facts[1].id, userId, [true, true, true, true, true, true, true]);
            recordResults(store, facts[2].id, userId, [true, true, true, true, true, true, true]);

            expect(selectRecoveryFact(store, domain.id, [], userId)?.id).toBe(facts[1].id);
        });
    });
});
