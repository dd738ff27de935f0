/**
 * Tests for the Progress State Machine
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
    applyConsecutiveResult,
    deriveFactStatus,
    getAllLearnedFacts,
    getAttemptCount,
    getFactStatus,
    getLearnedFacts,
    getUnlearnedFacts,
    hasTwoConsecutiveCorrect,
    isFactLearned,
    markLearned,
    markShown,
    recordAttempt,
    resetDomainProgress,
    updateConsecutive,
} from '@/lib/drill-engine/progress';
import { NotFoundError } from '@/lib/drill-engine/errors';
import { Domain, Fact, FactState } from '@/lib/drill-engine/types';
import { SqliteProgressStore } from '@/lib/db/progress-store';
import { createFakeClock, createTestStore, createTestUserId, recordResults, seedDomain } from '../utils/test-data';

const baseState: FactState = {
    id: 1,
    factId: 'fact-1',
    userId: 'user-1',
    learnedAt: new Date('2024-03-10T09:00:00.000Z'),
    lastShownAt: new Date('2024-03-10T09:00:00.000Z'),
    consecutiveCorrect: 0,
    consecutiveWrong: 0,
    version: 3,
};

describe('Progress State Machine', () => {
    describe('applyConsecutiveResult', () => {
        it('should count a correct answer and clear the wrong counter', () => {
            const { state, demoted } = applyConsecutiveResult({ ...baseState, consecutiveWrong: 1 }, true);
            expect(state.consecutiveCorrect).toBe(1);
            expect(state.consecutiveWrong).toBe(0);
            expect(demoted).toBe(false);
        });

        it('should count a wrong answer and clear the correct counter', () => {
            const { state, demoted } = applyConsecutiveResult({ ...baseState, consecutiveCorrect: 5 }, false);
            expect(state.consecutiveCorrect).toBe(0);
            expect(state.consecutiveWrong).toBe(1);
            expect(demoted).toBe(false);
        });

        it('should demote on the second consecutive wrong answer', () => {
            const { state, demoted } = applyConsecutiveResult({ ...baseState, consecutiveWrong: 1 }, false);
            expect(demoted).toBe(true);
            expect(state.learnedAt).toBeNull();
            expect(state.consecutiveCorrect).toBe(0);
            expect(state.consecutiveWrong).toBe(0);
        });

        it('should keep the version for the optimistic check', () => {
            expect(applyConsecutiveResult(baseState, true).state.version).toBe(3);
        });
    });

    describe('deriveFactStatus', () => {
        it('should map state records to statuses', () => {
            expect(deriveFactStatus(null, false)).toBe('unlearned');
            expect(deriveFactStatus({ ...baseState, learnedAt: null, lastShownAt: null }, false)).toBe('unlearned');
            expect(deriveFactStatus({ ...baseState, learnedAt: null }, false)).toBe('shown');
            expect(deriveFactStatus(baseState, false)).toBe('learned');
            expect(deriveFactStatus(baseState, true)).toBe('mastered');
        });
    });

    describe('store transitions', () => {
        let store: SqliteProgressStore;
        let domain: Domain;
        let facts: Fact[];
        let userId: string;
        const clock = createFakeClock();

        beforeEach(() => {
            store = createTestStore();
            ({ domain, facts } = seedDomain(store));
            userId = createTestUserId();
        });

        it('should start every fact unlearned', () => {
            expect(getFactStatus(store, facts[0].id, userId)).toBe('unlearned');
            expect(getUnlearnedFacts(store, domain.id, userId)).toHaveLength(5);
        });

        it('should mark a fact shown without learning it', () => {
            const state = markShown(store, facts[0].id, userId, clock.now());

            expect(state.lastShownAt?.toISOString()).toBe('2024-03-10T09:00:00.000Z');
            expect(state.learnedAt).toBeNull();
            expect(getFactStatus(store, facts[0].id, userId)).toBe('shown');
            expect(isFactLearned(store, facts[0].id, userId)).toBe(false);
        });

        it('should treat repeated markShown as the same state', () => {
            markShown(store, facts[0].id, userId, clock.now());
            markShown(store, facts[0].id, userId, clock.now());

            expect(getFactStatus(store, facts[0].id, userId)).toBe('shown');
            expect(store.getFactState(facts[0].id, userId)?.version).toBe(2);
        });

        it('should mark a fact learned', () => {
            const learnedAt = new Date('2024-03-10T10:00:00.000Z');
            const state = markLearned(store, facts[1].id, userId, learnedAt);

            expect(state.learnedAt?.toISOString()).toBe('2024-03-10T10:00:00.000Z');
            expect(state.lastShownAt?.toISOString()).toBe('2024-03-10T10:00:00.000Z');
            expect(getFactStatus(store, facts[1].id, userId)).toBe('learned');
        });

        it('should report mastered once the attempt window qualifies', () => {
            markLearned(store, facts[0].id, userId);
            recordResults(store, facts[0].id, userId, [true, true, true, true, true, true, true]);

            expect(getFactStatus(store, facts[0].id, userId)).toBe('mastered');
            expect(getLearnedFacts(store, domain.id, userId)).toEqual([]);
            expect(getAllLearnedFacts(store, domain.id, userId).map(f => f.id)).toEqual([facts[0].id]);
        });

        it('should not report mastered for a fact that was never learned', () => {
            recordResults(store, facts[0].id, userId, [true, true, true, true, true, true, true]);
            expect(getFactStatus(store, facts[0].id, userId)).toBe('unlearned');
        });

        it('should throw NotFoundError for an unknown fact', () => {
            expect(() => markShown(store, 'missing-fact', userId)).toThrow(NotFoundError);
            expect(() => markLearned(store, 'missing-fact', userId)).toThrow(NotFoundError);
            expect(() => recordAttempt(store, {
                factId: 'missing-fact',
                fieldName: 'name',
                correct: true,
                userId,
                sessionId: null,
            })).toThrow(NotFoundError);
            expect(getAttemptCount(store, 'missing-fact', userId)).toBe(0);
        });

        it('should append attempts without touching counters', () => {
            const attempt = recordAttempt(store, {
                factId: facts[0].id,
                fieldName: 'symbol',
                correct: true,
                userId,
                sessionId: 'session-1',
                timestamp: clock.now(),
            });

            expect(attempt.fieldName).toBe('symbol');
            expect(getAttemptCount(store, facts[0].id, userId)).toBe(1);
            expect(store.getFactState(facts[0].id, userId)).toBeNull();
        });

        it('should demote after exactly two consecutive wrong answers', () => {
            markLearned(store, facts[0].id, userId);

            expect(updateConsecutive(store, facts[0].id, userId, false)).toBe(false);
            expect(updateConsecutive(store, facts[0].id, userId, false)).toBe(true);

            const state = store.getFactState(facts[0].id, userId);
            expect(state?.learnedAt).toBeNull();
            expect(state?.consecutiveWrong).toBe(0);
            expect(getFactStatus(store, facts[0].id, userId)).toBe('shown');
        });

        it('should not demote when wrong answers are interrupted by a correct one', () => {
            markLearned(store, facts[0].id, userId);

            updateConsecutive(store, facts[0].id, userId, false);
            updateConsecutive(store, facts[0].id, userId, true);
            expect(updateConsecutive(store, facts[0].id, userId, false)).toBe(false);
            expect(isFactLearned(store, facts[0].id, userId)).toBe(true);
        });

        it('should demote even after a long correct streak', () => {
            markLearned(store, facts[0].id, userId);
            for (let i = 0; i < 10; i++) {
                updateConsecutive(store, facts[0].id, userId, true);
            }

            updateConsecutive(store, facts[0].id, userId, false);
            expect(updateConsecutive(store, facts[0].id, userId, false)).toBe(true);
        });

        it('should detect two consecutive correct answers', () => {
            markLearned(store, facts[0].id, userId);
            expect(hasTwoConsecutiveCorrect(store, facts[0].id, userId)).toBe(false);

            updateConsecutive(store, facts[0].id, userId, true);
            expect(hasTwoConsecutiveCorrect(store, facts[0].id, userId)).toBe(false);

            updateConsecutive(store, facts[0].id, userId, true);
            expect(hasTwoConsecutiveCorrect(store, facts[0].id, userId)).toBe(true);
        });

        it('should list learned facts in creation order', () => {
            markLearned(store, facts[3].id, userId);
            markLearned(store, facts[1].id, userId);

            expect(getLearnedFacts(store, domain.id, userId).map(f => f.id)).toEqual([facts[1].id, facts[3].id]);
            expect(getUnlearnedFacts(store, domain.id, userId).map(f => f.id)).toEqual([
                facts[0].id,
                facts[2].id,
                facts[4].id,
            ]);
        });

        it('should reset only the given user\'s progress', () => {
            const otherUser = createTestUserId();
            markLearned(store, facts[0].id, userId);
            markLearned(store, facts[0].id, otherUser);
            recordResults(store, facts[0].id, userId, [true, false]);
            recordResults(store, facts[0].id, otherUser, [true]);

            resetDomainProgress(store, domain.id, userId);

            expect(getFactStatus(store, facts[0].id, userId)).toBe('unlearned');
            expect(getAttemptCount(store, facts[0].id, userId)).toBe(0);
            expect(getFactStatus(store, facts[0].id, otherUser)).toBe('learned');
            expect(getAttemptCount(store, facts[0].id, otherUser)).toBe(1);
        });

        it('should refuse to reset an unknown domain', () => {
            expect(() => resetDomainProgress(store, 'missing-domain', userId)).toThrow(NotFoundError);
        });
    });
});
