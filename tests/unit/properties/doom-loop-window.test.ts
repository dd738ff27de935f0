/**
 * Property-Based Tests for the Doom-Loop Window
 *
 * For any answer stream within a session:
 * - the window never holds more than 4 answers
 * - the loop is entered only when the full window holds 3 or more misses
 * - the loop is left only after 3 correct answers in a row
 */

import { describe, it, expect } from 'vitest';
import {
    checkDoomLoopTrigger,
    initializeDoomLoopState,
    updateDoomLoopState,
} from '@/lib/drill-engine/agents/doom-loop-agent';
import { createSeededRandom, pickRandom } from '@/lib/drill-engine/random';
import { RecentAnswer } from '@/lib/drill-engine/types';

// Property test configuration
const PROPERTY_TEST_ITERATIONS = 100;

const random = createSeededRandom('doom-loop-properties');
const FACT_IDS = ['fact-a', 'fact-b', 'fact-c'];

function randomAnswer(correctBias: number): RecentAnswer {
    return { factId: pickRandom(random, FACT_IDS) ?? 'fact-a', correct: random() < correctBias };
}

describe('Property: Doom-Loop Window', () => {
    it('should keep a bounded window and enter only on a full window of misses', () => {
        for (let iteration = 0; iteration < PROPERTY_TEST_ITERATIONS; iteration++) {
            let state = initializeDoomLoopState();
            const bias = random();

            for (let i = 0; i < 25; i++) {
                const before = state;
                const update = updateDoomLoopState(state, randomAnswer(bias));
                state = update.state;

                expect(state.recentAnswers.length).toBeLessThanOrEqual(4);
                if (update.entered) {
                    expect(before.active).toBe(false);
                    expect(state.recentAnswers).toHaveLength(4);
                    expect(state.recentAnswers.filter(a => !a.correct).length).toBeGreaterThanOrEqual(3);
                }
                if (!before.active && !update.entered) {
                    expect(state.active).toBe(false);
                }
            }
        }
    });

    it('should exit only after three correct answers in a row', () => {
        for (let iteration = 0; iteration < PROPERTY_TEST_ITERATIONS; iteration++) {
            let state = { ...initializeDoomLoopState(), active: true };
            let streak = 0;

            for (let i = 0; i < 25 && state.active; i++) {
                const answer = randomAnswer(0.6);
                streak = answer.correct ? streak + 1 : 0;
                const update = updateDoomLoopState(state, answer);

                expect(update.exited).toBe(streak >= 3);
                expect(update.state.consecutiveCorrectInSession).toBe(streak);
                state = update.state;
            }
        }
    });

    it('should agree with the trigger on the last four answers', () => {
        for (let iteration = 0; iteration < PROPERTY_TEST_ITERATIONS; iteration++) {
            const answers = Array.from({ length: Math.floor(random() * 8) }, () => randomAnswer(0.4));
            const lastFour = answers.slice(-4);
            const expected = lastFour.length === 4 && lastFour.filter(a => !a.correct).length >= 3;

            expect(checkDoomLoopTrigger(answers)).toBe(expected);
        }
    });
});
