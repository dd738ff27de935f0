/**
 * Drill Engine - Session Orchestrator
 *
 * Drives one learner session: show -> learn -> quiz -> answer.
 * Every call takes the session value object and returns a new one; durable
 * progress lives in the ProgressStore.
 *
 * Turn order in nextStep:
 * 1. Doom-loop recovery (show the recovery fact, then forced questions)
 * 2. Pending newly learned fact (until proven)
 * 3. Pending review fact
 * 4. Review-mastered mode, when enabled and nothing is unlearned
 * 5. Fact Selector (reinforcement / least practiced)
 * 6. Next fact to show (out-of-order repair, least recently shown)
 * 7. Complete
 */

import { v4 as uuid } from 'uuid';
import {
    AnswerFollowUp,
    AnswerOutcome,
    Domain,
    DrillContext,
    DrillSessionState,
    DrillStep,
    Fact,
    FollowUpReason,
    SelectionReason,
} from './types';
import { NotFoundError, ValidationFailureError, withConflictRetry } from './errors';
import {
    getUnlearnedFacts,
    hasTwoConsecutiveCorrect,
    isFactLearned,
    markLearned,
    markShown,
    recordAttempt,
    requireFact,
    resetDomainProgress,
    updateConsecutive,
} from './progress';
import {
    getNextFactToShow,
    selectLeastRecentlyAttemptedFact,
    selectNextFactWithReason,
    selectReviewFact,
} from './fact-selector';
import { evaluateAnswer, prepareQuestionForFact } from './question-generator';
import {
    beginRecovery,
    clearRecovery,
    consumeRecoveryQuestion,
    getFailedFactIds,
    hasRecoveryQuestion,
    initializeDoomLoopState,
    needsRecoveryFact,
    selectRecoveryFact,
    updateDoomLoopState,
} from './agents/doom-loop-agent';
import { updateStreak } from './streak';
import { createAnswerRecordedEvent, createDoomLoopEnteredEvent } from './event-bus';
import { drillLog } from '@/lib/debug';

export interface StepResult {
    session: DrillSessionState;
    step: DrillStep;
}

export interface AnswerResult {
    session: DrillSessionState;
    outcome: AnswerOutcome;
}

// =============================================================================
// SESSION STATE
// =============================================================================

export function createSessionState(userId: string, domainId: string, sessionId: string = uuid()): DrillSessionState {
    return {
        sessionId,
        userId,
        domainId,
        questionCount: 0,
        doomLoop: initializeDoomLoopState(),
        pendingQuizFactId: null,
        pendingReviewFactId: null,
        justCompletedFactId: null,
        lastQuestionKey: null,
        currentQuestion: null,
        reviewMastered: false,
    };
}

function requireDomain(ctx: DrillContext, domainId: string): Domain {
    const domain = ctx.store.getDomain(domainId);
    if (!domain) {
        throw new NotFoundError('domain', domainId);
    }
    return domain;
}

function assertSessionOwner(ctx: DrillContext, session: DrillSessionState): void {
    if (session.userId !== ctx.userId) {
        throw new ValidationFailureError('Session belongs to a different user', {
            sessionId: session.sessionId,
        });
    }
}

// =============================================================================
// STEP BUILDERS
// =============================================================================

function showFact(
    ctx: DrillContext,
    session: DrillSessionState,
    domain: Domain,
    fact: Fact,
    reason: SelectionReason,
    highlightField: string | null = null
): StepResult {
    markShown(ctx.store, fact.id, ctx.userId, ctx.clock());
    return {
        session: { ...session, currentQuestion: null },
        step: { kind: 'show_fact', fact, domain, highlightField, reason },
    };
}

function askQuestion(
    ctx: DrillContext,
    session: DrillSessionState,
    domain: Domain,
    fact: Fact,
    reason: SelectionReason
): StepResult {
    const allFacts = ctx.store.getFacts(domain.id);
    const question = prepareQuestionForFact(fact, allFacts, domain, session.lastQuestionKey, ctx.random, ctx.config);
    return {
        session: { ...session, currentQuestion: question, lastQuestionKey: question.questionKey },
        step: { kind: 'question', question, reason },
    };
}

// =============================================================================
// MAIN ORCHESTRATOR FUNCTIONS
// =============================================================================

export function startSession(ctx: DrillContext, domainId: string): StepResult {
    requireDomain(ctx, domainId);
    const session = createSessionState(ctx.userId, domainId);
    drillLog.sessionStart(ctx.userId, session.sessionId, domainId);
    return nextStep(ctx, session);
}

/**
 * Decide what the learner sees next
 */
export function nextStep(ctx: DrillContext, current: DrillSessionState): StepResult {
    assertSessionOwner(ctx, current);
    const { store, userId, config } = ctx;
    const domain = requireDomain(ctx, current.domainId);

    let session: DrillSessionState = { ...current, questionCount: current.questionCount + 1 };

    // Step 1: Doom-loop recovery
    if (needsRecoveryFact(session.doomLoop)) {
        const recovery = selectRecoveryFact(store, domain.id, getFailedFactIds(session.doomLoop), userId, config);
        if (recovery) {
            drillLog.recoveryFactSelected(userId, session.sessionId, recovery.id);
            session = { ...session, doomLoop: beginRecovery(session.doomLoop, recovery.id, config) };
            return showFact(ctx, session, domain, recovery, 'DOOM_LOOP_RECOVERY');
        }
    }

    if (session.doomLoop.recoveryFactId !== null) {
        const recovery = hasRecoveryQuestion(session.doomLoop) ? store.getFact(session.doomLoop.recoveryFactId) : null;
        if (recovery) {
            session = { ...session, doomLoop: consumeRecoveryQuestion(session.doomLoop) };
            return askQuestion(ctx, session, domain, recovery, 'DOOM_LOOP_RECOVERY');
        }
        // Cycle finished; the next call starts a new one while the loop is active
        session = { ...session, doomLoop: clearRecovery(session.doomLoop) };
    }

    // Step 2: Newly learned fact must prove itself
    if (session.pendingQuizFactId !== null) {
        const pendingId = session.pendingQuizFactId;
        const pending = store.getFact(pendingId);
        if (pending && isFactLearned(store, pendingId, userId) && !hasTwoConsecutiveCorrect(store, pendingId, userId, config)) {
            return askQuestion(ctx, session, domain, pending, 'PENDING_NEW_FACT');
        }
        session = { ...session, pendingQuizFactId: null };
    }

    // Step 3: Review question after a fact proved itself
    if (session.pendingReviewFactId !== null) {
        const review = store.getFact(session.pendingReviewFactId);
        if (review) {
            return askQuestion(ctx, session, domain, review, 'PENDING_REVIEW');
        }
        session = { ...session, pendingReviewFactId: null, justCompletedFactId: null };
    }

    // Step 4: Review mode ignores mastery and the reinforcement cadence
    if (session.reviewMastered && getUnlearnedFacts(store, domain.id, userId).length === 0) {
        const oldest = selectLeastRecentlyAttemptedFact(store, domain.id, userId);
        if (oldest) {
            return askQuestion(ctx, session, domain, oldest, 'REVIEW_MASTERED');
        }
    }

    // Step 5: Normal selection
    const selection = selectNextFactWithReason(store, domain.id, session.questionCount, userId, ctx.random, config);
    if (selection) {
        return askQuestion(ctx, session, domain, selection.fact, selection.reason);
    }

    // Step 6: Something still needs to be shown
    const toShow = getNextFactToShow(store, domain.id, userId);
    if (toShow) {
        return showFact(ctx, session, domain, toShow.fact, toShow.reason);
    }

    return { session: { ...session, currentQuestion: null }, step: { kind: 'complete' } };
}

/**
 * The learner confirmed a displayed fact; it must now be answered
 * correctly twice in a row
 */
export function acknowledgeFact(ctx: DrillContext, session: DrillSessionState, factId: string): DrillSessionState {
    assertSessionOwner(ctx, session);
    const fact = requireFact(ctx.store, factId);
    if (fact.domainId !== session.domainId) {
        throw new ValidationFailureError('Fact does not belong to the session domain', {
            factId,
            domainId: session.domainId,
        });
    }

    const now = ctx.clock();
    markLearned(ctx.store, factId, ctx.userId, now);
    drillLog.factLearned(ctx.userId, factId);
    ctx.events?.emit({
        type: 'fact_learned',
        timestampMs: now.getTime(),
        sessionId: session.sessionId,
        userId: ctx.userId,
        factId,
    });

    return { ...session, pendingQuizFactId: factId };
}

/**
 * Grade the current question and decide the follow-up
 */
export function submitAnswer(ctx: DrillContext, current: DrillSessionState, selectedIndex: number): AnswerResult {
    assertSessionOwner(ctx, current);
    const question = current.currentQuestion;
    if (!question) {
        throw new ValidationFailureError('No question is awaiting an answer', { sessionId: current.sessionId });
    }

    const { store, userId, config } = ctx;
    const now = ctx.clock();
    const allFacts = store.getFacts(current.domainId);
    const evaluation = evaluateAnswer(question, selectedIndex, allFacts);
    const { factId, quizField } = question;
    const correct = evaluation.correct;

    recordAttempt(store, {
        factId,
        fieldName: quizField,
        correct,
        userId,
        sessionId: current.sessionId,
        timestamp: now,
    });
    drillLog.answer(userId, current.sessionId, factId, correct, evaluation.acceptedAlternative);
    ctx.events?.emit(createAnswerRecordedEvent(
        current.sessionId, userId, factId, quizField, correct, evaluation.acceptedAlternative, now
    ));

    // A second conflict propagates here, before the doom-loop window moves
    const demoted = withConflictRetry(
        () => updateConsecutive(store, factId, userId, correct, config),
        error => drillLog.stateConflict(userId, factId, error.message)
    );

    const doom = updateDoomLoopState(current.doomLoop, { factId, correct }, config);
    if (doom.entered) {
        const wrongCount = doom.state.recentAnswers.filter(a => !a.correct).length;
        drillLog.doomLoopEntered(userId, current.sessionId, wrongCount);
        ctx.events?.emit(createDoomLoopEnteredEvent(current.sessionId, userId, doom.state.recentAnswers, now));
    }
    if (doom.exited) {
        drillLog.doomLoopExited(userId, current.sessionId);
        ctx.events?.emit({ type: 'doom_loop_exited', timestampMs: now.getTime(), sessionId: current.sessionId, userId });
    }

    const streak = updateStreak(store, userId, now);
    if (streak.changed) {
        drillLog.streakUpdated(userId, streak.state.currentStreak, streak.state.longestStreak);
        ctx.events?.emit({
            type: 'streak_updated',
            timestampMs: now.getTime(),
            userId,
            currentStreak: streak.state.currentStreak,
            longestStreak: streak.state.longestStreak,
        });
    }

    const wasReview = factId === current.pendingReviewFactId;
    const showAgain = (reason: FollowUpReason): AnswerFollowUp => ({
        kind: 'show_fact',
        factId,
        highlightField: quizField,
        reason,
    });

    let session: DrillSessionState = { ...current, doomLoop: doom.state, currentQuestion: null };
    let next: AnswerFollowUp;
    let reviewScheduledFactId: string | null = null;

    if (demoted) {
        drillLog.factDemoted(userId, factId);
        ctx.events?.emit({ type: 'fact_demoted', timestampMs: now.getTime(), sessionId: current.sessionId, userId, factId });
        session = {
            ...session,
            pendingQuizFactId: null,
            pendingReviewFactId: null,
            justCompletedFactId: null,
            doomLoop: clearRecovery(session.doomLoop),
        };
        markShown(store, factId, userId, now);
        next = showAgain('DEMOTED');
    } else if (wasReview) {
        session = { ...session, pendingReviewFactId: null, justCompletedFactId: null };
        next = correct ? { kind: 'question' } : showAgain('WRONG_ANSWER');
    } else if (correct) {
        if (factId === session.pendingQuizFactId && hasTwoConsecutiveCorrect(store, factId, userId, config)) {
            session = { ...session, pendingQuizFactId: null };
            const review = selectReviewFact(store, current.domainId, userId, factId, ctx.random, config);
            if (review) {
                reviewScheduledFactId = review.id;
                session = { ...session, pendingReviewFactId: review.id, justCompletedFactId: factId };
            }
        }
        next = { kind: 'question' };
    } else {
        next = showAgain('WRONG_ANSWER');
    }

    return {
        session,
        outcome: {
            correct,
            acceptedAlternative: evaluation.acceptedAlternative,
            selectedAnswer: evaluation.selectedAnswer,
            correctAnswer: question.correctAnswer,
            demoted,
            doomLoopEntered: doom.entered,
            doomLoopExited: doom.exited,
            reviewScheduledFactId,
            streak: streak.state,
            next,
        },
    };
}

/**
 * Keep quizzing a fully mastered domain instead of completing
 */
export function enableReviewMode(session: DrillSessionState): DrillSessionState {
    return { ...session, reviewMastered: true };
}

/**
 * Wipe the user's progress on the session domain and start the session over
 */
export function resetDomain(ctx: DrillContext, session: DrillSessionState): DrillSessionState {
    assertSessionOwner(ctx, session);
    resetDomainProgress(ctx.store, session.domainId, ctx.userId);
    drillLog.progressReset(ctx.userId, session.domainId);
    return createSessionState(ctx.userId, session.domainId, session.sessionId);
}
