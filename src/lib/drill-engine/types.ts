/**
 * Drill Engine - Core Types
 *
 * Shared data plane for the progress state machine, the fact selector,
 * the question generator and the doom-loop agent.
 */

// =============================================================================
// DOMAIN CONTENT
// =============================================================================

export type FieldValues = Record<string, string>;

export interface Domain {
    id: string;
    name: string;                 // Display name, usually plural ("Greek Muses")
    fieldNames: string[];         // Ordered; first entry is the identifying field
}

export interface Fact {
    id: string;
    domainId: string;
    position: number;             // Creation order within the domain
    values: FieldValues;
}

// =============================================================================
// LEARNING PROGRESS
// =============================================================================

export interface Attempt {
    id: number;
    factId: string;
    userId: string;
    fieldName: string;            // The quizzed field
    correct: boolean;
    timestamp: Date;
    sessionId: string | null;     // Opaque, only used for engagement counts
}

export interface FactState {
    id: number;
    factId: string;
    userId: string;
    learnedAt: Date | null;       // null = not learned
    lastShownAt: Date | null;
    consecutiveCorrect: number;
    consecutiveWrong: number;
    version: number;              // Optimistic concurrency token
}

export type FactStatus = 'unlearned' | 'shown' | 'learned' | 'mastered';

export interface StreakState {
    userId: string;
    currentStreak: number;
    longestStreak: number;
    lastPracticeDate: string | null;  // Calendar day, YYYY-MM-DD (UTC)
    dailyGoal: number;
}

// =============================================================================
// QUESTIONS
// =============================================================================

export interface BuiltQuestion {
    questionText: string;
    options: string[];
    correctIndex: number;
    correctAnswer: string;
}

export interface QuestionPayload extends BuiltQuestion {
    factId: string;
    contextField: string;
    quizField: string;
    questionKey: string;          // "factId:contextField:quizField"
}

export interface AnswerEvaluation {
    correct: boolean;
    selectedAnswer: string;
    acceptedAlternative: boolean; // Matched another fact sharing the context value
}

// =============================================================================
// SESSION STATE (owned by the caller, passed in and out by value)
// =============================================================================

export interface RecentAnswer {
    factId: string;
    correct: boolean;
}

export interface DoomLoopState {
    active: boolean;
    recentAnswers: RecentAnswer[];        // Rolling window
    consecutiveCorrectInSession: number;
    recoveryFactId: string | null;
    questionsRemaining: number;
}

export interface DrillSessionState {
    sessionId: string;
    userId: string;
    domainId: string;
    questionCount: number;

    doomLoop: DoomLoopState;

    // Newly learned fact that must be answered correctly twice in a row
    pendingQuizFactId: string | null;
    // Review question scheduled after a fact proved itself
    pendingReviewFactId: string | null;
    justCompletedFactId: string | null;

    lastQuestionKey: string | null;
    currentQuestion: QuestionPayload | null;

    // Fully mastered domains: keep exercising the least recently attempted fact
    reviewMastered: boolean;
}

export type SelectionReason =
    | 'DOOM_LOOP_RECOVERY'
    | 'PENDING_NEW_FACT'
    | 'PENDING_REVIEW'
    | 'REINFORCEMENT'
    | 'LEAST_PRACTICED'
    | 'REVIEW_MASTERED'
    | 'UNLEARNED'
    | 'OUT_OF_ORDER'
    | 'DEMOTED'
    | 'WRONG_ANSWER';

export type DrillStep =
    | {
        kind: 'show_fact';
        fact: Fact;
        domain: Domain;
        highlightField: string | null;
        reason: SelectionReason;
    }
    | {
        kind: 'question';
        question: QuestionPayload;
        reason: SelectionReason;
    }
    | {
        kind: 'complete';
    };

// Why a fact is shown again right after an answer
export type FollowUpReason = Extract<SelectionReason, 'DEMOTED' | 'WRONG_ANSWER'>;

export type AnswerFollowUp =
    | { kind: 'show_fact'; factId: string; highlightField: string; reason: FollowUpReason }
    | { kind: 'question' };

export interface AnswerOutcome {
    correct: boolean;
    acceptedAlternative: boolean;
    selectedAnswer: string;
    correctAnswer: string;
    demoted: boolean;
    doomLoopEntered: boolean;
    doomLoopExited: boolean;
    reviewScheduledFactId: string | null;
    streak: StreakState;
    next: AnswerFollowUp;
}

// =============================================================================
// PERSISTENCE COLLABORATOR
// =============================================================================

export interface NewAttempt {
    factId: string;
    userId: string;
    fieldName: string;
    correct: boolean;
    sessionId: string | null;
    timestamp: Date;
}

export interface NewDomain {
    name: string;
    fieldNames: string[];
    facts: FieldValues[];
}

/**
 * Storage contract the engine runs against. Every write is atomic per record;
 * `updateFactState` rejects a stale `version` with a StateConflictError.
 */
export interface ProgressStore {
    getDomain(domainId: string): Domain | null;
    getFacts(domainId: string): Fact[];
    getFact(factId: string): Fact | null;
    createDomain(input: NewDomain): Domain;

    /** Newest first */
    getAttempts(factId: string, userId: string, limit?: number): Attempt[];
    countAttempts(factId: string, userId: string): number;
    appendAttempt(input: NewAttempt): Attempt;
    countAttemptsSince(userId: string, since: Date): number;
    countSessions(userId: string): number;
    /** Oldest first */
    getUserAttemptTimes(userId: string, domainId?: string): Date[];

    getFactState(factId: string, userId: string): FactState | null;
    getOrCreateFactState(factId: string, userId: string): FactState;
    updateFactState(state: FactState): FactState;
    deleteProgress(domainId: string, userId: string): void;

    getStreakState(userId: string): StreakState;
    updateStreakState(state: StreakState): void;

    transaction<T>(fn: () => T): T;
}

// =============================================================================
// EVENT TYPES (For event bus)
// =============================================================================

export interface AnswerRecordedEvent {
    type: 'answer_recorded';
    timestampMs: number;
    sessionId: string;
    userId: string;
    factId: string;
    fieldName: string;
    correct: boolean;
    acceptedAlternative: boolean;
}

export interface FactLearnedEvent {
    type: 'fact_learned';
    timestampMs: number;
    sessionId: string;
    userId: string;
    factId: string;
}

export interface FactDemotedEvent {
    type: 'fact_demoted';
    timestampMs: number;
    sessionId: string;
    userId: string;
    factId: string;
}

export interface DoomLoopEnteredEvent {
    type: 'doom_loop_entered';
    timestampMs: number;
    sessionId: string;
    userId: string;
    recentAnswers: RecentAnswer[];
}

export interface DoomLoopExitedEvent {
    type: 'doom_loop_exited';
    timestampMs: number;
    sessionId: string;
    userId: string;
}

export interface StreakUpdatedEvent {
    type: 'streak_updated';
    timestampMs: number;
    userId: string;
    currentStreak: number;
    longestStreak: number;
}

export type DrillEvent =
    | AnswerRecordedEvent
    | FactLearnedEvent
    | FactDemotedEvent
    | DoomLoopEnteredEvent
    | DoomLoopExitedEvent
    | StreakUpdatedEvent;

export interface DrillEventSink {
    emit(event: DrillEvent): void;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface DrillEngineConfig {
    mastery: {
        windowSize: number;                      // Default: 7
        requiredCorrect: number;                 // Default: 6
    };

    progress: {
        demoteAfterConsecutiveWrong: number;     // Default: 2
        provenAfterConsecutiveCorrect: number;   // Default: 2
    };

    selection: {
        reinforcementInterval: number;           // Default: 10
    };

    questions: {
        optionCount: number;                     // Default: 4
        fieldPairRetries: number;                // Default: 10
        placeholderPrefix: string;               // Default: "Option"
    };

    doomLoop: {
        windowSize: number;                      // Default: 4
        triggerWrongCount: number;               // Default: 3
        exitConsecutiveCorrect: number;          // Default: 3
        recoveryQuestions: number;               // Default: 2
        neutralSuccessRate: number;              // Default: 0.5
    };

    streak: {
        defaultDailyGoal: number;                // Default: 20
    };
}

// Default configuration
export const DEFAULT_DRILL_CONFIG: DrillEngineConfig = {
    mastery: {
        windowSize: 7,
        requiredCorrect: 6,
    },
    progress: {
        demoteAfterConsecutiveWrong: 2,
        provenAfterConsecutiveCorrect: 2,
    },
    selection: {
        reinforcementInterval: 10,
    },
    questions: {
        optionCount: 4,
        fieldPairRetries: 10,
        placeholderPrefix: 'Option',
    },
    doomLoop: {
        windowSize: 4,
        triggerWrongCount: 3,
        exitConsecutiveCorrect: 3,
        recoveryQuestions: 2,
        neutralSuccessRate: 0.5,
    },
    streak: {
        defaultDailyGoal: 20,
    },
};

// =============================================================================
// ENGINE CONTEXT
// =============================================================================

/** Uniform float in [0, 1) */
export type RandomSource = () => number;

export interface DrillContext {
    store: ProgressStore;
    userId: string;
    config: DrillEngineConfig;
    random: RandomSource;
    clock: () => Date;
    events?: DrillEventSink;
}
