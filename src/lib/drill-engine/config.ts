/**
 * Drill Engine - Configuration
 *
 * Defaults live in DEFAULT_DRILL_CONFIG (types.ts). Deployments may override
 * individual thresholds in code or through DRILL_* environment variables.
 */

import { DEFAULT_DRILL_CONFIG, DrillEngineConfig } from './types';
import { ValidationFailureError } from './errors';

export type DrillConfigOverrides = {
    [Section in keyof DrillEngineConfig]?: Partial<DrillEngineConfig[Section]>;
};

/**
 * Merge section-level overrides onto a base configuration
 */
export function resolveDrillConfig(
    overrides: DrillConfigOverrides = {},
    base: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): DrillEngineConfig {
    const config: DrillEngineConfig = {
        mastery: { ...base.mastery, ...overrides.mastery },
        progress: { ...base.progress, ...overrides.progress },
        selection: { ...base.selection, ...overrides.selection },
        questions: { ...base.questions, ...overrides.questions },
        doomLoop: { ...base.doomLoop, ...overrides.doomLoop },
        streak: { ...base.streak, ...overrides.streak },
    };
    assertValidConfig(config);
    return config;
}

function assertValidConfig(config: DrillEngineConfig): void {
    const { mastery, doomLoop, questions, selection, progress, streak } = config;

    if (mastery.requiredCorrect > mastery.windowSize) {
        throw new ValidationFailureError('mastery.requiredCorrect cannot exceed mastery.windowSize', { ...mastery });
    }
    if (doomLoop.triggerWrongCount > doomLoop.windowSize) {
        throw new ValidationFailureError('doomLoop.triggerWrongCount cannot exceed doomLoop.windowSize', { ...doomLoop });
    }
    if (questions.optionCount < 2) {
        throw new ValidationFailureError('questions.optionCount must be at least 2', { ...questions });
    }

    const positive: Array<[string, number]> = [
        ['mastery.windowSize', mastery.windowSize],
        ['progress.demoteAfterConsecutiveWrong', progress.demoteAfterConsecutiveWrong],
        ['progress.provenAfterConsecutiveCorrect', progress.provenAfterConsecutiveCorrect],
        ['selection.reinforcementInterval', selection.reinforcementInterval],
        ['questions.fieldPairRetries', questions.fieldPairRetries],
        ['doomLoop.exitConsecutiveCorrect', doomLoop.exitConsecutiveCorrect],
        ['doomLoop.recoveryQuestions', doomLoop.recoveryQuestions],
        ['streak.defaultDailyGoal', streak.defaultDailyGoal],
    ];
    for (const [name, value] of positive) {
        if (!Number.isInteger(value) || value < 1) {
            throw new ValidationFailureError(`${name} must be a positive integer`, { name, value });
        }
    }
}

function parsePositiveInt(raw: string | undefined): number | undefined {
    if (!raw) return undefined;
    const parsed = Number.parseInt(raw, 10);
    if (!Number.isFinite(parsed) || parsed < 1) return undefined;
    return parsed;
}

function setIfDefined<T, K extends keyof T>(target: Partial<T>, key: K, value: T[K] | undefined): void {
    if (value !== undefined) {
        target[key] = value;
    }
}

/**
 * Read threshold overrides from the environment
 *
 * DRILL_REINFORCEMENT_INTERVAL, DRILL_MASTERY_WINDOW, DRILL_MASTERY_REQUIRED,
 * DRILL_DOOM_WINDOW, DRILL_DOOM_TRIGGER, DRILL_DOOM_EXIT,
 * DRILL_RECOVERY_QUESTIONS, DRILL_DAILY_GOAL
 */
export function loadDrillConfigFromEnv(env: NodeJS.ProcessEnv = process.env): DrillEngineConfig {
    const mastery: Partial<DrillEngineConfig['mastery']> = {};
    setIfDefined(mastery, 'windowSize', parsePositiveInt(env.DRILL_MASTERY_WINDOW));
    setIfDefined(mastery, 'requiredCorrect', parsePositiveInt(env.DRILL_MASTERY_REQUIRED));

    const selection: Partial<DrillEngineConfig['selection']> = {};
    setIfDefined(selection, 'reinforcementInterval', parsePositiveInt(env.DRILL_REINFORCEMENT_INTERVAL));

    const doomLoop: Partial<DrillEngineConfig['doomLoop']> = {};
    setIfDefined(doomLoop, 'windowSize', parsePositiveInt(env.DRILL_DOOM_WINDOW));
    setIfDefined(doomLoop, 'triggerWrongCount', parsePositiveInt(env.DRILL_DOOM_TRIGGER));
    setIfDefined(doomLoop, 'exitConsecutiveCorrect', parsePositiveInt(env.DRILL_DOOM_EXIT));
    setIfDefined(doomLoop, 'recoveryQuestions', parsePositiveInt(env.DRILL_RECOVERY_QUESTIONS));

    const streak: Partial<DrillEngineConfig['streak']> = {};
    setIfDefined(streak, 'defaultDailyGoal', parsePositiveInt(env.DRILL_DAILY_GOAL));

    return resolveDrillConfig({ mastery, selection, doomLoop, streak });
}
