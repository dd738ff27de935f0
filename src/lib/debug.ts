/**
 * Debug & Structured Logging Utilities
 *
 * STRUCTURED LOGGING (log.info, log.error, drillLog.*)
 *    - One JSON object per line: level, msg, timestamp, then fields
 *    - Debug entries only print in development (NODE_ENV=development)
 *
 * Usage:
 *   import { createLogger } from '@/lib/debug';
 *   const logger = createLogger('ProgressStore');
 *   logger.info('Domain created', { domain_id: 'abc', fact_count: 9 });
 */

const isDev = process.env.NODE_ENV === 'development';

// =============================================================================
// STRUCTURED LOGGING
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogType = 'engine' | 'session' | 'store' | 'system';

export interface StructuredLogData {
    type?: LogType;
    action?: string;
    error?: string;

    // Learner context
    user?: string;
    session_id?: string;
    domain_id?: string;
    fact_id?: string;

    // Module identifier
    module?: string;

    [key: string]: unknown;
}

export interface LogEntry extends StructuredLogData {
    level: LogLevel;
    msg: string;
    timestamp: string;
}

/**
 * Format a structured log line
 * Format: {"level":"info","msg":"...","timestamp":"...","field":"value"}
 */
export function formatLogEntry(level: LogLevel, message: string, data?: StructuredLogData, at: Date = new Date()): string {
    const entry: LogEntry = {
        level,
        msg: message,
        timestamp: at.toISOString(),
        ...data,
    };
    return JSON.stringify(entry);
}

function structuredLog(level: LogLevel, message: string, data?: StructuredLogData): void {
    const output = formatLogEntry(level, message, data);
    switch (level) {
        case 'error':
            console.error(output);
            break;
        case 'warn':
            console.warn(output);
            break;
        case 'debug':
            if (isDev) {
                console.log(output);
            }
            break;
        default:
            console.log(output);
    }
}

/**
 * Structured logger
 *
 * @example
 * log.error('Fact state update failed', { error: err.message, fact_id: 'f1' });
 */
export const log = {
    debug: (message: string, data?: StructuredLogData) => structuredLog('debug', message, data),
    info: (message: string, data?: StructuredLogData) => structuredLog('info', message, data),
    warn: (message: string, data?: StructuredLogData) => structuredLog('warn', message, data),
    error: (message: string, data?: StructuredLogData) => structuredLog('error', message, data),
};

/**
 * Create a scoped structured logger for a specific module
 * Adds 'module' field to all log entries
 */
export function createLogger(moduleName: string) {
    return {
        debug: (message: string, data?: StructuredLogData) =>
            structuredLog('debug', message, { module: moduleName, ...data }),
        info: (message: string, data?: StructuredLogData) =>
            structuredLog('info', message, { module: moduleName, ...data }),
        warn: (message: string, data?: StructuredLogData) =>
            structuredLog('warn', message, { module: moduleName, ...data }),
        error: (message: string, data?: StructuredLogData) =>
            structuredLog('error', message, { module: moduleName, ...data }),
    };
}

// =============================================================================
// DRILL LOGGER
// =============================================================================

/**
 * Learning-progress events
 *
 * @example
 * drillLog.factDemoted('user_1', 'fact_9');
 * drillLog.doomLoopEntered('user_1', 'sess_2', 3);
 */
export const drillLog = {
    sessionStart: (user: string, session_id: string, domain_id: string) =>
        structuredLog('info', 'Drill session started', { type: 'session', action: 'session_start', user, session_id, domain_id }),

    answer: (user: string, session_id: string, fact_id: string, correct: boolean, accepted_alternative: boolean) =>
        structuredLog('debug', 'Answer recorded', { type: 'engine', action: 'answer', user, session_id, fact_id, correct, accepted_alternative }),

    factLearned: (user: string, fact_id: string) =>
        structuredLog('debug', 'Fact learned', { type: 'engine', action: 'fact_learned', user, fact_id }),

    factDemoted: (user: string, fact_id: string) =>
        structuredLog('info', 'Fact demoted to unlearned', { type: 'engine', action: 'fact_demoted', user, fact_id }),

    doomLoopEntered: (user: string, session_id: string, wrong_count: number) =>
        structuredLog('warn', 'Doom loop detected', { type: 'engine', action: 'doom_loop_entered', user, session_id, wrong_count }),

    doomLoopExited: (user: string, session_id: string) =>
        structuredLog('info', 'Doom loop cleared', { type: 'engine', action: 'doom_loop_exited', user, session_id }),

    recoveryFactSelected: (user: string, session_id: string, fact_id: string) =>
        structuredLog('info', 'Recovery fact selected', { type: 'engine', action: 'recovery_fact', user, session_id, fact_id }),

    streakUpdated: (user: string, current_streak: number, longest_streak: number) =>
        structuredLog('info', 'Streak updated', { type: 'engine', action: 'streak_updated', user, current_streak, longest_streak }),

    progressReset: (user: string, domain_id: string) =>
        structuredLog('info', 'Domain progress reset', { type: 'engine', action: 'progress_reset', user, domain_id }),

    stateConflict: (user: string, fact_id: string, error: string) =>
        structuredLog('warn', 'Fact state conflict, retrying', { type: 'store', action: 'state_conflict', user, fact_id, error }),
};
