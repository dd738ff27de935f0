/**
 * Drill Engine - Error Kinds
 *
 * Expected steady states ("nothing to quiz yet") are returned as null by the
 * engine. These errors cover the rest.
 */

export type DrillErrorCode = 'VALIDATION_FAILURE' | 'NOT_FOUND' | 'STATE_CONFLICT';

export class DrillEngineError extends Error {
    readonly code: DrillErrorCode;
    readonly context: Record<string, unknown>;

    constructor(code: DrillErrorCode, message: string, context: Record<string, unknown> = {}) {
        super(message);
        this.name = 'DrillEngineError';
        this.code = code;
        this.context = context;
    }
}

/** Bad input to an engine call. Not retried. */
export class ValidationFailureError extends DrillEngineError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super('VALIDATION_FAILURE', message, context);
        this.name = 'ValidationFailureError';
    }
}

/** A referenced fact or domain does not exist. */
export class NotFoundError extends DrillEngineError {
    constructor(entity: 'fact' | 'domain', id: string) {
        super('NOT_FOUND', `${entity} ${id} not found`, { entity, id });
        this.name = 'NotFoundError';
    }
}

/** A fact-state write lost a race with a concurrent update. Retry once. */
export class StateConflictError extends DrillEngineError {
    constructor(factId: string, userId: string, expectedVersion: number) {
        super('STATE_CONFLICT', `fact state for ${factId}/${userId} changed since version ${expectedVersion}`, {
            factId,
            userId,
            expectedVersion,
        });
        this.name = 'StateConflictError';
    }
}

export function extractDrillErrorCode(error: unknown): DrillErrorCode | undefined {
    if (error instanceof DrillEngineError) {
        return error.code;
    }
    return undefined;
}

export function isStateConflict(error: unknown): boolean {
    return extractDrillErrorCode(error) === 'STATE_CONFLICT';
}

/**
 * Run `fn`, and run it exactly once more if it fails with a StateConflictError.
 * Any other error, or a second conflict, propagates.
 */
export function withConflictRetry<T>(fn: () => T, onConflict?: (error: DrillEngineError) => void): T {
    try {
        return fn();
    } catch (error) {
        if (!(error instanceof DrillEngineError) || error.code !== 'STATE_CONFLICT') {
            throw error;
        }
        onConflict?.(error);
        return fn();
    }
}
