/**
 * SQLite-backed ProgressStore
 *
 * Fact states carry a `version` column; an update whose version no longer
 * matches the row raises StateConflictError instead of overwriting.
 */

import Database from 'better-sqlite3';
import {
    Attempt,
    DEFAULT_DRILL_CONFIG,
    Domain,
    Fact,
    FactState,
    FieldValues,
    NewAttempt,
    NewDomain,
    ProgressStore,
    StreakState,
} from '@/lib/drill-engine/types';
import { StateConflictError, ValidationFailureError } from '@/lib/drill-engine/errors';
import { createLogger } from '@/lib/debug';
import { generateId, now } from './sqlite';

const logger = createLogger('ProgressStore');

// =============================================================================
// ROW TYPES
// =============================================================================

interface DomainRow {
    id: string;
    name: string;
    field_names: string;
}

interface FactRow {
    id: string;
    domain_id: string;
    position: number;
    fact_data: string;
}

interface AttemptRow {
    id: number;
    fact_id: string;
    user_id: string;
    field_name: string;
    correct: number;
    timestamp: string;
    session_id: string | null;
}

interface FactStateRow {
    id: number;
    fact_id: string;
    user_id: string;
    learned_at: string | null;
    last_shown_at: string | null;
    consecutive_correct: number;
    consecutive_wrong: number;
    version: number;
}

interface StreakRow {
    user_id: string;
    current_streak: number;
    longest_streak: number;
    last_practice_date: string | null;
    daily_goal: number;
}

interface CountRow {
    count: number;
}

// =============================================================================
// ROW MAPPING
// =============================================================================

function parseFieldNames(raw: string): string[] {
    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed) || !parsed.every((v): v is string => typeof v === 'string')) {
        throw new ValidationFailureError('Stored field names are malformed', { raw });
    }
    return parsed;
}

function parseFieldValues(raw: string): FieldValues {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new ValidationFailureError('Stored fact data is malformed', { raw });
    }
    const values: FieldValues = {};
    for (const [key, value] of Object.entries(parsed)) {
        if (typeof value !== 'string') {
            throw new ValidationFailureError('Stored fact data is malformed', { raw, field: key });
        }
        values[key] = value;
    }
    return values;
}

function toDate(raw: string | null): Date | null {
    return raw === null ? null : new Date(raw);
}

function toIso(value: Date | null): string | null {
    return value === null ? null : value.toISOString();
}

function mapDomain(row: DomainRow): Domain {
    return { id: row.id, name: row.name, fieldNames: parseFieldNames(row.field_names) };
}

function mapFact(row: FactRow): Fact {
    return { id: row.id, domainId: row.domain_id, position: row.position, values: parseFieldValues(row.fact_data) };
}

function mapAttempt(row: AttemptRow): Attempt {
    return {
        id: row.id,
        factId: row.fact_id,
        userId: row.user_id,
        fieldName: row.field_name,
        correct: row.correct === 1,
        timestamp: new Date(row.timestamp),
        sessionId: row.session_id,
    };
}

function mapFactState(row: FactStateRow): FactState {
    return {
        id: row.id,
        factId: row.fact_id,
        userId: row.user_id,
        learnedAt: toDate(row.learned_at),
        lastShownAt: toDate(row.last_shown_at),
        consecutiveCorrect: row.consecutive_correct,
        consecutiveWrong: row.consecutive_wrong,
        version: row.version,
    };
}

function mapStreak(row: StreakRow): StreakState {
    return {
        userId: row.user_id,
        currentStreak: row.current_streak,
        longestStreak: row.longest_streak,
        lastPracticeDate: row.last_practice_date,
        dailyGoal: row.daily_goal,
    };
}

// =============================================================================
// STORE
// =============================================================================

export class SqliteProgressStore implements ProgressStore {
    constructor(
        private readonly db: Database.Database,
        private readonly defaultDailyGoal: number = DEFAULT_DRILL_CONFIG.streak.defaultDailyGoal
    ) {}

    // --- Content ---

    getDomain(domainId: string): Domain | null {
        const row = this.db
            .prepare<[string], DomainRow>('SELECT id, name, field_names FROM domains WHERE id = ?')
            .get(domainId);
        return row ? mapDomain(row) : null;
    }

    getFacts(domainId: string): Fact[] {
        return this.db
            .prepare<[string], FactRow>('SELECT id, domain_id, position, fact_data FROM facts WHERE domain_id = ? ORDER BY position')
            .all(domainId)
            .map(mapFact);
    }

    getFact(factId: string): Fact | null {
        const row = this.db
            .prepare<[string], FactRow>('SELECT id, domain_id, position, fact_data FROM facts WHERE id = ?')
            .get(factId);
        return row ? mapFact(row) : null;
    }

    /**
     * Seed a domain. Requires at least two fields and every field on every fact.
     */
    createDomain(input: NewDomain): Domain {
        const { name, fieldNames, facts } = input;

        if (fieldNames.length < 2) {
            throw new ValidationFailureError('A domain needs at least 2 fields', { name, fieldCount: fieldNames.length });
        }
        if (new Set(fieldNames).size !== fieldNames.length) {
            throw new ValidationFailureError('Field names must be unique', { name, fieldNames });
        }
        facts.forEach((values, index) => {
            const missing = fieldNames.filter(field => values[field] === undefined);
            if (missing.length > 0) {
                throw new ValidationFailureError(`Fact ${index} is missing fields`, { name, index, missing });
            }
        });

        const domain: Domain = { id: generateId(), name, fieldNames: [...fieldNames] };

        this.transaction(() => {
            this.db
                .prepare('INSERT INTO domains (id, name, field_names, created_at) VALUES (?, ?, ?, ?)')
                .run(domain.id, name, JSON.stringify(fieldNames), now());

            const insertFact = this.db.prepare('INSERT INTO facts (id, domain_id, position, fact_data) VALUES (?, ?, ?, ?)');
            facts.forEach((values, position) => {
                const ordered: FieldValues = {};
                for (const field of fieldNames) {
                    ordered[field] = values[field];
                }
                insertFact.run(generateId(), domain.id, position, JSON.stringify(ordered));
            });
        });

        logger.info('Domain created', { domain_id: domain.id, fact_count: facts.length });
        return domain;
    }

    // --- Attempt log ---

    getAttempts(factId: string, userId: string, limit?: number): Attempt[] {
        return this.db
            .prepare<[string, string, number], AttemptRow>(`
                SELECT id, fact_id, user_id, field_name, correct, timestamp, session_id
                FROM attempts
                WHERE fact_id = ? AND user_id = ?
                ORDER BY timestamp DESC, id DESC
                LIMIT ?
            `)
            .all(factId, userId, limit ?? -1)
            .map(mapAttempt);
    }

    countAttempts(factId: string, userId: string): number {
        const row = this.db
            .prepare<[string, string], CountRow>('SELECT COUNT(*) AS count FROM attempts WHERE fact_id = ? AND user_id = ?')
            .get(factId, userId);
        return row?.count ?? 0;
    }

    appendAttempt(input: NewAttempt): Attempt {
        const result = this.db
            .prepare(`
                INSERT INTO attempts (fact_id, user_id, field_name, correct, timestamp, session_id)
                VALUES (?, ?, ?, ?, ?, ?)
            `)
            .run(input.factId, input.userId, input.fieldName, input.correct ? 1 : 0, input.timestamp.toISOString(), input.sessionId);

        return { id: Number(result.lastInsertRowid), ...input };
    }

    countAttemptsSince(userId: string, since: Date): number {
        const row = this.db
            .prepare<[string, string], CountRow>('SELECT COUNT(*) AS count FROM attempts WHERE user_id = ? AND timestamp >= ?')
            .get(userId, since.toISOString());
        return row?.count ?? 0;
    }

    countSessions(userId: string): number {
        const row = this.db
            .prepare<[string], CountRow>(`
                SELECT COUNT(DISTINCT session_id) AS count
                FROM attempts
                WHERE user_id = ? AND session_id IS NOT NULL
            `)
            .get(userId);
        return row?.count ?? 0;
    }

    getUserAttemptTimes(userId: string, domainId?: string): Date[] {
        const rows = domainId === undefined
            ? this.db
                .prepare<[string], { timestamp: string }>('SELECT timestamp FROM attempts WHERE user_id = ? ORDER BY timestamp, id')
                .all(userId)
            : this.db
                .prepare<[string, string], { timestamp: string }>(`
                    SELECT a.timestamp FROM attempts a
                    JOIN facts f ON f.id = a.fact_id
                    WHERE a.user_id = ? AND f.domain_id = ?
                    ORDER BY a.timestamp, a.id
                `)
                .all(userId, domainId);
        return rows.map(row => new Date(row.timestamp));
    }

    // --- Fact states ---

    getFactState(factId: string, userId: string): FactState | null {
        const row = this.db
            .prepare<[string, string], FactStateRow>('SELECT * FROM fact_states WHERE fact_id = ? AND user_id = ?')
            .get(factId, userId);
        return row ? mapFactState(row) : null;
    }

    getOrCreateFactState(factId: string, userId: string): FactState {
        this.db
            .prepare('INSERT OR IGNORE INTO fact_states (fact_id, user_id) VALUES (?, ?)')
            .run(factId, userId);

        const state = this.getFactState(factId, userId);
        if (!state) {
            throw new StateConflictError(factId, userId, 0);
        }
        return state;
    }

    updateFactState(state: FactState): FactState {
        const result = this.db
            .prepare(`
                UPDATE fact_states
                SET learned_at = ?, last_shown_at = ?, consecutive_correct = ?, consecutive_wrong = ?,
                    version = version + 1
                WHERE fact_id = ? AND user_id = ? AND version = ?
            `)
            .run(
                toIso(state.learnedAt),
                toIso(state.lastShownAt),
                state.consecutiveCorrect,
                state.consecutiveWrong,
                state.factId,
                state.userId,
                state.version
            );

        if (result.changes === 0) {
            throw new StateConflictError(state.factId, state.userId, state.version);
        }
        return { ...state, version: state.version + 1 };
    }

    deleteProgress(domainId: string, userId: string): void {
        this.transaction(() => {
            this.db
                .prepare('DELETE FROM attempts WHERE user_id = ? AND fact_id IN (SELECT id FROM facts WHERE domain_id = ?)')
                .run(userId, domainId);
            this.db
                .prepare('DELETE FROM fact_states WHERE user_id = ? AND fact_id IN (SELECT id FROM facts WHERE domain_id = ?)')
                .run(userId, domainId);
        });
        logger.info('Progress deleted', { domain_id: domainId, user: userId });
    }

    // --- Streaks ---

    getStreakState(userId: string): StreakState {
        const row = this.db
            .prepare<[string], StreakRow>('SELECT * FROM streaks WHERE user_id = ?')
            .get(userId);
        if (row) {
            return mapStreak(row);
        }
        return { userId, currentStreak: 0, longestStreak: 0, lastPracticeDate: null, dailyGoal: this.defaultDailyGoal };
    }

    updateStreakState(state: StreakState): void {
        this.db
            .prepare(`
                INSERT INTO streaks (user_id, current_streak, longest_streak, last_practice_date, daily_goal)
                VALUES (?, ?, ?, ?, ?)
                ON CONFLICT(user_id) DO UPDATE SET
                    current_streak = excluded.current_streak,
                    longest_streak = excluded.longest_streak,
                    last_practice_date = excluded.last_practice_date,
                    daily_goal = excluded.daily_goal
            `)
            .run(state.userId, state.currentStreak, state.longestStreak, state.lastPracticeDate, state.dailyGoal);
    }

    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }
}
