/**
 * Drill Engine - Main Export
 *
 * Adaptive fact drilling: progress state machine, fact selection,
 * question generation and doom-loop recovery.
 */

// Core types
export * from './types';
export * from './errors';
export * from './config';

// Engine modules
export * from './random';
export * from './mastery';
export * from './progress';
export * from './fact-selector';
export * from './singularize';
export * from './question-generator';
export * from './streak';
export * from './progress-report';
export * from './event-bus';
export * from './orchestrator';

// Agents
export * from './agents/doom-loop-agent';

// Persistence
export { SqliteProgressStore } from '@/lib/db/progress-store';
export { openDatabase, getDatabase, closeDatabase, IN_MEMORY } from '@/lib/db/sqlite';
