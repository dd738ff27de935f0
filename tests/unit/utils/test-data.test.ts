/**
 * Test Data Factory Tests
 *
 * Ensures test data factories produce valid data.
 */

import { describe, it, expect } from 'vitest';
import {
    INSTRUMENTS,
    MUSES,
    THREE_MUSES,
    createFakeClock,
    createTestContext,
    createTestStore,
    createTestUserId,
    recordResults,
    seedDomain,
} from './test-data';

describe('Test Data Factories', () => {
    describe('fixtures', () => {
        it('should give every fact every field', () => {
            for (const fixture of [MUSES, THREE_MUSES, INSTRUMENTS]) {
                for (const values of fixture.facts) {
                    expect(Object.keys(values).sort()).toEqual([...fixture.fieldNames].sort());
                }
            }
        });

        it('should trim the three-muse fixture to the first three facts', () => {
            expect(THREE_MUSES.facts.map(f => f.name)).toEqual(['Calliope', 'Clio', 'Erato']);
        });
    });

    describe('createFakeClock', () => {
        it('should start at the given instant and move only when told', () => {
            const clock = createFakeClock('2024-03-10T09:00:00.000Z');
            clock.advance(90_000);
            expect(clock.now().toISOString()).toBe('2024-03-10T09:01:30.000Z');

            clock.set('2024-03-11T00:00:00.000Z');
            expect(clock.now().toISOString()).toBe('2024-03-11T00:00:00.000Z');
        });
    });

    describe('store helpers', () => {
        it('should seed a domain into a fresh store', () => {
            const store = createTestStore();
            const { domain, facts } = seedDomain(store, INSTRUMENTS);

            expect(domain.fieldNames).toEqual(['name', 'family', 'origin']);
            expect(facts).toHaveLength(4);
            expect(facts.every(f => f.domainId === domain.id)).toBe(true);
        });

        it('should record results one second apart', () => {
            const store = createTestStore();
            const { facts } = seedDomain(store);
            const userId = createTestUserId();

            recordResults(store, facts[0].id, userId, [false, true], createFakeClock('2024-03-10T09:00:00.000Z'));

            const attempts = store.getAttempts(facts[0].id, userId);
            expect(attempts.map(a => a.timestamp.toISOString())).toEqual([
                '2024-03-10T09:00:01.000Z',
                '2024-03-10T09:00:00.000Z',
            ]);
            expect(attempts.map(a => a.correct)).toEqual([true, false]);
        });

        it('should create distinct user ids', () => {
            expect(createTestUserId()).toMatch(/^user-[0-9a-f]{8}$/);
            expect(createTestUserId()).not.toBe(createTestUserId());
        });
    });

    describe('createTestContext', () => {
        it('should produce a reproducible random source', () => {
            const store = createTestStore();
            const a = createTestContext(store, 'user-1');
            const b = createTestContext(store, 'user-1');

            expect([a.random(), a.random()]).toEqual([b.random(), b.random()]);
            expect(a.clock().toISOString()).toBe('2024-03-10T09:00:00.000Z');
        });
    });
});
