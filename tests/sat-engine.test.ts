/**
 * SAT Engine Tests
 *
 * Model finding over clause sets.
 */

import { checkSat } from '../src/engines/sat.js';
import { toCNF } from '../src/logic/normalizer.js';
import { createClause, createLiteral, EMPTY_CLAUSE } from '../src/logic/clause.js';
import type { Clause } from '../src/types/clause.js';
import { clausesHold, createRandom, f, randomFormula, tableSatisfiable } from './fixtures.js';

describe('checkSat', () => {
    it('should find empty clause set satisfiable', () => {
        const result = checkSat([]);
        expect(result.sat).toBe(true);
        expect(result.model).toEqual(new Map());
    });

    it('should find a model for a unit clause', () => {
        const clauses: Clause[] = [createClause([createLiteral('p', true)])];
        const result = checkSat(clauses);
        expect(result.sat).toBe(true);
        expect(result.model).toEqual(new Map([['p', false]]));
    });

    it('should report contradictory units unsatisfiable', () => {
        const clauses = [createClause([createLiteral('p')]), createClause([createLiteral('p', true)])];
        const result = checkSat(clauses);
        expect(result.sat).toBe(false);
        expect(result.model).toBeUndefined();
    });

    it('should accept digit-only atom names', () => {
        const clauses = [...toCNF(f('5 | q')), createClause([createLiteral('q', true)])];
        const result = checkSat(clauses);
        expect(result.sat).toBe(true);
        expect(result.model).toEqual(new Map([['5', true], ['q', false]]));
        expect(checkSat(toCNF(f('42 & ~7'))).model).toEqual(new Map([['42', true], ['7', false]]));
    });

    it('should treat the empty clause as unsatisfiable', () => {
        expect(checkSat([EMPTY_CLAUSE]).sat).toBe(false);
    });

    it('should report statistics', () => {
        const clauses = toCNF(randomFormula(createRandom(3), 2, ['p', 'q']));
        const { statistics } = checkSat([...clauses, createClause([createLiteral('r')])]);
        expect(statistics.clauses).toBe(clauses.length + 1);
        expect(statistics.timeMs).toBeGreaterThanOrEqual(0);
    });

    it('should agree with truth tables and return real models', () => {
        const random = createRandom(42);
        for (let i = 0; i < 40; i++) {
            const formula = randomFormula(random, 3);
            const clauses = toCNF(formula);
            const result = checkSat(clauses);
            expect(result.sat).toBe(tableSatisfiable(formula));
            if (result.model) {
                expect(clausesHold(clauses, result.model)).toBe(true);
            }
        }
    });
});
