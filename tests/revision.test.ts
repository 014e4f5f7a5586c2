/**
 * Tests for contraction and revision
 */

import { BeliefBase } from '../src/beliefs/base.js';
import { contract, revise, byEntrenchment } from '../src/beliefs/revision.js';
import { formulaToString } from '../src/logic/printer.js';
import type { ContractionPhase } from '../src/types/options.js';
import {
    InvalidEntrenchmentError,
    ResolutionLimitError,
    VacuousTargetError,
} from '../src/types/errors.js';
import { f } from './fixtures.js';

const listing = (base: BeliefBase) =>
    base.show().map(({ formula, entrenchment }) => `${formulaToString(formula)}:${entrenchment}`);

const baseOf = (...beliefs: Array<[string, number]>): BeliefBase => {
    const base = new BeliefBase();
    for (const [text, entrenchment] of beliefs) {
        base.expand(f(text), entrenchment);
    }
    return base;
};

describe('contract', () => {
    test('is a no-op when the target is not entailed', () => {
        const base = baseOf(['p', 20], ['r', 30]);
        const before = base.show();
        expect(contract(base, f('q'))).toEqual([]);
        expect(base.show()).toEqual(before);
    });

    test('removes the least entrenched belief when that suffices', () => {
        const base = baseOf(['p', 20], ['p >> q', 40]);
        const removed = contract(base, f('q'));
        expect(removed.map(b => formulaToString(b.formula))).toEqual(['p']);
        expect(listing(base)).toEqual(['p >> q:40']);
        expect(base.entails(f('q'))).toBe(false);
    });

    test('keeps removing until the target is no longer entailed', () => {
        const base = baseOf(['p', 20], ['p >> q', 40], ['q', 60]);
        const removed = base.contract(f('q'));
        expect(removed.map(b => b.entrenchment)).toEqual([20, 40, 60]);
        expect(base.size).toBe(0);
    });

    test('greedily removes low beliefs that play no part in the proof', () => {
        const base = baseOf(['r', 10], ['p', 20], ['p >> q', 40]);
        const removed = contract(base, f('q'));
        expect(removed.map(b => formulaToString(b.formula))).toEqual(['r', 'p']);
        expect(listing(base)).toEqual(['p >> q:40']);
    });

    test('breaks entrenchment ties by earlier position', () => {
        const first = baseOf(['p', 50], ['p >> q', 50]);
        contract(first, f('q'));
        expect(listing(first)).toEqual(['p >> q:50']);

        const second = baseOf(['p >> q', 50], ['p', 50]);
        contract(second, f('q'));
        expect(listing(second)).toEqual(['p:50']);
    });

    test('accepts an injected comparator', () => {
        const base = baseOf(['p', 20], ['p >> q', 40]);
        contract(base, f('q'), { comparator: (a, b) => -byEntrenchment(a, b) });
        expect(listing(base)).toEqual(['p:20']);
    });

    test('rejects a tautology and leaves the base unchanged', () => {
        const base = baseOf(['p', 20], ['q', 40]);
        expect(() => contract(base, f('p | ~p'))).toThrow(VacuousTargetError);
        expect(listing(base)).toEqual(['p:20', 'q:40']);
    });

    test('rejects a tautology even on an empty base', () => {
        expect(() => new BeliefBase().contract(f('p >> p'))).toThrow(VacuousTargetError);
    });

    test('leaves the base unchanged when the resolution cap is hit', () => {
        const base = baseOf(['a', 10], ['a >> b', 20], ['b >> c', 30], ['c >> d', 40], ['d >> e', 50]);
        expect(() => contract(base, f('e'), { maxResolutions: 1 })).toThrow(ResolutionLimitError);
        expect(base.size).toBe(5);
    });

    test('reports its state transitions', () => {
        const base = baseOf(['p', 20], ['p >> q', 40]);
        const transitions: string[] = [];
        const onTransition = (from: ContractionPhase, to: ContractionPhase) => transitions.push(`${from}>${to}`);
        contract(base, f('q'), { onTransition });
        expect(transitions).toEqual([
            'idle>checking',
            'checking>selecting',
            'selecting>removing',
            'removing>checking',
            'checking>idle',
        ]);
    });
});

describe('revise', () => {
    test('success: the new belief is accepted and its negation dropped', () => {
        const base = baseOf(['p', 50]);
        const removed = revise(base, f('~p'), 60);
        expect(removed.map(b => formulaToString(b.formula))).toEqual(['p']);
        expect(base.entails(f('~p'))).toBe(true);
        expect(base.entails(f('p'))).toBe(false);
        expect(listing(base)).toEqual(['~p:60']);
    });

    test('removes the support of a conflicting consequence', () => {
        const base = baseOf(['p', 30], ['p >> q', 50]);
        base.revise(f('~q'), 40);
        expect(listing(base)).toEqual(['p >> q:50', '~q:40']);
        expect(base.isConsistent()).toBe(true);
    });

    test('vacuity: without a conflict revision equals expansion', () => {
        const revised = baseOf(['p', 30]);
        const expanded = baseOf(['p', 30]);
        expect(revised.revise(f('q'), 50)).toEqual([]);
        expanded.expand(f('q'), 50);
        expect(revised.show()).toEqual(expanded.show());
    });

    test('inclusion: unrelated beliefs survive', () => {
        const base = baseOf(['p', 30], ['r', 30]);
        base.revise(f('q'), 50);
        expect(listing(base)).toEqual(['p:30', 'r:30', 'q:50']);
    });

    test('extensionality: equivalent inputs give equivalent bases', () => {
        const first = baseOf(['p', 30], ['~q', 20]);
        const second = baseOf(['p', 30], ['~q', 20]);
        first.revise(f('p >> q'), 50);
        second.revise(f('~p | q'), 50);

        for (const query of ['p', 'q', '~q', 'p & q', '~p', 'r', 'p >> q']) {
            expect(first.entails(f(query))).toBe(second.entails(f(query)));
        }
        expect(first.entails(f('q'))).toBe(true);
    });

    test('a self-contradictory belief is still added', () => {
        const base = baseOf(['p', 50]);
        expect(base.revise(f('q & ~q'))).toEqual([]);
        expect(listing(base)).toEqual(['p:50', 'q & ~q:50']);
        expect(base.isConsistent()).toBe(false);
    });

    test('an invalid entrenchment leaves the base unchanged', () => {
        const base = baseOf(['p', 50]);
        expect(() => base.revise(f('~p'), 1.5)).toThrow(InvalidEntrenchmentError);
        expect(listing(base)).toEqual(['p:50']);
    });
});
