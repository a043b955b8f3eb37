/**
 * advisor.test.ts
 *
 * Unit tests for `createAdvisor`: the default level must exist in the
 * catalog's odds table before any session is created.
 */

import {describe, it, expect} from 'vitest';
import {createAdvisor} from '../src/advisor.js';
import {InvalidLevelError} from '../src/engine/errors.js';
import {makeCatalog} from './fixtures.js';

describe('createAdvisor', () => {
    const catalog = makeCatalog();

    it('refuses a default level the odds table lacks', () => {
        expect(() => createAdvisor(catalog, {defaultLevel: 4})).toThrow(InvalidLevelError);
        // the built-in default is level 7; the fixture table has 1, 5 and 8
        expect(() => createAdvisor(catalog)).toThrow(InvalidLevelError);
    });

    it('uses the configured defaults', () => {
        const advisor = createAdvisor(catalog, {defaultLevel: 8, defaultRefreshBudget: 4, slotsPerRefresh: 3});
        expect(advisor.defaults).toEqual({level: 8, refreshBudget: 4});
        expect(advisor.calculator.slotsPerRefresh).toBe(3);
        expect(advisor.sessions.create(advisor.defaults.level).level).toBe(8);
    });
});
