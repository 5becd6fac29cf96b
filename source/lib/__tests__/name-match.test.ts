/**
 * Tests for lexical name ranking.
 */

import {describe, it, expect} from 'vitest';
import {compareByNameMatch, nameMatchTier} from '../name-match.js';

describe('nameMatchTier', () => {
	it('ranks exact, prefix, substring, then no match', () => {
		expect(nameMatchTier('calc_salary', 'calc_salary')).toBe(0);
		expect(nameMatchTier('Calc_Salary', 'calc_salary')).toBe(0);
		expect(nameMatchTier('calc_salary_total', 'calc_salary')).toBe(1);
		expect(nameMatchTier('recalc_salary', 'calc_salary')).toBe(2);
		expect(nameMatchTier('apply_tax', 'calc_salary')).toBe(3);
	});
});

describe('compareByNameMatch', () => {
	it('orders by tier, then shortest name, then location', () => {
		const symbols = [
			{name: 'check_auth_token', filePath: 'a.py', startLine: 1},
			{name: 'reauth', filePath: 'a.py', startLine: 5},
			{name: 'auth', filePath: 'b.py', startLine: 9},
			{name: 'authorize', filePath: 'a.py', startLine: 3},
			{name: 'auth', filePath: 'a.py', startLine: 20},
			{name: 'auth_ok', filePath: 'a.py', startLine: 7},
		];

		const ordered = [...symbols].sort(compareByNameMatch('auth'));

		expect(ordered.map(s => `${s.name}@${s.filePath}:${s.startLine}`)).toEqual([
			'auth@a.py:20',
			'auth@b.py:9',
			'auth_ok@a.py:7',
			'authorize@a.py:3',
			'reauth@a.py:5',
			'check_auth_token@a.py:1',
		]);
	});
});
