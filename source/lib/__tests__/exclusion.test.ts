/**
 * Tests for the file exclusion predicate.
 */

import {describe, it, expect} from 'vitest';
import {createExclusionPolicy} from '../exclusion.js';

describe('createExclusionPolicy', () => {
	const exclude = createExclusionPolicy({gitignore: 'secrets/\n*.local.py\n'});

	it.each([
		'src/app.py',
		'web/auth.ts',
		'pkg/models/user.tsx',
		'scripts/run.mjs',
	])('keeps %s', filePath => {
		expect(exclude(filePath)).toBe(false);
	});

	it.each([
		['node_modules/left-pad/index.js', 'dependency directory'],
		['web/__tests__/auth.ts', 'test directory'],
		['tests/unit/test_models.py', 'test directory'],
		['web/auth.test.ts', 'test file'],
		['web/auth.spec.tsx', 'test file'],
		['pkg/test_models.py', 'test file'],
		['pkg/models_test.py', 'test file'],
		['app/migrations/0001_initial.py', 'migrations'],
		['dist/index.js', 'build output'],
		['types/global.d.ts', 'declaration file'],
		['static/app.min.js', 'static assets'],
		['web/vendor.min.js', 'minified bundle'],
		['assets/logo.png', 'binary'],
		['secrets/keys.py', '.gitignore directory'],
		['app/settings.local.py', '.gitignore pattern'],
	])('excludes %s (%s)', filePath => {
		expect(exclude(filePath)).toBe(true);
	});

	it('excludes paths outside the project root', () => {
		expect(exclude('../other/app.py')).toBe(true);
		expect(exclude('/etc/passwd')).toBe(true);
		expect(exclude('')).toBe(true);
	});

	it('normalises Windows separators and leading ./', () => {
		expect(exclude('node_modules\\pkg\\index.js')).toBe(true);
		expect(exclude('./src/app.py')).toBe(false);
	});

	it('keeps test files when asked, but not test directories', () => {
		const withTests = createExclusionPolicy({includeTests: true});
		expect(withTests('web/auth.test.ts')).toBe(false);
		expect(withTests('tests/test_models.py')).toBe(true);
	});

	it('applies extra patterns', () => {
		const custom = createExclusionPolicy({patterns: ['*.gen.ts', 'legacy/']});
		expect(custom('api/client.gen.ts')).toBe(true);
		expect(custom('legacy/old.py')).toBe(true);
		expect(custom('api/client.ts')).toBe(false);
	});

	it('replaces the default directory list', () => {
		const only = createExclusionPolicy({ignoredDirectories: ['generated']});
		expect(only('generated/models.py')).toBe(true);
		expect(only('migrations/0001_initial.py')).toBe(false);
	});
});
