import { describe, it, expect } from 'vitest';
import { flattenErr, src } from './testUtils';
import { GLSL_DIAGCODES, formatPreprocessError } from '../src/core/diagnostics';

describe('preprocessing errors', () => {
	it('reports an unreadable unit without a location', () => {
		const err = flattenErr({}, '/s/nope.frag');
		expect(err.code).toBe(GLSL_DIAGCODES.UNIT_UNREADABLE);
		expect(err.kind).toBe('unreadable');
		expect(err.location).toBeUndefined();
		expect(formatPreprocessError(err)).toBe(`In file '/s/nope.frag': error: Could not open shader file "/s/nope.frag".`);
	});

	it('rejects #endif without an open guard', () => {
		const err = flattenErr({ '/s/main.frag': src('#version 330', '  #endif') }, '/s/main.frag');
		expect(err.code).toBe(GLSL_DIAGCODES.ENDIF_WITHOUT_GUARD);
		expect(formatPreprocessError(err)).toBe([
			`In file '/s/main.frag' on line 2: error: #endif without matching #ifndef.`,
			'2 |   #endif',
			'      ^',
		].join('\n'));
	});

	it('reports an unterminated guard at its opening line', () => {
		const err = flattenErr({
			'/s/main.frag': src('#version 330', '#include "a.glsl"', 'void main() {}'),
			'/s/a.glsl': src('#ifndef A_GLSL', '#define A_GLSL', 'float a;'),
		}, '/s/main.frag');
		expect(err.code).toBe(GLSL_DIAGCODES.UNTERMINATED_GUARD);
		expect(err.includedFrom).toEqual([]);
		expect(formatPreprocessError(err)).toBe([
			`In file '/s/a.glsl' on line 1: error: Unterminated #ifndef 'A_GLSL'. Expected a matching #endif.`,
			'1 | #ifndef A_GLSL',
			'            ^',
		].join('\n'));
	});

	it('reports malformed directives with the offending column', () => {
		const err = flattenErr({ '/s/main.frag': src('#version 330', '#pragma optimize(on)') }, '/s/main.frag');
		expect(err.code).toBe(GLSL_DIAGCODES.DIRECTIVE_MALFORMED);
		expect(formatPreprocessError(err)).toBe([
			`In file '/s/main.frag' on line 2: error: Unsupported #pragma argument 'optimize(on)'. Only "#pragma once" is supported.`,
			'2 | #pragma optimize(on)',
			'            ^',
		].join('\n'));
	});

	it('appends one included-from frame per unwinding include', () => {
		const err = flattenErr({
			'/s/main.frag': src('#version 330', '#include "a.glsl"'),
			'/s/a.glsl': src('float a;', '', '#include "b.glsl"'),
			'/s/b.glsl': src('#include <missing.glsl>'),
		}, '/s/main.frag');
		expect(err.includedFrom).toEqual([{ file: '/s/a.glsl', line: 3 }, { file: '/s/main.frag', line: 2 }]);
		expect(formatPreprocessError(err)).toBe([
			`In file '/s/b.glsl' on line 1: error: Could not find <missing.glsl> in any include directory. Searched: no include directories are registered.`,
			'1 | #include <missing.glsl>',
			'             ^',
			'included from: /s/a.glsl, line 3',
			'included from: /s/main.frag, line 2',
		].join('\n'));
	});

	it('stops runaway recursion at the include depth limit', () => {
		const err = flattenErr({
			'/s/main.frag': src('#version 330', '#include "loop.glsl"'),
			'/s/loop.glsl': src('#include "loop.glsl"'),
		}, '/s/main.frag', { maxIncludeDepth: 2 });
		expect(err.code).toBe(GLSL_DIAGCODES.INCLUDE_DEPTH_EXCEEDED);
		expect(err.message).toBe(`Maximum include depth (2) exceeded while including 'loop.glsl'.`);
		expect(err.location?.file).toBe('/s/loop.glsl');
		expect(err.includedFrom).toEqual([{ file: '/s/loop.glsl', line: 1 }, { file: '/s/main.frag', line: 2 }]);
	});

	it('reports an included file that exists but cannot be read', () => {
		const err = flattenErr({}, '/s/main.frag', {
			host: {
				isFile: p => p === '/s/main.frag' || p === '/s/locked.glsl',
				readFile: p => (p === '/s/main.frag' ? src('#version 330', '#include "locked.glsl"') : null),
			},
		});
		expect(err.code).toBe(GLSL_DIAGCODES.UNIT_UNREADABLE);
		expect(formatPreprocessError(err)).toBe([
			`In file '/s/locked.glsl': error: Could not open shader file "/s/locked.glsl".`,
			'included from: /s/main.frag, line 2',
		].join('\n'));
	});

	it('ignores malformed directives inside a suppressed body', () => {
		const err = flattenErr({
			'/s/main.frag': src('#version 330', '#include "a.glsl"', '#include "a.glsl"', '#endif'),
			'/s/a.glsl': src('#ifndef A_GLSL', '#define A_GLSL', '#endif', '#ifndef A_GLSL', '#pragma bogus', '#endif'),
		}, '/s/main.frag');
		// the stray #endif of main is the first error, not the pragma
		expect(err.code).toBe(GLSL_DIAGCODES.ENDIF_WITHOUT_GUARD);
		expect(err.location?.line).toBe(4);
	});
});
