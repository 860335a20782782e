import { describe, it, expect } from 'vitest';
import {
	GLSL_DIAGCODES,
	ShaderPreprocessError,
	errorKindOf,
	formatDiagnostic,
	formatPreprocessError,
	makeError,
	withIncludedFrom,
} from '../src/core/diagnostics';

describe('diagnostic formatting', () => {
	it('renders header, numbered source line and a caret under the column', () => {
		const text = formatDiagnostic({ message: 'bad include', file: '/s/a.glsl', line: 12, source: '#include a.glsl\n', column: 9 });
		expect(text).toBe([
			`In file '/s/a.glsl' on line 12: error: bad include`,
			'12 | #include a.glsl',
			'              ^',
		].join('\n'));
	});

	it('clamps the caret to the end of the source line', () => {
		const text = formatDiagnostic({ message: 'm', file: 'f', line: 1, source: 'abc', column: 100 });
		expect(text.split('\n')[2]).toBe('       ^');
	});

	it('strips line breaks from the message and file name', () => {
		const text = formatDiagnostic({ message: 'oops\n', file: 'f\r\n', line: 3, source: 'x\r\n', column: 0 });
		expect(text).toBe([`In file 'f' on line 3: error: oops`, '3 | x', '    ^'].join('\n'));
	});

	it('appends the inclusion trail innermost first', () => {
		let err = makeError(GLSL_DIAGCODES.DIRECTIVE_MALFORMED, 'Missing macro name after #ifndef.', '/s/b.glsl',
			{ file: '/s/b.glsl', line: 2, source: '#ifndef\n', column: 0 });
		err = withIncludedFrom(err, { file: '/s/a.glsl', line: 5 });
		err = withIncludedFrom(err, { file: '/s/main.frag', line: 1 });
		expect(formatPreprocessError(err)).toBe([
			`In file '/s/b.glsl' on line 2: error: Missing macro name after #ifndef.`,
			'2 | #ifndef',
			'    ^',
			'included from: /s/a.glsl, line 5',
			'included from: /s/main.frag, line 1',
		].join('\n'));
	});

	it('does not mutate the error when adding a frame', () => {
		const err = makeError(GLSL_DIAGCODES.INCLUDE_NOT_FOUND, 'x', 'f');
		withIncludedFrom(err, { file: 'g', line: 1 });
		expect(err.includedFrom).toEqual([]);
	});

	it('maps codes to kinds', () => {
		expect(errorKindOf(GLSL_DIAGCODES.UNIT_UNREADABLE)).toBe('unreadable');
		expect(errorKindOf(GLSL_DIAGCODES.UNTERMINATED_GUARD)).toBe('structural');
		expect(errorKindOf(GLSL_DIAGCODES.INCLUDE_DEPTH_EXCEEDED)).toBe('inclusion');
		expect(errorKindOf(GLSL_DIAGCODES.UNKNOWN_SHADER_KIND)).toBe('shader-kind');
	});

	it('wraps an error value in a throwable carrying the formatted text', () => {
		const detail = makeError(GLSL_DIAGCODES.UNIT_UNREADABLE, 'Could not open shader file "x.frag".', 'x.frag');
		const e = new ShaderPreprocessError(detail);
		expect(e).toBeInstanceOf(Error);
		expect(e.name).toBe('ShaderPreprocessError');
		expect(e.code).toBe('GLI001');
		expect(e.message).toBe(`In file 'x.frag': error: Could not open shader file "x.frag".`);
		expect(e.detail).toBe(detail);
	});
});
