import { describe, it, expect } from 'vitest';
import { condenseNewlines } from '../src/core/postprocess';
import { flattenOk, src } from './testUtils';

describe('output post-processing', () => {
	it('collapses newline runs and drops one leading newline', () => {
		expect(condenseNewlines('\n\na\n\n\nb\n')).toBe('a\nb\n');
	});

	it('optionally drops the trailing newline', () => {
		expect(condenseNewlines('a\n\nb\n\n', { stripTrailing: true })).toBe('a\nb');
		expect(condenseNewlines('\na', { stripLeading: false })).toBe('\na');
	});

	it('leaves other whitespace alone', () => {
		expect(condenseNewlines('a  \n\t\nb')).toBe('a  \n\t\nb');
	});

	it('is idempotent', () => {
		const once = condenseNewlines('\n\nx\n\n\ny\n\n');
		expect(condenseNewlines(once)).toBe(once);
	});

	it('removes the blank lines left by comments and directives', () => {
		const out = flattenOk({
			'/s/main.frag': src('#version 330', '', '', '// lighting', '/* block', '   comment */', 'void main() {}'),
		}, '/s/main.frag');
		expect(out).toBe('#version 330\nvoid main() {}\n');
	});

	it('normalizes CRLF sources', () => {
		const out = flattenOk({ '/s/main.frag': '#version 330\r\nvoid main() {}\r\n' }, '/s/main.frag');
		expect(out).toBe('#version 330\nvoid main() {}\n');
	});

	it('strips the final newline when asked', () => {
		const out = flattenOk({ '/s/main.frag': src('#version 330', 'void main() {}') }, '/s/main.frag', { stripTrailingNewline: true });
		expect(out).toBe('#version 330\nvoid main() {}');
	});

	it('passes a directive-free unit through unchanged apart from comments', () => {
		const text = src('#version 330', 'uniform float t; // time', 'void main() {', '\tgl_Position = vec4(t);', '}');
		const out = flattenOk({ '/s/main.vert': text }, '/s/main.vert');
		expect(out).toBe('#version 330\nuniform float t; \nvoid main() {\n\tgl_Position = vec4(t);\n}\n');
		expect(condenseNewlines(out)).toBe(out);
	});
});
