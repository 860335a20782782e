// Directive classification: each source line is decided once into a tagged
// Directive, then the parser switches over the kinds exhaustively.

export type IncludeDelimiter = 'angle' | 'quote';

export type Directive =
	| { kind: 'version' }
	| { kind: 'include'; target: string; delimiter: IncludeDelimiter; column: number; endColumn: number }
	| { kind: 'pragma-once' }
	| { kind: 'ifndef'; name: string; column: number }
	| { kind: 'define'; name: string; column: number }
	| { kind: 'endif' }
	| { kind: 'conditional' } // native #if / #ifdef, passed through to the compiler
	| { kind: 'malformed'; message: string; column: number }
	| { kind: 'plain' };

export type DirectiveKind = Directive['kind'];

const PLAIN: Directive = { kind: 'plain' };
const reIdent = /^[A-Za-z_]\w*$/;
const reIdentPrefix = /^[A-Za-z_]\w*/;

type Word = { value: string; column: number };

// First whitespace-separated word at or after `from`, with its column.
function wordAt(text: string, from: number): Word | null {
	const m = /\S+/.exec(text.slice(from));
	if (!m) return null;
	return { value: m[0], column: from + m.index };
}

export function parseIncludeTarget(rest: string): { target: string; delimiter: IncludeDelimiter } | null {
	let m = /^<([^<>]+)>$/.exec(rest); if (m) return { target: m[1], delimiter: 'angle' };
	m = /^"([^"]+)"$/.exec(rest); if (m) return { target: m[1], delimiter: 'quote' };
	return null;
}

/**
 * Classify one comment-stripped line. Only the first word decides the kind;
 * directives are recognized as a single token (`#include`, not `# include`).
 */
export function classifyLine(line: string): Directive {
	const text = line.replace(/\n$/, '');
	const head = wordAt(text, 0);
	if (!head || head.value[0] !== '#') return PLAIN;
	const after = head.column + head.value.length;
	const arg = wordAt(text, after);

	switch (head.value) {
		case '#version':
			return { kind: 'version' };
		case '#endif':
			return { kind: 'endif' };
		case '#if':
		case '#ifdef':
			return { kind: 'conditional' };
		case '#pragma': {
			if (!arg) return { kind: 'malformed', message: 'Empty #pragma directive. Expected "#pragma once".', column: head.column };
			if (arg.value !== 'once') {
				return { kind: 'malformed', message: `Unsupported #pragma argument '${arg.value}'. Only "#pragma once" is supported.`, column: arg.column };
			}
			const extra = wordAt(text, arg.column + arg.value.length);
			if (extra) return { kind: 'malformed', message: `Unexpected '${extra.value}' after "#pragma once".`, column: extra.column };
			return { kind: 'pragma-once' };
		}
		case '#ifndef': {
			if (!arg) return { kind: 'malformed', message: 'Missing macro name after #ifndef.', column: head.column };
			if (!reIdent.test(arg.value)) return { kind: 'malformed', message: `Invalid macro name '${arg.value}' after #ifndef.`, column: arg.column };
			return { kind: 'ifndef', name: arg.value, column: arg.column };
		}
		case '#define': {
			if (!arg) return { kind: 'malformed', message: 'Missing macro name after #define.', column: head.column };
			// function-like macros: the name is the identifier before '('
			const name = reIdentPrefix.exec(arg.value);
			if (!name) return { kind: 'malformed', message: `Invalid macro name '${arg.value}' after #define.`, column: arg.column };
			return { kind: 'define', name: name[0], column: arg.column };
		}
		case '#include': {
			if (!arg) return { kind: 'malformed', message: 'Empty #include directive. Expected <filename> or "filename".', column: head.column };
			const rest = text.slice(arg.column).trimEnd();
			const target = parseIncludeTarget(rest);
			if (!target) return { kind: 'malformed', message: 'Formatting mismatch in #include. Expected <filename> or "filename".', column: arg.column };
			return { kind: 'include', ...target, column: arg.column, endColumn: arg.column + rest.length };
		}
		default:
			return PLAIN;
	}
}
