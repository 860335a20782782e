export const GLSL_DIAGCODES = {
	UNIT_UNREADABLE: 'GLI001',
	DIRECTIVE_MALFORMED: 'GLI010',
	ENDIF_WITHOUT_GUARD: 'GLI020',
	UNTERMINATED_GUARD: 'GLI021',
	DEFINE_BEFORE_VERSION: 'GLI030',
	INCLUDE_NOT_FOUND: 'GLI040',
	INCLUDE_DEPTH_EXCEEDED: 'GLI041',
	UNKNOWN_SHADER_KIND: 'GLI050',
} as const;
export type DiagCode = typeof GLSL_DIAGCODES[keyof typeof GLSL_DIAGCODES];

export type ErrorKind = 'unreadable' | 'malformed' | 'structural' | 'ordering' | 'inclusion' | 'shader-kind';

const KIND_BY_CODE: Record<DiagCode, ErrorKind> = {
	GLI001: 'unreadable',
	GLI010: 'malformed',
	GLI020: 'structural',
	GLI021: 'structural',
	GLI030: 'ordering',
	GLI040: 'inclusion',
	GLI041: 'inclusion',
	GLI050: 'shader-kind',
};

export function errorKindOf(code: DiagCode): ErrorKind {
	return KIND_BY_CODE[code];
}

export interface SourceLocation {
	file: string;
	line: number; // 1-based
	source: string; // offending line text
	column: number; // 0-based caret offset into `source`
}

export interface IncludeFrame { file: string; line: number; }

export interface PreprocessError {
	code: DiagCode;
	kind: ErrorKind;
	message: string;
	file: string;
	// absent when the unit itself could not be read
	location?: SourceLocation;
	// innermost first: each unwinding #include appends its own frame
	includedFrom: IncludeFrame[];
}

export function makeError(code: DiagCode, message: string, file: string, location?: SourceLocation): PreprocessError {
	return { code, kind: errorKindOf(code), message, file, location, includedFrom: [] };
}

export function withIncludedFrom(error: PreprocessError, frame: IncludeFrame): PreprocessError {
	return { ...error, includedFrom: [...error.includedFrom, frame] };
}

function stripNewlines(s: string): string {
	return s.replace(/[\r\n]+$/, '');
}

/**
 * Render one error as a header, the numbered source line, and a caret under
 * `column`. The caret line repeats the gutter width so the caret lands on the
 * offending character.
 */
export function formatDiagnostic(d: { message: string } & SourceLocation): string {
	const file = stripNewlines(d.file);
	const source = stripNewlines(d.source);
	const message = stripNewlines(d.message);
	const gutter = `${d.line} | `;
	const column = Math.max(0, Math.min(d.column, source.length));
	return [
		`In file '${file}' on line ${d.line}: error: ${message}`,
		`${gutter}${source}`,
		`${' '.repeat(gutter.length + column)}^`,
	].join('\n');
}

export function formatPreprocessError(error: PreprocessError): string {
	const head = error.location
		? formatDiagnostic({ message: error.message, ...error.location })
		: `In file '${stripNewlines(error.file)}': error: ${stripNewlines(error.message)}`;
	const trail = error.includedFrom.map(f => `included from: ${f.file}, line ${f.line}`);
	return [head, ...trail].join('\n');
}

// Thrown only at boundaries that do not pass results around (program layer, CLI).
export class ShaderPreprocessError extends Error {
	readonly detail: PreprocessError;

	constructor(detail: PreprocessError) {
		super(formatPreprocessError(detail));
		this.name = 'ShaderPreprocessError';
		this.detail = detail;
	}

	get code(): DiagCode { return this.detail.code; }
}
