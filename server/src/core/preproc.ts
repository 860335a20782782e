import path from 'node:path';
import { LineReader, type SourceLine } from './lineReader';
import { classifyLine, type Directive, type IncludeDelimiter } from './directives';
import { ParseSession, type IncludeGuard } from './session';
import { GLSL_DIAGCODES, makeError, withIncludedFrom, type PreprocessError, type SourceLocation } from './diagnostics';
import { IncludeDirectories } from './includeDirs';
import { nodeSourceHost, type SourceHost } from './host';
import { condenseNewlines } from './postprocess';
import { AssertNever, debugLogger, isDebugEnv, type LogSink } from '../utils';

export const DEFAULT_MAX_INCLUDE_DEPTH = 32;

export interface IncludeTarget {
	file: string; // file containing the #include
	line: number;
	start: number; // column span of the target text, delimiters included
	end: number;
	target: string;
	delimiter: IncludeDelimiter;
	resolved: string;
}

export interface PreprocessorOptions {
	includeDirectories?: IncludeDirectories | Iterable<string>;
	host?: SourceHost;
	cwd?: string; // fallback base for "quoted" includes
	maxIncludeDepth?: number;
	stripTrailingNewline?: boolean;
	logger?: LogSink;
	debug?: boolean;
}

export interface Flattened {
	source: string;
	includes: string[]; // resolved include paths, unique, order of first encounter
	includeTargets: IncludeTarget[];
	guards: readonly IncludeGuard[];
}

export type PreprocessResult =
	| ({ ok: true } & Flattened)
	| {
		ok: false;
		error: PreprocessError;
		includes: string[]; // includes resolved before the failure
		searched: string[]; // candidate paths of targets that were not found
	};

type Step<T> = { ok: true; value: T } | { ok: false; error: PreprocessError };
type IncludeDirective = Extract<Directive, { kind: 'include' }>;

interface ProcessCtx {
	session: ParseSession;
	searchDirs: readonly string[];
	host: SourceHost;
	cwd: string;
	maxDepth: number;
	includes: string[];
	includeTargets: IncludeTarget[];
	searched: string[];
	debug: (message: string) => void;
}

const ok = <T>(value: T): Step<T> => ({ ok: true, value });
const fail = <T>(error: PreprocessError): Step<T> => ({ ok: false, error });

function firstColumn(text: string): number {
	return Math.max(0, text.search(/\S/));
}

function resolveInclude(ctx: ProcessCtx, file: string, d: IncludeDirective, at: SourceLocation): Step<string> {
	if (d.delimiter === 'angle') {
		const candidates = ctx.searchDirs.map(dir => path.join(dir, d.target));
		for (const candidate of candidates) {
			if (ctx.host.isFile(candidate)) return ok(candidate);
		}
		ctx.searched.push(...candidates);
		const listing = ctx.searchDirs.length ? ctx.searchDirs.map(s => `'${s}'`).join(', ') : 'no include directories are registered';
		return fail(makeError(GLSL_DIAGCODES.INCLUDE_NOT_FOUND, `Could not find <${d.target}> in any include directory. Searched: ${listing}.`, file, at));
	}
	const candidates = path.isAbsolute(d.target)
		? [d.target]
		: [...new Set([path.join(path.dirname(file), d.target), path.join(ctx.cwd, d.target)])];
	for (const candidate of candidates) {
		if (ctx.host.isFile(candidate)) return ok(candidate);
	}
	ctx.searched.push(...candidates);
	return fail(makeError(GLSL_DIAGCODES.INCLUDE_NOT_FOUND, `Could not find "${d.target}". Searched: ${candidates.map(s => `'${s}'`).join(', ')}.`, file, at));
}

function includeFile(ctx: ProcessCtx, file: string, line: SourceLine, d: IncludeDirective, depth: number): Step<string> {
	const at: SourceLocation = { file, line: line.line, source: line.text, column: d.column };
	if (depth + 1 > ctx.maxDepth) {
		return fail(makeError(GLSL_DIAGCODES.INCLUDE_DEPTH_EXCEEDED, `Maximum include depth (${ctx.maxDepth}) exceeded while including '${d.target}'.`, file, at));
	}
	const resolved = resolveInclude(ctx, file, d, at);
	if (!resolved.ok) return resolved;
	const target = resolved.value;
	ctx.includeTargets.push({ file, line: line.line, start: d.column, end: d.endColumn, target: d.target, delimiter: d.delimiter, resolved: target });
	if (!ctx.includes.includes(target)) ctx.includes.push(target);
	ctx.debug(`include ${target} from ${file}:${line.line}`);

	const inner = processFile(ctx, target, depth + 1);
	if (!inner.ok) return fail(withIncludedFrom(inner.error, { file, line: line.line }));
	return inner;
}

function processFile(ctx: ProcessCtx, file: string, depth: number): Step<string> {
	const text = ctx.host.readFile(file);
	if (text === null) return fail(makeError(GLSL_DIAGCODES.UNIT_UNREADABLE, `Could not open shader file "${file}".`, file));

	const { session } = ctx;
	const fileKey = path.resolve(file);
	let out = '';
	// a repeated #pragma once suppresses the rest of this file, whatever #endif lines follow
	let onceSuppressed = false;
	let pushedOnce = false;

	for (const line of new LineReader(text)) {
		const d = classifyLine(line.text);
		const at = (column: number): SourceLocation => ({ file, line: line.line, source: line.text, column });

		if (session.skipping) {
			if (onceSuppressed) continue;
			if (d.kind === 'ifndef' || d.kind === 'conditional') session.skipDepth++;
			else if (d.kind === 'endif') {
				if (session.skipDepth > 0) session.skipDepth--;
				else session.skipping = false;
			}
			continue;
		}

		switch (d.kind) {
			case 'malformed':
				return fail(makeError(GLSL_DIAGCODES.DIRECTIVE_MALFORMED, d.message, file, at(d.column)));
			case 'pragma-once': {
				if (session.onceFiles.has(fileKey)) {
					ctx.debug(`#pragma once: ${file} already processed, skipping`);
					session.skipping = true;
					onceSuppressed = true;
				} else {
					session.onceFiles.add(fileKey);
					session.onceStack.push({ file: fileKey, line: line.line });
					pushedOnce = true;
				}
				break;
			}
			case 'ifndef': {
				if (!session.guardNames.has(d.name)) {
					session.openGuard(file, d.name, line.line, line.text, d.column);
					break;
				}
				const latest = session.latestGuard(d.name);
				if (latest?.defineLine !== undefined) {
					session.skipping = true;
					session.skipDepth = 0;
				} else if (latest?.closeLine !== undefined) {
					// closed without ever being defined: this encounter gets its own record
					session.openGuard(file, d.name, line.line, line.text, d.column);
				} else {
					// still open further up the chain: no new record, and this
					// directive's #endif must not close the outer guard
					session.pushPassthrough(file, line.line, false);
				}
				break;
			}
			case 'define': {
				const guard = session.openGuardNamed(d.name);
				if (guard) {
					guard.defineLine = line.line;
					break;
				}
				if (!session.versionAccepted) {
					return fail(makeError(GLSL_DIAGCODES.DEFINE_BEFORE_VERSION,
						`#define '${d.name}' appears before the #version directive. #version must be the first statement.`, file, at(d.column)));
				}
				out += line.text;
				break;
			}
			case 'endif': {
				const closed = session.closeInnermost(line.line);
				if (closed === null) {
					return fail(makeError(GLSL_DIAGCODES.ENDIF_WITHOUT_GUARD, '#endif without matching #ifndef.', file, at(firstColumn(line.text))));
				}
				if (closed === 'conditional' && session.versionAccepted) out += line.text;
				break;
			}
			case 'version':
				if (!session.versionAccepted) {
					session.versionAccepted = true;
					out += line.text;
				}
				break;
			case 'conditional':
				session.pushPassthrough(file, line.line);
				if (session.versionAccepted) out += line.text;
				break;
			case 'include': {
				const r = includeFile(ctx, file, line, d, depth);
				if (!r.ok) return r;
				out += r.value;
				break;
			}
			case 'plain':
				if (session.versionAccepted) out += line.text;
				break;
			default:
				AssertNever(d);
		}
	}

	if (onceSuppressed) {
		session.skipping = false;
		session.skipDepth = 0;
	}
	if (pushedOnce && session.onceStack[session.onceStack.length - 1]?.file === fileKey) session.onceStack.pop();
	return ok(out);
}

/** First guard left open at the end of a session, reported at its own #ifndef line. */
export function validateIncludeGuardScope(session: ParseSession): PreprocessError | null {
	const open = session.unterminatedGuards()[0];
	if (!open) return null;
	return makeError(GLSL_DIAGCODES.UNTERMINATED_GUARD, `Unterminated #ifndef '${open.name}'. Expected a matching #endif.`, open.file, {
		file: open.file,
		line: open.openLine,
		source: open.source,
		column: open.column,
	});
}

export class ShaderPreprocessor {
	readonly includeDirectories: IncludeDirectories;
	private readonly host: SourceHost;
	private readonly cwd: string;
	private readonly maxDepth: number;
	private readonly stripTrailing: boolean;
	private readonly debug: (message: string) => void;

	constructor(opts: PreprocessorOptions = {}) {
		const dirs = opts.includeDirectories;
		this.includeDirectories = dirs instanceof IncludeDirectories ? dirs : new IncludeDirectories(dirs ?? []);
		this.host = opts.host ?? nodeSourceHost();
		this.cwd = opts.cwd ?? process.cwd();
		this.maxDepth = opts.maxIncludeDepth ?? DEFAULT_MAX_INCLUDE_DEPTH;
		this.stripTrailing = opts.stripTrailingNewline ?? false;
		this.debug = debugLogger(opts.logger ?? { log: m => console.error(m) }, opts.debug ?? isDebugEnv());
	}

	addIncludeDirectory(dir: string): void {
		this.includeDirectories.add(dir);
	}

	/** Flatten one top-level unit on a fresh session. */
	processUnit(filePath: string): PreprocessResult {
		const session = new ParseSession();
		const ctx: ProcessCtx = {
			session,
			searchDirs: this.includeDirectories.snapshot(),
			host: this.host,
			cwd: this.cwd,
			maxDepth: this.maxDepth,
			includes: [],
			includeTargets: [],
			searched: [],
			debug: this.debug,
		};
		this.debug(`processing ${filePath}`);
		const r = processFile(ctx, filePath, 0);
		if (!r.ok) return { ok: false, error: r.error, includes: ctx.includes, searched: ctx.searched };
		const unterminated = validateIncludeGuardScope(session);
		if (unterminated) return { ok: false, error: unterminated, includes: ctx.includes, searched: ctx.searched };
		return {
			ok: true,
			source: condenseNewlines(r.value, { stripTrailing: this.stripTrailing }),
			includes: ctx.includes,
			includeTargets: ctx.includeTargets,
			guards: session.guards,
		};
	}
}

export function preprocessUnits(paths: readonly string[], opts: PreprocessorOptions = {}): PreprocessResult[] {
	const pp = new ShaderPreprocessor(opts);
	return paths.map(p => pp.processUnit(p));
}
