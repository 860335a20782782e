import path from 'node:path';
import { DiagnosticSeverity, type Diagnostic, type DocumentLink } from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import { URI } from 'vscode-uri';
import type { SourceHost } from './core/host';
import type { IncludeTarget, PreprocessResult, ShaderPreprocessor } from './core/preproc';
import { formatPreprocessError, type PreprocessError } from './core/diagnostics';

export const DIAG_SOURCE = 'glsl-include';

function samePath(a: string, b: string): boolean {
	return path.resolve(a) === path.resolve(b);
}

export function documentPath(doc: TextDocument): string | null {
	const u = URI.parse(doc.uri);
	return u.scheme === 'file' ? u.fsPath : null;
}

function lineText(doc: TextDocument, line: number): string {
	return doc.getText({ start: { line, character: 0 }, end: { line: line + 1, character: 0 } }).replace(/\r?\n$/, '');
}

// Open editor buffers, so unsaved includes are flattened as the user sees them.
export function documentsSourceHost(all: () => readonly TextDocument[]): SourceHost {
	const find = (p: string) => all().find(d => {
		const dp = documentPath(d);
		return dp !== null && samePath(dp, p);
	});
	return {
		isFile: p => find(p) !== undefined,
		readFile: p => find(p)?.getText() ?? null,
	};
}

/**
 * Place a preprocessing error in `doc`: at its own location when it happened
 * here, otherwise on the #include line through which the failing file was reached.
 */
export function diagnosticForError(error: PreprocessError, doc: TextDocument, docPath: string): Diagnostic {
	const base = { severity: DiagnosticSeverity.Error, source: DIAG_SOURCE, code: error.code };
	const loc = error.location;
	if (loc && samePath(loc.file, docPath)) {
		const line = loc.line - 1;
		const width = lineText(doc, line).length;
		return { ...base, message: error.message, range: { start: { line, character: Math.min(loc.column, width) }, end: { line, character: width } } };
	}
	// outermost frame inside this document
	const frame = [...error.includedFrom].reverse().find(f => samePath(f.file, docPath));
	if (frame) {
		const line = frame.line - 1;
		const where = loc ? `'${loc.file}' on line ${loc.line}` : `'${error.file}'`;
		return { ...base, message: `In included file ${where}: ${error.message}`, range: { start: { line, character: 0 }, end: { line, character: lineText(doc, line).length } } };
	}
	return { ...base, message: formatPreprocessError(error), range: { start: { line: 0, character: 0 }, end: { line: 0, character: 0 } } };
}

export function documentLinks(doc: TextDocument, docPath: string, targets: readonly IncludeTarget[]): DocumentLink[] {
	const links: DocumentLink[] = [];
	for (const t of targets) {
		if (!samePath(t.file, docPath)) continue;
		const line = t.line - 1;
		const delimited = t.delimiter === 'angle' ? `<${t.target}>` : `"${t.target}"`;
		// columns from the parser are on comment-stripped text; prefer the raw position
		const at = lineText(doc, line).indexOf(delimited);
		const start = at >= 0 ? at : t.start;
		links.push({
			range: { start: { line, character: start }, end: { line, character: start + delimited.length } },
			target: URI.file(t.resolved).toString(),
		});
	}
	return links;
}

export interface DocumentValidation {
	result: PreprocessResult;
	diagnostics: Diagnostic[];
	links: DocumentLink[];
	// files whose change should revalidate this document
	dependencies: string[];
}

export function validateDocument(doc: TextDocument, docPath: string, pp: ShaderPreprocessor): DocumentValidation {
	const result = pp.processUnit(docPath);
	if (result.ok) {
		return { result, diagnostics: [], links: documentLinks(doc, docPath, result.includeTargets), dependencies: result.includes };
	}
	const { error } = result;
	const chain = [error.location?.file ?? error.file, ...error.includedFrom.map(f => f.file)];
	// a missing header must revalidate this unit once it is created
	const related = [...chain, ...result.includes, ...result.searched];
	const dependencies = [...new Set(related.map(f => path.resolve(f)))].filter(f => !samePath(f, docPath));
	return { result, diagnostics: [diagnosticForError(error, doc, docPath)], links: [], dependencies };
}
