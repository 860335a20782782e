// Line reader for shader sources: splits a unit into logical lines, strips
// comments and trailing control characters, and terminates every line with '\n'.

export interface SourceLine {
	line: number; // 1-based
	text: string; // comment-free, always ends with a single '\n'
}

// C0 controls (tab excluded) and DEL left at the end of a physical line, e.g. '\r' from CRLF files
const TRAILING_CONTROL = /[\x00-\x08\x0a-\x1f\x7f]+$/;

export class LineReader implements Iterable<SourceLine> {
	private i = 0;
	private lineNo = 0;
	private inBlockComment = false;
	private readonly n: number;
	private readonly text: string;

	constructor(text: string) {
		this.text = text;
		this.n = text.length;
	}

	next(): SourceLine | null {
		if (this.i >= this.n) return null;
		let end = this.text.indexOf('\n', this.i);
		if (end < 0) end = this.n;
		const raw = this.text.slice(this.i, end);
		this.i = end + 1;
		this.lineNo++;
		return { line: this.lineNo, text: this.stripComments(raw.replace(TRAILING_CONTROL, '')) + '\n' };
	}

	*[Symbol.iterator](): Iterator<SourceLine> {
		for (let l = this.next(); l; l = this.next()) yield l;
	}

	// Block comments may run over several physical lines; each of those lines is
	// still produced (possibly empty) so numbering follows the file.
	private stripComments(line: string): string {
		let out = '';
		let k = 0;
		while (k < line.length) {
			if (this.inBlockComment) {
				const close = line.indexOf('*/', k);
				if (close < 0) return out;
				this.inBlockComment = false;
				k = close + 2;
				continue;
			}
			const ch = line[k];
			if (ch === '/' && line[k + 1] === '/') return out;
			if (ch === '/' && line[k + 1] === '*') { this.inBlockComment = true; k += 2; continue; }
			out += ch;
			k++;
		}
		return out;
	}
}

export function readLines(text: string): SourceLine[] {
	return [...new LineReader(text)];
}
