export interface CondenseOptions {
	stripLeading?: boolean; // default true
	stripTrailing?: boolean; // default false
}

/**
 * Collapse every run of consecutive newlines into one and optionally drop the
 * single newline left at either end. Other whitespace is untouched.
 */
export function condenseNewlines(text: string, opts: CondenseOptions = {}): string {
	let out = text.replace(/\n{2,}/g, '\n');
	if ((opts.stripLeading ?? true) && out.startsWith('\n')) out = out.slice(1);
	if (opts.stripTrailing && out.endsWith('\n')) out = out.slice(0, -1);
	return out;
}
