// Search list for angle-bracket includes. Registration order is search order.
// Sessions read a frozen snapshot, so adding directories never affects a parse
// already in flight.

export function normalizeDirectory(dir: string): string {
	const slashed = dir.trim().replace(/\\/g, '/');
	return slashed.endsWith('/') ? slashed : slashed + '/';
}

export class IncludeDirectories {
	private readonly dirs: string[] = [];

	constructor(initial: Iterable<string> = []) {
		for (const d of initial) this.add(d);
	}

	// Blank entries are ignored; normalized they would name the filesystem root.
	add(dir: string): boolean {
		if (!dir.trim()) return false;
		this.dirs.push(normalizeDirectory(dir));
		return true;
	}

	get size(): number { return this.dirs.length; }

	snapshot(): readonly string[] {
		return Object.freeze(this.dirs.slice());
	}
}
