// Per-request preprocessing state, shared by reference across the whole
// inclusion tree of one top-level unit.

export interface IncludeGuard {
	file: string;
	name: string;
	source: string; // raw #ifndef line, kept for diagnostics
	openLine: number;
	column: number; // column of the guard name on `source`
	order: number; // position among everything opened in the session
	closeLine?: number;
	defineLine?: number;
}

export interface OnceEntry { file: string; line: number; }

interface PassthroughConditional {
	file: string;
	line: number;
	order: number;
	emit: boolean; // false for a re-encountered open guard, whose #endif is dropped
}

export class ParseSession {
	readonly guardNames = new Set<string>();
	readonly guards: IncludeGuard[] = [];
	readonly onceFiles = new Set<string>();
	readonly onceStack: OnceEntry[] = [];
	readonly passthrough: PassthroughConditional[] = [];
	versionAccepted = false;
	skipping = false;
	// conditionals opened inside a suppressed region; their #endif must not end the suppression
	skipDepth = 0;
	private opened = 0;

	openGuard(file: string, name: string, line: number, source: string, column: number): IncludeGuard {
		const guard: IncludeGuard = { file, name, source, openLine: line, column, order: this.opened++ };
		this.guards.push(guard);
		this.guardNames.add(name);
		return guard;
	}

	// Latest record for `name`; earlier ones are all closed.
	latestGuard(name: string): IncludeGuard | undefined {
		for (let i = this.guards.length - 1; i >= 0; i--) {
			if (this.guards[i].name === name) return this.guards[i];
		}
		return undefined;
	}

	openGuardNamed(name: string): IncludeGuard | undefined {
		const g = this.latestGuard(name);
		return g && g.closeLine === undefined ? g : undefined;
	}

	lastOpenGuard(): IncludeGuard | undefined {
		for (let i = this.guards.length - 1; i >= 0; i--) {
			if (this.guards[i].closeLine === undefined) return this.guards[i];
		}
		return undefined;
	}

	pushPassthrough(file: string, line: number, emit = true) {
		this.passthrough.push({ file, line, order: this.opened++, emit });
	}

	/**
	 * Close whatever was opened last: the newest open guard or the newest
	 * passed-through conditional. Returns what was closed; `'inert'` for an
	 * entry whose #endif is not emitted.
	 */
	closeInnermost(line: number): 'guard' | 'conditional' | 'inert' | null {
		const guard = this.lastOpenGuard();
		const native = this.passthrough[this.passthrough.length - 1];
		if (native && (!guard || native.order > guard.order)) {
			this.passthrough.pop();
			return native.emit ? 'conditional' : 'inert';
		}
		if (guard) {
			guard.closeLine = line;
			return 'guard';
		}
		return null;
	}

	unterminatedGuards(): IncludeGuard[] {
		return this.guards.filter(g => g.closeLine === undefined);
	}
}
