import fs from 'node:fs';
import path from 'node:path';

// File access used by the preprocessor. Synchronous on purpose: a whole
// inclusion tree is flattened on one call stack.
export interface SourceHost {
	isFile(filePath: string): boolean;
	// null when the file cannot be read
	readFile(filePath: string): string | null;
}

export type HostFs = Pick<typeof fs, 'statSync' | 'readFileSync'>;

export function nodeSourceHost(nodeFs: HostFs = fs): SourceHost {
	return {
		isFile(filePath) {
			try { return nodeFs.statSync(filePath).isFile(); }
			catch { return false; }
		},
		readFile(filePath) {
			try { return nodeFs.readFileSync(filePath, 'utf8'); }
			catch { return null; }
		},
	};
}

// In-memory files keyed by resolved path; used by tests and editor overlays.
export function memorySourceHost(files: Map<string, string> | Record<string, string>): SourceHost {
	const map = files instanceof Map ? files : new Map(Object.entries(files));
	const byResolved = new Map<string, string>();
	for (const [k, v] of map) byResolved.set(path.resolve(k), v);
	return {
		isFile: filePath => byResolved.has(path.resolve(filePath)),
		readFile: filePath => byResolved.get(path.resolve(filePath)) ?? null,
	};
}

// Consult `front` first (e.g. unsaved editor buffers), then `back`.
export function overlaySourceHost(front: SourceHost, back: SourceHost): SourceHost {
	return {
		isFile: filePath => front.isFile(filePath) || back.isFile(filePath),
		readFile: filePath => (front.isFile(filePath) ? front.readFile(filePath) : back.readFile(filePath)),
	};
}
