import fs from 'node:fs';
import path from 'node:path';

export type OutputFs = Pick<typeof fs, 'mkdirSync' | 'writeFileSync'>;

/** Base name of a unit path, accepting both '/' and '\' separators. */
export function getAssetName(unitPath: string): string {
	const cut = Math.max(unitPath.lastIndexOf('/'), unitPath.lastIndexOf('\\'));
	return unitPath.slice(cut + 1);
}

/**
 * Write a flattened unit to `<outputDir>/<asset name>`, creating the directory
 * if needed. Returns the written path. The file is never read back.
 */
export function writeFlattened(outputDir: string, unitPath: string, source: string, outFs: OutputFs = fs): string {
	outFs.mkdirSync(outputDir, { recursive: true });
	const target = path.join(outputDir, getAssetName(unitPath));
	outFs.writeFileSync(target, source, 'utf8');
	return target;
}
