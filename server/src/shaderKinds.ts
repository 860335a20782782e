import path from 'node:path';

// Pipeline stage of a unit, decided by its file extension.
export type ShaderKind = 'vertex' | 'fragment' | 'geometry' | 'tess-control' | 'tess-evaluation' | 'compute';

export const SHADER_KIND_BY_EXTENSION: Readonly<Record<string, ShaderKind>> = {
	vert: 'vertex',
	frag: 'fragment',
	geom: 'geometry',
	tesc: 'tess-control',
	tese: 'tess-evaluation',
	comp: 'compute',
};

const LABELS: Record<ShaderKind, string> = {
	'vertex': 'VERTEX',
	'fragment': 'FRAGMENT',
	'geometry': 'GEOMETRY',
	'tess-control': 'TESS_CONTROL',
	'tess-evaluation': 'TESS_EVALUATION',
	'compute': 'COMPUTE',
};

// Extension without the dot, lowercased; '' when there is none.
export function shaderExtension(filePath: string): string {
	return path.extname(filePath.replace(/\\/g, '/')).slice(1).toLowerCase();
}

export function shaderKindFromPath(filePath: string): ShaderKind | null {
	const ext = shaderExtension(filePath);
	return Object.prototype.hasOwnProperty.call(SHADER_KIND_BY_EXTENSION, ext) ? SHADER_KIND_BY_EXTENSION[ext] : null;
}

export function shaderKindLabel(kind: ShaderKind): string {
	return LABELS[kind];
}
