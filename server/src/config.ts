import fs from 'node:fs/promises';
import { existsSync } from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import Ajv2020 from 'ajv/dist/2020';
import schema from '../../common/glsl-include.schema.json';
import { DEFAULT_MAX_INCLUDE_DEPTH } from './core/preproc';

export const CONFIG_FILE_NAMES = ['glsl-include.yaml', 'glsl-include.yml'] as const;

export interface GlslIncludeConfig {
	includeDirectories: string[];
	outputDirectory?: string;
	stripTrailingNewline: boolean;
	maxIncludeDepth: number;
	debug: boolean;
}

// Shape accepted on disk; every key optional.
interface RawConfig {
	includeDirectories?: string[];
	outputDirectory?: string;
	stripTrailingNewline?: boolean;
	maxIncludeDepth?: number;
	debug?: boolean;
}

export function defaultConfig(): GlslIncludeConfig {
	return { includeDirectories: [], stripTrailingNewline: false, maxIncludeDepth: DEFAULT_MAX_INCLUDE_DEPTH, debug: false };
}

const ajv = new Ajv2020({ allErrors: true, strict: false });
const validateRaw = ajv.compile<RawConfig>(schema);

/** Parse and validate YAML text; relative paths resolve against `baseDir`. */
export function parseConfig(raw: string, baseDir: string, source = '<inline>'): GlslIncludeConfig {
	let obj: unknown;
	try {
		obj = yaml.load(raw, { json: true });
	} catch (e) {
		throw new Error(`Config file "${source}" could not be parsed: ${e instanceof Error ? e.message : String(e)}`);
	}
	// an empty document is an empty config
	if (obj === undefined || obj === null) obj = {};
	if (!validateRaw(obj)) {
		const msg = (validateRaw.errors || []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('\n');
		throw new Error(`Config file "${source}" failed schema validation:\n${msg}`);
	}
	const base = defaultConfig();
	return {
		includeDirectories: (obj.includeDirectories ?? base.includeDirectories).map(d => path.resolve(baseDir, d)),
		outputDirectory: obj.outputDirectory === undefined ? undefined : path.resolve(baseDir, obj.outputDirectory),
		stripTrailingNewline: obj.stripTrailingNewline ?? base.stripTrailingNewline,
		maxIncludeDepth: obj.maxIncludeDepth ?? base.maxIncludeDepth,
		debug: obj.debug ?? base.debug,
	};
}

export async function loadConfig(configPath: string): Promise<GlslIncludeConfig> {
	const resolved = path.resolve(configPath);
	const raw = await fs.readFile(resolved, 'utf8');
	return parseConfig(raw, path.dirname(resolved), resolved);
}

// Walk up from `startDir` looking for a config file.
export function findConfigFile(startDir: string, exists: (p: string) => boolean = existsSync): string | null {
	let dir = path.resolve(startDir);
	for (;;) {
		for (const name of CONFIG_FILE_NAMES) {
			const candidate = path.join(dir, name);
			if (exists(candidate)) return candidate;
		}
		const parent = path.dirname(dir);
		if (parent === dir) return null;
		dir = parent;
	}
}

/**
 * Layer editor settings (`glsl.*` from initialization options or
 * didChangeConfiguration) over a config. Unknown or mistyped keys are ignored.
 */
export function applySettings(config: GlslIncludeConfig, settings: unknown, baseDir: string): GlslIncludeConfig {
	if (typeof settings !== 'object' || settings === null) return config;
	const next: GlslIncludeConfig = { ...config };
	const get = (key: string): unknown => Reflect.get(settings, key);
	const dirs = get('includeDirectories');
	if (Array.isArray(dirs)) next.includeDirectories = dirs.filter((d): d is string => typeof d === 'string' && d.length > 0).map(d => path.resolve(baseDir, d));
	const out = get('outputDirectory');
	if (typeof out === 'string') next.outputDirectory = out ? path.resolve(baseDir, out) : undefined;
	const strip = get('stripTrailingNewline');
	if (typeof strip === 'boolean') next.stripTrailingNewline = strip;
	const depth = get('maxIncludeDepth');
	if (typeof depth === 'number' && Number.isInteger(depth) && depth > 0) next.maxIncludeDepth = depth;
	const debug = get('debug');
	if (typeof debug === 'boolean') next.debug = debug;
	return next;
}
