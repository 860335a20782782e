import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { applySettings, defaultConfig, findConfigFile, loadConfig, parseConfig } from '../src/config';

const projectDir = path.join(__dirname, 'fixtures', 'project');

describe('configuration', () => {
	it('resolves relative paths against the config file directory', () => {
		const cfg = parseConfig([
			'includeDirectories:',
			'  - lib',
			'  - /abs/include',
			'outputDirectory: out',
			'stripTrailingNewline: true',
			'maxIncludeDepth: 8',
		].join('\n'), '/proj');
		expect(cfg).toEqual({
			includeDirectories: ['/proj/lib', '/abs/include'],
			outputDirectory: '/proj/out',
			stripTrailingNewline: true,
			maxIncludeDepth: 8,
			debug: false,
		});
	});

	it('treats an empty document as the defaults', () => {
		expect(parseConfig('', '/proj')).toEqual(defaultConfig());
		expect(parseConfig('# nothing here\n', '/proj')).toEqual(defaultConfig());
	});

	it('rejects unknown keys and out-of-range values', () => {
		expect(() => parseConfig('includeDirs: [a]', '/proj', 'cfg.yaml')).toThrow('Config file "cfg.yaml" failed schema validation:\n/ must NOT have additional properties');
		expect(() => parseConfig('maxIncludeDepth: 0', '/proj', 'cfg.yaml')).toThrow('/maxIncludeDepth must be >= 1');
		expect(() => parseConfig('debug: yes please', '/proj', 'cfg.yaml')).toThrow('/debug must be boolean');
	});

	it('reports YAML syntax errors with the file name', () => {
		expect(() => parseConfig('includeDirectories: [a', '/proj', 'cfg.yaml')).toThrow('Config file "cfg.yaml" could not be parsed');
	});

	it('loads a config file from disk', async () => {
		const cfg = await loadConfig(path.join(projectDir, 'glsl-include.yaml'));
		expect(cfg).toEqual({
			includeDirectories: [path.join(projectDir, 'include')],
			outputDirectory: path.join(projectDir, 'build', 'shaders'),
			stripTrailingNewline: false,
			maxIncludeDepth: 8,
			debug: false,
		});
	});

	it('finds the nearest config file walking upwards', () => {
		const present = new Set(['/proj/glsl-include.yml', '/glsl-include.yaml']);
		expect(findConfigFile('/proj/shaders/post', p => present.has(p))).toBe('/proj/glsl-include.yml');
		expect(findConfigFile('/other', p => present.has(p))).toBe('/glsl-include.yaml');
		expect(findConfigFile('/other', () => false)).toBeNull();
		expect(findConfigFile(path.join(projectDir, 'shaders', 'lib'))).toBe(path.join(projectDir, 'glsl-include.yaml'));
	});

	it('layers editor settings over the file config', () => {
		const base = { ...defaultConfig(), includeDirectories: ['/proj/lib'], outputDirectory: '/proj/out' };
		const next = applySettings(base, { includeDirectories: ['inc', 42], outputDirectory: '', maxIncludeDepth: -1, debug: true }, '/ws');
		expect(next).toEqual({ ...base, includeDirectories: ['/ws/inc'], outputDirectory: undefined, debug: true });
		expect(applySettings(base, undefined, '/ws')).toBe(base);
	});
});
