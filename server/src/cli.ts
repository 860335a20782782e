import path from 'node:path';
import { ShaderPreprocessor } from './core/preproc';
import { formatPreprocessError } from './core/diagnostics';
import { defaultConfig, findConfigFile, loadConfig, type GlslIncludeConfig } from './config';
import { writeFlattened, type OutputFs } from './output';
import type { SourceHost } from './core/host';

export const USAGE = `Usage: glsl-include [options] <file>...

Flatten #include directives in GLSL shader units.

Options:
  -I, --include <dir>         add an include directory (repeatable, searched in order)
  -o, --output <dir>          write flattened units to <dir> instead of stdout
  -c, --config <file>         read settings from a YAML config file
  --keep-trailing-newline     keep the final newline of the output
  --strip-trailing-newline    drop the final newline of the output
  --debug                     log include resolution to stderr
  -h, --help                  show this help`;

export interface CliIO {
	stdout(text: string): void;
	stderr(text: string): void;
	cwd: string;
	host?: SourceHost; // default: the real filesystem
	outputFs?: OutputFs;
}

export interface CliArgs {
	files: string[];
	includeDirectories: string[];
	outputDirectory?: string;
	configFile?: string;
	stripTrailingNewline?: boolean;
	debug: boolean;
	help: boolean;
}

export type ParsedArgs = { ok: true; args: CliArgs } | { ok: false; error: string };

export function parseArgs(argv: readonly string[]): ParsedArgs {
	const args: CliArgs = { files: [], includeDirectories: [], debug: false, help: false };
	for (let i = 0; i < argv.length; i++) {
		const a = argv[i];
		const value = (): string | null => {
			const v = argv[i + 1];
			if (v === undefined || v === '') return null;
			i++;
			return v;
		};
		switch (a) {
			case '-h': case '--help': args.help = true; break;
			case '--debug': args.debug = true; break;
			case '--keep-trailing-newline': args.stripTrailingNewline = false; break;
			case '--strip-trailing-newline': args.stripTrailingNewline = true; break;
			case '-I': case '--include': case '-o': case '--output': case '-c': case '--config': {
				const v = value();
				if (v === null) return { ok: false, error: `Option ${a} expects a value.` };
				if (a === '-I' || a === '--include') args.includeDirectories.push(v);
				else if (a === '-o' || a === '--output') args.outputDirectory = v;
				else args.configFile = v;
				break;
			}
			default:
				if (a.startsWith('-I') && a.length > 2) args.includeDirectories.push(a.slice(2));
				else if (a.startsWith('-') && a !== '-') return { ok: false, error: `Unknown option '${a}'.` };
				else args.files.push(a);
		}
	}
	return { ok: true, args };
}

async function resolveConfig(args: CliArgs, cwd: string): Promise<GlslIncludeConfig> {
	const file = args.configFile ? path.resolve(cwd, args.configFile) : findConfigFile(cwd);
	const base = file ? await loadConfig(file) : defaultConfig();
	return {
		...base,
		includeDirectories: [...base.includeDirectories, ...args.includeDirectories.map(d => path.resolve(cwd, d))],
		outputDirectory: args.outputDirectory ? path.resolve(cwd, args.outputDirectory) : base.outputDirectory,
		stripTrailingNewline: args.stripTrailingNewline ?? base.stripTrailingNewline,
		debug: args.debug || base.debug,
	};
}

/** Run the command line; resolves to the process exit code. */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
	const parsed = parseArgs(argv);
	if (!parsed.ok) {
		io.stderr(`${parsed.error}\n\n${USAGE}\n`);
		return 1;
	}
	const { args } = parsed;
	if (args.help) {
		io.stdout(USAGE + '\n');
		return 0;
	}
	if (!args.files.length) {
		io.stderr(`No input files.\n\n${USAGE}\n`);
		return 1;
	}

	let config: GlslIncludeConfig;
	try {
		config = await resolveConfig(args, io.cwd);
	} catch (e) {
		io.stderr(`${e instanceof Error ? e.message : String(e)}\n`);
		return 1;
	}

	const pp = new ShaderPreprocessor({
		includeDirectories: config.includeDirectories,
		host: io.host,
		cwd: io.cwd,
		maxIncludeDepth: config.maxIncludeDepth,
		stripTrailingNewline: config.stripTrailingNewline,
		logger: { log: m => io.stderr(m + '\n') },
		debug: config.debug,
	});

	let failed = false;
	for (const file of args.files) {
		const r = pp.processUnit(path.resolve(io.cwd, file));
		if (!r.ok) {
			failed = true;
			io.stderr(formatPreprocessError(r.error) + '\n');
			continue;
		}
		if (config.outputDirectory) {
			try {
				writeFlattened(config.outputDirectory, file, r.source, io.outputFs);
			} catch (e) {
				failed = true;
				io.stderr(`Could not write output for '${file}': ${e instanceof Error ? e.message : String(e)}\n`);
			}
		} else {
			io.stdout(r.source);
		}
	}
	return failed ? 1 : 0;
}
