import { ShaderPreprocessor } from './core/preproc';
import { GLSL_DIAGCODES, makeError, ShaderPreprocessError } from './core/diagnostics';
import { shaderExtension, shaderKindFromPath, shaderKindLabel, type ShaderKind } from './shaderKinds';
import { writeFlattened, type OutputFs } from './output';

export interface ShaderComponent {
	path: string;
	kind: ShaderKind;
	source: string; // flattened
}

export type CompileOutcome<P> =
	| { ok: true; program: P }
	| { ok: false; stage: 'compile'; component: ShaderComponent; log: string }
	| { ok: false; stage: 'link'; log: string };

/** Turns flattened components into a native program. Graphics-API calls live behind this. */
export interface ShaderCompiler<P> {
	compile(name: string, components: readonly ShaderComponent[]): CompileOutcome<P>;
	release?(program: P): void;
}

export interface ShaderProgramOptions<P> {
	preprocessor: ShaderPreprocessor;
	compiler: ShaderCompiler<P>;
	outputDirectory?: string;
	outputFs?: OutputFs;
}

export class ShaderProgramError extends Error {
	constructor(message: string, readonly log: string) {
		super(message);
		this.name = 'ShaderProgramError';
	}
}

export class ShaderProgram<P> {
	private current: P | null = null;

	constructor(readonly name: string, readonly componentPaths: readonly string[], private readonly opts: ShaderProgramOptions<P>) {}

	get program(): P | null { return this.current; }

	// Flatten and classify every component; throws on the first failure.
	getSources(): ShaderComponent[] {
		return this.componentPaths.map(p => {
			const ext = shaderExtension(p);
			if (!ext) throw new ShaderPreprocessError(makeError(GLSL_DIAGCODES.UNKNOWN_SHADER_KIND, `Could not find shader extension on file '${p}'.`, p));
			const kind = shaderKindFromPath(p);
			if (!kind) {
				throw new ShaderPreprocessError(makeError(GLSL_DIAGCODES.UNKNOWN_SHADER_KIND, `Unknown or unsupported shader of type '.${ext}'.`, p));
			}
			const r = this.opts.preprocessor.processUnit(p);
			if (!r.ok) throw new ShaderPreprocessError(r.error);
			return { path: p, kind, source: r.source };
		});
	}

	/** Build the program again from disk. The previous program survives any failure. */
	recompile(): P {
		const components = this.getSources();
		const { outputDirectory } = this.opts;
		if (outputDirectory) {
			for (const c of components) writeFlattened(outputDirectory, c.path, c.source, this.opts.outputFs);
		}
		const out = this.opts.compiler.compile(this.name, components);
		if (!out.ok) {
			if (out.stage === 'compile') {
				throw new ShaderProgramError(`Shader: ${this.name} failed to compile ${shaderKindLabel(out.component.kind)} shader '${out.component.path}':\n${out.log}`, out.log);
			}
			throw new ShaderProgramError(`Shader: ${this.name} failed to link:\n${out.log}`, out.log);
		}
		const prior = this.current;
		this.current = out.program;
		if (prior !== null) this.opts.compiler.release?.(prior);
		return out.program;
	}

	dispose(): void {
		if (this.current !== null) this.opts.compiler.release?.(this.current);
		this.current = null;
	}
}
