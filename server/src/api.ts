// Public entry point of the package.
export { LineReader, readLines, type SourceLine } from './core/lineReader';
export { classifyLine, parseIncludeTarget, type Directive, type DirectiveKind, type IncludeDelimiter } from './core/directives';
export {
	GLSL_DIAGCODES,
	ShaderPreprocessError,
	errorKindOf,
	formatDiagnostic,
	formatPreprocessError,
	type DiagCode,
	type ErrorKind,
	type IncludeFrame,
	type PreprocessError,
	type SourceLocation,
} from './core/diagnostics';
export { IncludeDirectories, normalizeDirectory } from './core/includeDirs';
export { memorySourceHost, nodeSourceHost, overlaySourceHost, type SourceHost } from './core/host';
export { condenseNewlines, type CondenseOptions } from './core/postprocess';
export type { IncludeGuard } from './core/session';
export {
	DEFAULT_MAX_INCLUDE_DEPTH,
	ShaderPreprocessor,
	preprocessUnits,
	type Flattened,
	type IncludeTarget,
	type PreprocessResult,
	type PreprocessorOptions,
} from './core/preproc';
export { SHADER_KIND_BY_EXTENSION, shaderKindFromPath, shaderKindLabel, type ShaderKind } from './shaderKinds';
export {
	ShaderProgram,
	ShaderProgramError,
	type CompileOutcome,
	type ShaderCompiler,
	type ShaderComponent,
	type ShaderProgramOptions,
} from './program';
export { getAssetName, writeFlattened } from './output';
export { defaultConfig, findConfigFile, loadConfig, parseConfig, type GlslIncludeConfig } from './config';
