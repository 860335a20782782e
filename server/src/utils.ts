// Small shared utilities

/**
 * Compile-time exhaustiveness helper for switches over tagged unions.
 * Reaching it at runtime means a new variant was added without a handler.
 */
export function AssertNever(x: never, message?: string): never {
	throw new Error(message ?? `Unexpected value in AssertNever: ${JSON.stringify(x)}`);
}

// Anything with a `log` method: console, connection.console, a test spy.
export interface LogSink { log(message: string): void; }

export const LOG_PREFIX = '[glsl-include]';

export function isDebugEnv(env: NodeJS.ProcessEnv = process.env): boolean {
	const v = env.GLSL_INCLUDE_DEBUG;
	return !!v && v !== '0' && v.toLowerCase() !== 'false';
}

/** Prefixing debug logger; a no-op unless enabled. */
export function debugLogger(sink: LogSink | undefined, enabled: boolean): (message: string) => void {
	if (!sink || !enabled) return () => { /* disabled */ };
	return message => sink.log(`${LOG_PREFIX} ${message}`);
}
