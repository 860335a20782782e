import {
	createConnection,
	TextDocuments,
	ProposedFeatures,
	DidChangeConfigurationNotification,
	TextDocumentSyncKind,
	FileChangeType,
	type Connection,
	type InitializeParams,
	type InitializeResult,
	type DocumentLink,
	type DocumentLinkParams,
} from 'vscode-languageserver/node';
import 'source-map-support/register.js';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { URI } from 'vscode-uri';
import { ShaderPreprocessor } from './core/preproc';
import { nodeSourceHost, overlaySourceHost } from './core/host';
import { formatPreprocessError } from './core/diagnostics';
import { applySettings, defaultConfig, findConfigFile, loadConfig, type GlslIncludeConfig } from './config';
import { documentPath, documentsSourceHost, validateDocument, type DocumentValidation } from './validate';
import { shaderKindFromPath } from './shaderKinds';
import { writeFlattened } from './output';
import { LOG_PREFIX } from './utils';

const connection: Connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

// Filesystem paths of the workspace folders seen at initialize time
let workspaceRootPaths: string[] = [];
let configFilePath: string | null = null;
let fileConfig: GlslIncludeConfig = defaultConfig();
// Latest `glsl.*` settings from the client, layered over the file config
let clientSettings: unknown = undefined;
let config: GlslIncludeConfig = defaultConfig();

const validations = new Map<string, DocumentValidation>(); // key: doc.uri
// Reverse include index: included file URI -> URIs of open units that include it
const includeToDocs = new Map<string, Set<string>>();

function settingsBaseDir(): string {
	return workspaceRootPaths[0] ?? process.cwd();
}

function recomputeConfig() {
	config = applySettings(fileConfig, clientSettings, settingsBaseDir());
}

// Configured directories first, then the workspace roots, without duplicates.
function effectiveIncludeDirectories(): string[] {
	const seen = new Set<string>();
	return [...config.includeDirectories, ...workspaceRootPaths].filter(p => (p && !seen.has(p) && (seen.add(p), true)));
}

function createPreprocessor(): ShaderPreprocessor {
	return new ShaderPreprocessor({
		includeDirectories: effectiveIncludeDirectories(),
		host: overlaySourceHost(documentsSourceHost(() => documents.all()), nodeSourceHost()),
		cwd: settingsBaseDir(),
		maxIncludeDepth: config.maxIncludeDepth,
		stripTrailingNewline: config.stripTrailingNewline,
		logger: connection.console,
		debug: config.debug,
	});
}

function indexDependencies(docUri: string, dependencies: readonly string[]) {
	for (const set of includeToDocs.values()) set.delete(docUri);
	for (const dep of dependencies) {
		const depUri = URI.file(dep).toString();
		let set = includeToDocs.get(depUri);
		if (!set) { set = new Set(); includeToDocs.set(depUri, set); }
		set.add(docUri);
	}
}

async function reloadConfigFile() {
	fileConfig = defaultConfig();
	if (configFilePath) {
		try {
			fileConfig = await loadConfig(configFilePath);
			connection.console.log(`${LOG_PREFIX} loaded config ${configFilePath}`);
		} catch (e) {
			connection.console.error(`${LOG_PREFIX} failed to load config: ${e instanceof Error ? e.message : String(e)}`);
		}
	}
	recomputeConfig();
}

async function validateTextDocument(doc: TextDocument) {
	const docPath = documentPath(doc);
	// headers are checked through the units that include them
	if (!docPath || !shaderKindFromPath(docPath)) {
		validations.delete(doc.uri);
		return;
	}
	const v = validateDocument(doc, docPath, createPreprocessor());
	validations.set(doc.uri, v);
	indexDependencies(doc.uri, v.dependencies);
	if (config.debug) connection.console.log(`${LOG_PREFIX} validated ${docPath}: ${v.result.ok ? 'ok' : v.result.error.code}`);
	await connection.sendDiagnostics({ uri: doc.uri, diagnostics: v.diagnostics });
}

async function revalidateDependents(uri: string) {
	const dependents = includeToDocs.get(uri);
	if (!dependents) return;
	for (const docUri of [...dependents]) {
		const doc = documents.get(docUri);
		if (doc) await validateTextDocument(doc);
	}
}

async function revalidateAllOpenDocs() {
	validations.clear();
	for (const d of documents.all()) await validateTextDocument(d);
}

connection.onInitialize(async (params: InitializeParams): Promise<InitializeResult> => {
	workspaceRootPaths = [];
	for (const wf of params.workspaceFolders || []) {
		const u = URI.parse(wf.uri);
		if (u.scheme === 'file' && u.fsPath && !workspaceRootPaths.includes(u.fsPath)) workspaceRootPaths.push(u.fsPath);
	}
	// Fallback to rootUri when workspaceFolders is empty
	if (workspaceRootPaths.length === 0 && params.rootUri) {
		const u = URI.parse(params.rootUri);
		if (u.scheme === 'file' && u.fsPath) workspaceRootPaths.push(u.fsPath);
	}

	const initOpts: unknown = params.initializationOptions;
	const explicitConfig = typeof initOpts === 'object' && initOpts !== null ? Reflect.get(initOpts, 'configFile') : undefined;
	configFilePath = typeof explicitConfig === 'string' && explicitConfig
		? explicitConfig
		: findConfigFile(settingsBaseDir());
	clientSettings = initOpts;
	await reloadConfigFile();

	return {
		capabilities: {
			textDocumentSync: { openClose: true, change: TextDocumentSyncKind.Incremental, save: { includeText: false } },
			documentLinkProvider: { resolveProvider: false },
		},
	};
});

connection.onInitialized(() => {
	void connection.client.register(DidChangeConfigurationNotification.type, undefined);
});

connection.onDidChangeConfiguration(async change => {
	const raw: unknown = change.settings;
	clientSettings = typeof raw === 'object' && raw !== null ? Reflect.get(raw, 'glsl') : undefined;
	recomputeConfig();
	await revalidateAllOpenDocs();
});

// Flattened text of a unit, as the compiler would receive it
connection.onRequest('glsl/flatten', (params: { uri: string }) => {
	const u = URI.parse(params.uri);
	if (u.scheme !== 'file') return { ok: false, error: `Not a file URI: ${params.uri}` };
	const r = createPreprocessor().processUnit(u.fsPath);
	return r.ok ? { ok: true, source: r.source, includes: r.includes } : { ok: false, error: formatPreprocessError(r.error) };
});

documents.onDidChangeContent(async change => {
	await validateTextDocument(change.document);
	await revalidateDependents(change.document.uri);
});

documents.onDidSave(e => {
	const outDir = config.outputDirectory;
	const docPath = documentPath(e.document);
	const result = validations.get(e.document.uri)?.result;
	if (!outDir || !docPath || !result?.ok) return;
	try {
		const written = writeFlattened(outDir, docPath, result.source);
		connection.console.log(`${LOG_PREFIX} wrote ${written}`);
	} catch (err) {
		connection.console.error(`${LOG_PREFIX} failed to write flattened output: ${err instanceof Error ? err.message : String(err)}`);
	}
});

documents.onDidClose(async e => {
	validations.delete(e.document.uri);
	indexDependencies(e.document.uri, []);
	await connection.sendDiagnostics({ uri: e.document.uri, diagnostics: [] });
});

connection.onDocumentLinks((params: DocumentLinkParams): DocumentLink[] => {
	return validations.get(params.textDocument.uri)?.links ?? [];
});

connection.onDidChangeWatchedFiles(async ev => {
	const configUri = configFilePath ? URI.file(configFilePath).toString() : '';
	let configChanged = false;
	for (const c of ev.changes) {
		if (c.type !== FileChangeType.Changed && c.type !== FileChangeType.Created && c.type !== FileChangeType.Deleted) continue;
		if (configUri && c.uri === configUri) {
			configChanged = true;
			continue;
		}
		await revalidateDependents(c.uri);
	}
	if (configChanged) {
		connection.console.log(`${LOG_PREFIX} config file changed: reloading`);
		await reloadConfigFile();
		await revalidateAllOpenDocs();
	}
});

connection.onShutdown(() => {
	validations.clear();
	includeToDocs.clear();
});

documents.listen(connection);
connection.listen();
