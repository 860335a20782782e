#!/usr/bin/env node
import 'source-map-support/register.js';
import { runCli } from './cli';

runCli(process.argv.slice(2), {
	stdout: text => process.stdout.write(text),
	stderr: text => process.stderr.write(text),
	cwd: process.cwd(),
}).then(
	code => { process.exitCode = code; },
	(e: unknown) => {
		console.error(e);
		process.exitCode = 1;
	},
);
