#!/usr/bin/env node

import { readFileSync, realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';

import { loadOptionalConfig } from './dx/config.js';
import { setDebugEnabled } from './dx/logger.js';
import { isTraceEnabled, traceInfo } from './dx/trace.js';
import { decodeOrThrow, decodeWithRemainder } from './encoding/decode.js';
import { encode } from './encoding/encode.js';
import { argumentDeclaration, decoded, DEFAULT_INDENT } from './encoding/prettyPrint.js';
import type { TypeNode } from './encoding/typeNode.js';
import { MalformedEncodingError } from './errors.js';
import { parseCHeader } from './header/parseCHeader.js';
import { parsePropertyAttributes, propertyHeader } from './info/propertyInfo.js';
import { sizeAndAlignment } from './layout/typeLayout.js';
import { methodValueType, parseMethodSignature } from './signature/methodSignature.js';

export type CliIO = {
	out: (line: string) => void;
	err: (line: string) => void;
};

const consoleIO: CliIO = {
	out: (line) => console.log(line),
	err: (line) => console.error(line),
};

const USAGE = `objc-encoding

Usage:
	objc-encoding decode <encoding> [--json]
	objc-encoding encode <encoding>
	objc-encoding signature <method-encoding>
	objc-encoding layout <encoding>
	objc-encoding property <name> <attributes>
	objc-encoding header <file.h> [--json]

Examples:
	objc-encoding decode '{CGPoint=dd}'
	objc-encoding signature 'v24@0:8@16'
	objc-encoding property title 'T@"NSString",C,N,V_title'

Notes:
	- Quote encodings in the shell: most contain characters it interprets
	- Set OBJC_ENCODING_DEBUG=1 for debug logs, OBJC_ENCODING_TRACE=1 for JSON traces
`;

/** Decodes exactly one type, rejecting anything left after it. */
function decodeArgument(text: string): TypeNode {
	const result = decodeWithRemainder(text);
	if (!result) return decodeOrThrow(text);
	if (result.rest) {
		throw new MalformedEncodingError(text, text.length - result.rest.length, 'unexpected trailing text');
	}
	return result.type;
}

function signatureLines(encoding: string): string[] {
	const signature = parseMethodSignature(encoding);
	const lines = [`return: ${argumentDeclaration(methodValueType(signature.returnValue))}`];
	if (signature.stackSize !== undefined) lines.push(`stack size: ${signature.stackSize}`);
	signature.arguments.forEach((arg, i) => {
		const offset = arg.offset === undefined ? '' : ` (offset ${arg.offset})`;
		lines.push(`argument ${i}${offset}: ${argumentDeclaration(methodValueType(arg))}`);
	});
	return lines;
}

/**
 * Runs one CLI command and resolves to its exit code. Output goes through
 * `io`; nothing here calls `process.exit`.
 */
export async function runCli(argv: string[], io: CliIO = consoleIO): Promise<number> {
	const json = argv.includes('--json');
	const [cmd, arg, arg2] = argv.filter((a) => a !== '--json');

	if (!cmd || cmd === '--help' || cmd === '-h' || cmd === 'help') {
		io.out(USAGE);
		return 0;
	}

	try {
		const config = await loadOptionalConfig();
		if (config?.debug) setDebugEnabled(true);
		const indent = config?.indent ?? DEFAULT_INDENT;

		if (cmd === 'decode') {
			if (arg === undefined) {
				io.err('Usage: objc-encoding decode <encoding> [--json]');
				return 1;
			}
			const node = decodeArgument(arg);
			io.out(json ? JSON.stringify(node, null, 2) : decoded(node, indent));
			return 0;
		}

		if (cmd === 'encode') {
			if (arg === undefined) {
				io.err('Usage: objc-encoding encode <encoding>');
				return 1;
			}
			io.out(encode(decodeArgument(arg)));
			return 0;
		}

		if (cmd === 'signature') {
			if (arg === undefined) {
				io.err('Usage: objc-encoding signature <method-encoding>');
				return 1;
			}
			for (const line of signatureLines(arg)) io.out(line);
			return 0;
		}

		if (cmd === 'layout') {
			if (arg === undefined) {
				io.err('Usage: objc-encoding layout <encoding>');
				return 1;
			}
			const layout = sizeAndAlignment(decodeArgument(arg));
			if (!layout) {
				io.err(`No fixed layout for ${JSON.stringify(arg)}`);
				return 1;
			}
			io.out(`size ${layout.size}, alignment ${layout.alignment}`);
			return 0;
		}

		if (cmd === 'property') {
			if (arg === undefined || arg2 === undefined) {
				io.err('Usage: objc-encoding property <name> <attributes>');
				return 1;
			}
			io.out(
				propertyHeader({
					name: arg,
					attributes: parsePropertyAttributes(arg2),
					isClassProperty: false,
				}),
			);
			return 0;
		}

		if (cmd === 'header') {
			if (arg === undefined) {
				io.err('Usage: objc-encoding header <file.h> [--json]');
				return 1;
			}
			traceInfo('cli.header', { file: arg });
			const decls = parseCHeader(readFileSync(arg, 'utf8'));
			if (json) {
				io.out(JSON.stringify(decls, null, 2));
				return 0;
			}
			for (const d of decls) io.out(`${d.line}: ${d.kind} ${d.name} ${d.encoding}`);
			return 0;
		}
	} catch (e: unknown) {
		io.err(`[objc-encoding] ${cmd} failed: ${e instanceof Error ? e.message : String(e)}`);
		if (isTraceEnabled() && e instanceof Error && e.stack) io.err(e.stack);
		return 1;
	}

	io.err(`Unknown command: ${cmd}`);
	io.err(USAGE);
	return 1;
}

function invokedDirectly(): boolean {
	const script = process.argv[1];
	if (!script) return false;
	try {
		return import.meta.url === pathToFileURL(realpathSync(script)).href;
	} catch {
		return false;
	}
}

if (invokedDirectly()) {
	runCli(process.argv.slice(2)).then(
		(code) => {
			process.exitCode = code;
		},
		(e: unknown) => {
			console.error('[objc-encoding]', e instanceof Error ? e.message : String(e));
			process.exitCode = 1;
		},
	);
}
