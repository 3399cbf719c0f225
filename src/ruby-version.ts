import { join } from 'node:path';
import createDebug from 'debug';
import { readFile } from 'node:fs/promises';
import { isErrnoException } from './errors';

const debug = createDebug('node-gs-buildpack:ruby-version');

/**
 * Normalizes the contents of a `.ruby-version` file: `ruby-3.2.2@app`
 * becomes `3.2.2`. Returns `null` for blank input.
 */
export function parseRubyVersion(contents: string): string | null {
	const [line = ''] = contents.trim().split(/\s+/);
	const version = line.replace(/^ruby-/, '').replace(/@.*$/, '');
	return version || null;
}

export async function getRubyVersion(
	buildDir: string,
	defaultVersion: string
): Promise<string> {
	const file = join(buildDir, '.ruby-version');
	let contents: string;
	try {
		contents = await readFile(file, 'utf8');
	} catch (err: unknown) {
		if (isErrnoException(err) && err.code === 'ENOENT') {
			debug('No %o, using default Ruby %o', file, defaultVersion);
			return defaultVersion;
		}
		throw err;
	}
	const version = parseRubyVersion(contents);
	debug('Parsed Ruby version %o from %o', version, file);
	return version || defaultVersion;
}
