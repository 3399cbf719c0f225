import { join } from 'node:path';
import createDebug from 'debug';
import { readdir, readFile, stat } from 'node:fs/promises';
import { Stats } from 'node:fs';
import { Env } from './types';
import { isErrnoException } from './errors';

const debug = createDebug('node-gs-buildpack:env-dir');

// Variables that would break the build tools if they were overridden
const blacklist = /^(PATH|GIT_DIR|CPATH|CPPFLAGS|LD_PRELOAD|LIBRARY_PATH)$/;

async function listEnvDir(dir: string): Promise<string[]> {
	try {
		return await readdir(dir);
	} catch (err: unknown) {
		if (isErrnoException(err) && err.code === 'ENOENT') {
			return [];
		}
		throw err;
	}
}

// `null` for a dangling symlink
async function statEntry(path: string): Promise<Stats | null> {
	try {
		return await stat(path);
	} catch (err: unknown) {
		if (isErrnoException(err) && err.code === 'ENOENT') {
			debug('Skipping %o, its target does not exist', path);
			return null;
		}
		throw err;
	}
}

export async function readEnvDir(dir?: string): Promise<Env> {
	const env: Env = {};
	if (!dir) {
		return env;
	}
	const names = await listEnvDir(dir);
	for (const name of names.sort()) {
		if (blacklist.test(name)) {
			debug('Skipping blacklisted variable %o', name);
			continue;
		}
		const path = join(dir, name);
		const s = await statEntry(path);
		if (!s || !s.isFile()) {
			continue;
		}
		env[name] = (await readFile(path, 'utf8')).replace(/\r?\n$/, '');
		debug('Read %o from %o', name, path);
	}
	return env;
}
