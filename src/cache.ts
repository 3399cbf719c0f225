import { join } from 'node:path';
import createDebug from 'debug';
import { copy, emptyDir, pathExists, remove } from 'fs-extra';
import { readdir, readFile, writeFile } from 'node:fs/promises';
import { isErrnoException } from './errors';

const debug = createDebug('node-gs-buildpack:cache');

export const cacheKeyFile = '.cache-key';

/**
 * Reads the file path `f` as an ascii string.
 * Returns `null` if the file does not exist.
 */
async function getCacheKey(f: string): Promise<string | null> {
	try {
		return await readFile(f, 'ascii');
	} catch (err: unknown) {
		if (isErrnoException(err) && err.code === 'ENOENT') {
			return null;
		}
		throw err;
	}
}

/**
 * Populates `dir` through `fill()` unless it already holds the contents
 * identified by `key`. Returns `true` when the cached copy was reused.
 */
export async function ensureCached(
	dir: string,
	key: string,
	fill: (dir: string) => Promise<void>
): Promise<boolean> {
	const keyFile = join(dir, cacheKeyFile);
	const cachedKey = await getCacheKey(keyFile);
	if (cachedKey === key) {
		debug('Cache %o is up to date (%o)', dir, key);
		return true;
	}

	debug('Filling cache %o for %o (was %o)', dir, key, cachedKey);
	try {
		await emptyDir(dir);
		await fill(dir);
		await writeFile(keyFile, key);
	} catch (err) {
		debug('Filling cache %o failed %o. Cleaning up', dir, err);
		try {
			await remove(dir);
		} catch (err2) {
			debug('Cleaning up cache dir failed: %o', err2);
		}
		throw err;
	}
	return false;
}

async function copyDirectory(src: string, dest: string): Promise<void> {
	debug('copy(%o, %o)', src, dest);
	await remove(dest);
	await copy(src, dest, { preserveTimestamps: true });
}

/**
 * Replaces `buildDest` with the cached tree at `cacheSrc`. Leaves the build
 * dir untouched and returns `false` when nothing is cached.
 */
export async function restoreDirectory(
	cacheSrc: string,
	buildDest: string
): Promise<boolean> {
	if (!(await pathExists(cacheSrc))) {
		return false;
	}
	await copyDirectory(cacheSrc, buildDest);
	return true;
}

/**
 * Replaces the cached tree at `cacheDest` with `buildSrc`. A missing
 * `buildSrc` clears the cached tree.
 */
export async function saveDirectory(
	buildSrc: string,
	cacheDest: string
): Promise<boolean> {
	if (!(await pathExists(buildSrc))) {
		debug('Nothing to cache at %o, clearing %o', buildSrc, cacheDest);
		await remove(cacheDest);
		return false;
	}
	await copyDirectory(buildSrc, cacheDest);
	return true;
}

/**
 * Removes the entries of `parent` whose names start with `prefix`, except
 * `keep`. Other entries are left alone. Returns the removed names.
 */
export async function pruneCache(
	parent: string,
	prefix: string,
	keep: string
): Promise<string[]> {
	let names: string[];
	try {
		names = await readdir(parent);
	} catch (err: unknown) {
		if (isErrnoException(err) && err.code === 'ENOENT') {
			return [];
		}
		throw err;
	}
	const stale = names.filter(name => name.startsWith(prefix) && name !== keep);
	for (const name of stale) {
		debug('Removing stale cache entry %o', join(parent, name));
		await remove(join(parent, name));
	}
	return stale.sort();
}
