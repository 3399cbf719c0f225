import { join } from 'node:path';
import createDebug from 'debug';
import { readFile } from 'node:fs/promises';
import { outputFile, pathExists } from 'fs-extra';
import { BuildContext } from './types';
import { isErrnoException } from './errors';
import { restoreDirectory, saveDirectory } from './cache';
import { childEnv, metadata, nodeCacheDir, nodeVersionFile } from './layout';

const debug = createDebug('node-gs-buildpack:node-modules');

export type ModulesSource = 'existing' | 'cache' | 'none';

async function readCachedNodeVersion(cacheDir: string): Promise<string | null> {
	const file = join(nodeCacheDir(cacheDir), nodeVersionFile);
	try {
		return (await readFile(file, 'utf8')).trim();
	} catch (err: unknown) {
		if (isErrnoException(err) && err.code === 'ENOENT') {
			return null;
		}
		throw err;
	}
}

/**
 * Brings `node_modules` of the build dir up to date with `package.json`,
 * starting from the checked-in tree or the cached one, then refreshes the
 * cache. Returns where the starting tree came from.
 */
export async function installNodeModules(
	ctx: BuildContext,
	nodeVersion: string
): Promise<ModulesSource> {
	const { buildDir, cacheDir, output } = ctx;
	const npm = (...args: string[]) =>
		ctx.run('npm', args, {
			cwd: buildDir,
			env: childEnv(ctx, { withUserEnv: true }),
			output
		});
	const buildModules = join(buildDir, 'node_modules');
	const cacheModules = join(nodeCacheDir(cacheDir), 'node_modules');
	const useCache = ctx.userEnv.NODE_MODULES_CACHE !== 'false';

	let source: ModulesSource = 'none';
	if (await pathExists(buildModules)) {
		source = 'existing';
		output.info('Found existing node_modules directory; not using cache');
		output.info('Pruning dependencies not specified in package.json');
		await npm('prune');
		output.info('Rebuilding any native dependencies');
		await npm('rebuild');
	} else if (!useCache) {
		output.info('Skipping cache restore (NODE_MODULES_CACHE=false)');
	} else if (await restoreDirectory(cacheModules, buildModules)) {
		source = 'cache';
		output.info('Restored node_modules directory from cache');
		output.info('Pruning cached dependencies not specified in package.json');
		await npm('prune');

		const cachedVersion = await readCachedNodeVersion(cacheDir);
		if (cachedVersion !== nodeVersion) {
			debug('Cached node version %o, building with %o', cachedVersion, nodeVersion);
			output.info('Node version changed since last build; rebuilding dependencies');
			await npm('rebuild');
		}
	}

	output.info('Installing dependencies');
	await npm('install', '--production');

	await outputFile(join(buildDir, nodeVersionFile), `${nodeVersion}\n`);

	output.info('Caching node_modules directory for future builds');
	const nodeCache = nodeCacheDir(cacheDir);
	await saveDirectory(buildModules, cacheModules);
	await saveDirectory(join(buildDir, metadata), join(nodeCache, metadata));
	return source;
}
