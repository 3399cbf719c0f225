import { join } from 'node:path';
import createDebug from 'debug';
import { pathExists } from 'fs-extra';
import { BuildContext } from './types';
import { restoreDirectory, saveDirectory } from './cache';
import { childEnv, gemset, rubyCacheDir } from './layout';

const debug = createDebug('node-gs-buildpack:gems');

// `dep` installs the gems listed in `.gems`, `gs` manages the gemset
export const toolGems = ['dep', 'gs'];

/**
 * Installs the gem tooling and the app's gems into the `.gs` gemset of the
 * build dir, reusing and refreshing the copy kept in the cache dir.
 */
export async function installGems(ctx: BuildContext): Promise<void> {
	const { buildDir, output } = ctx;
	const buildGemset = join(buildDir, gemset);
	const cacheGemset = join(rubyCacheDir(ctx.cacheDir), gemset);

	if (await restoreDirectory(cacheGemset, buildGemset)) {
		output.info('Restored gemset from cache');
	}

	const opts = {
		cwd: buildDir,
		env: childEnv(ctx, { withUserEnv: true }),
		output
	};
	output.info(`Installing ${toolGems.join(', ')}`);
	await ctx.run('gem', ['install', ...toolGems, '--no-document'], opts);

	if (await pathExists(join(buildDir, '.gems'))) {
		output.info('Installing gems from .gems');
		await ctx.run('dep', ['install'], opts);
	} else {
		debug('No .gems file in %o', buildDir);
	}

	await saveDirectory(buildGemset, cacheGemset);
	debug('Cached gemset at %o', cacheGemset);
}
