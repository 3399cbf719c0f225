import { extract } from 'tar';
import pipe from 'promisepipe';
import createDebug from 'debug';
import { join } from 'node:path';
import { createGunzip } from 'node:zlib';
import {
	createReadStream,
	createWriteStream,
	ensureDir,
	remove
} from 'fs-extra';
import { BuildContext, Fetch } from './types';
import { CompileError } from './errors';
import { ensureCached, pruneCache } from './cache';
import { rubyCacheDir, vendorRuby } from './layout';

const debug = createDebug('node-gs-buildpack:install-ruby');

const tarballName = 'ruby.tgz';

export function generateRubyTarballUrl(
	version: string,
	stack: string,
	mirror: string
): string {
	return `${mirror}/${stack}/ruby-${version}.tgz`;
}

export async function downloadFile(
	fetch: Fetch,
	url: string,
	dest: string
): Promise<void> {
	debug('Downloading %o to %o', url, dest);
	const res = await fetch(url);
	if (!res.ok) {
		throw new CompileError(`HTTP request failed: ${res.status} (${url})`);
	}
	await pipe(
		res.body,
		createWriteStream(dest)
	);
}

/**
 * Makes sure the Ruby tarball for `version` is in the cache, then unpacks it
 * into `vendor/ruby` of the build dir. Tarballs cached for other versions are
 * removed. Returns `true` when the cached tarball was reused.
 */
export async function installRuby(
	ctx: BuildContext,
	version: string
): Promise<boolean> {
	const { config, output } = ctx;
	const tarballUrl = generateRubyTarballUrl(
		version,
		config.stack,
		config.rubyMirror
	);
	const name = `ruby-${version}`;
	const cacheDir = join(rubyCacheDir(ctx.cacheDir), name);
	const cached = await ensureCached(cacheDir, tarballUrl, async dir => {
		output.info(`Downloading Ruby ${version} from ${tarballUrl}`);
		await downloadFile(ctx.fetch, tarballUrl, join(dir, tarballName));
	});
	if (cached) {
		output.info(`Using cached Ruby ${version}`);
	}

	const dest = join(ctx.buildDir, vendorRuby);
	debug('Extracting Ruby %s tarball to %o', version, dest);
	await remove(dest);
	await ensureDir(dest);
	await pipe(
		createReadStream(join(cacheDir, tarballName)),
		createGunzip(),
		extract({ C: dest })
	);
	await pruneCache(rubyCacheDir(ctx.cacheDir), 'ruby-', name);
	return cached;
}
