import { extract } from 'tar';
import pipe from 'promisepipe';
import createDebug from 'debug';
import { createGunzip } from 'zlib';
import { basename, join } from 'path';
import { copy, remove } from 'fs-extra';
import { BuildContext, Fetch } from './types';
import { CompileError } from './errors';
import { cacheKeyFile, ensureCached, pruneCache } from './cache';
import { nodeCacheDir, vendorNode } from './layout';

const debug = createDebug('node-gs-buildpack:install-node');

export interface InstallNodeOptions {
	fetch: Fetch;
	mirror: string;
	platform: string;
	arch: string;
}

export function generateNodeTarballUrl(
	version: string,
	platform: string,
	arch: string,
	mirror: string
): string {
	if (!version.startsWith('v')) {
		version = `v${version}`;
	}
	return `${mirror}/${version}/node-${version}-${platform}-${arch}.tar.gz`;
}

export async function installNode(
	dest: string,
	version: string,
	{ fetch, mirror, platform, arch }: InstallNodeOptions
): Promise<void> {
	const tarballUrl = generateNodeTarballUrl(version, platform, arch, mirror);
	debug('Downloading Node.js %s tarball %o', version, tarballUrl);
	const res = await fetch(tarballUrl);
	if (!res.ok) {
		throw new CompileError(
			`HTTP request failed: ${res.status} (${tarballUrl})`
		);
	}
	debug('Extracting Node.js %s tarball to %o', version, dest);
	await pipe(
		res.body,
		createGunzip(),
		extract({ strip: 1, C: dest })
	);
}

/**
 * Makes sure Node.js `version` is unpacked in the cache dir, then copies it
 * into `vendor/node` of the build dir. Runtimes cached for other versions
 * are removed. Returns `true` when the cached copy was reused.
 */
export async function vendorNodeRuntime(
	ctx: BuildContext,
	version: string
): Promise<boolean> {
	const { config, output } = ctx;
	const name = `node-v${version}`;
	const cacheDir = join(nodeCacheDir(ctx.cacheDir), name);
	const cached = await ensureCached(cacheDir, version, dir => {
		output.info(`Downloading and installing node ${version}`);
		return installNode(dir, version, {
			fetch: ctx.fetch,
			mirror: config.nodeMirror,
			platform: ctx.platform,
			arch: ctx.arch
		});
	});
	if (cached) {
		output.info(`Using cached node ${version}`);
	}

	const dest = join(ctx.buildDir, vendorNode);
	debug('Copying %o to %o', cacheDir, dest);
	await remove(dest);
	await copy(cacheDir, dest, {
		filter: src => basename(src) !== cacheKeyFile
	});
	await pruneCache(nodeCacheDir(ctx.cacheDir), 'node-v', name);
	return cached;
}
