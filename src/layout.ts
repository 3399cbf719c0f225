import { delimiter, join } from 'node:path';
import { BuildContext, Env } from './types';

// Directories inside the build directory, relative to the app root (`$HOME`
// once the slug is running)
export const vendorRuby = join('vendor', 'ruby');
export const vendorNode = join('vendor', 'node');
export const gemset = '.gs';
export const metadata = '.heroku';
export const nodeVersionFile = join(metadata, 'node-version');

export function rubyCacheDir(cacheDir: string): string {
	return join(cacheDir, 'ruby');
}

export function nodeCacheDir(cacheDir: string): string {
	return join(cacheDir, 'node');
}

/**
 * Directories that hold executables of the vendored runtimes and installed
 * dependencies, in lookup order.
 */
export function binDirs(buildDir: string): string[] {
	return [
		join(buildDir, vendorRuby, 'bin'),
		join(buildDir, gemset, 'bin'),
		join(buildDir, vendorNode, 'bin'),
		join(buildDir, 'node_modules', '.bin')
	];
}

/**
 * Environment for child processes. Variables from the env dir are only
 * included for dependency installation.
 */
export function childEnv(
	ctx: BuildContext,
	{ withUserEnv = false }: { withUserEnv?: boolean } = {}
): Env {
	const gemHome = join(ctx.buildDir, gemset);
	const inherited = ctx.baseEnv.PATH;
	const PATH = [...binDirs(ctx.buildDir), ...(inherited ? [inherited] : [])];
	return {
		...ctx.baseEnv,
		...(withUserEnv ? ctx.userEnv : {}),
		GEM_HOME: gemHome,
		GEM_PATH: gemHome,
		PATH: PATH.join(delimiter)
	};
}
