import createDebug from 'debug';
import nodeFetch from 'node-fetch';
import { join, resolve } from 'node:path';
import { ensureDir, pathExists } from 'fs-extra';
import {
	BuildContext,
	CompileParams,
	CompileResult,
	Env,
	Fetch,
	PackageJson,
	Runner
} from './types';
import { run } from './exec';
import { runMake } from './make';
import { Output } from './output';
import { installGems } from './gems';
import { readEnvDir } from './env-dir';
import { installRuby } from './install-ruby';
import { getRubyVersion } from './ruby-version';
import { writeProcfile } from './procfile';
import { postPackageJson } from './telemetry';
import { writeProfileScripts } from './profile';
import { installNodeModules } from './node-modules';
import { vendorNodeRuntime } from './install-node';
import { Config, loadConfig } from './config';
import { ValidationError } from './errors';
import {
	getEnginesRange,
	readPackageJson,
	resolveNodeVersion
} from './node-version';

const debug = createDebug('node-gs-buildpack:index');

export {
	BuildContext,
	CompileParams,
	CompileResult,
	Config,
	Env,
	Fetch,
	Output,
	PackageJson,
	Runner,
	loadConfig,
	run
};
export { CompileError, CommandError, ValidationError } from './errors';
export { detect } from './detect';
export { release } from './release';

export const fetch: Fetch = (url, init) => nodeFetch(url, init);

export async function createContext(
	params: CompileParams
): Promise<BuildContext> {
	const buildDir = resolve(params.buildDir);
	const cacheDir = resolve(params.cacheDir);
	const envDir = params.envDir ? resolve(params.envDir) : undefined;
	if (!(await pathExists(buildDir))) {
		throw new ValidationError(`Build directory "${buildDir}" does not exist`);
	}
	await ensureDir(cacheDir);
	return {
		buildDir,
		cacheDir,
		envDir,
		config: params.config || loadConfig(),
		userEnv: await readEnvDir(envDir),
		baseEnv: { ...process.env },
		run: params.run || run,
		fetch: params.fetch || fetch,
		output: params.output || new Output(),
		platform: params.platform || 'linux',
		arch: params.arch || 'x64'
	};
}

async function installNodeStep(
	ctx: BuildContext,
	pkg: PackageJson | null
): Promise<string> {
	const { output } = ctx;
	const range = getEnginesRange(pkg);
	output.topic('Resolving node version');
	if (range) {
		output.info(`Requested node range: ${range}`);
	} else {
		output.info('No node version specified in package.json, using latest LTS');
	}
	const nodeVersion = await resolveNodeVersion(range, {
		mirror: ctx.config.nodeMirror,
		fetch: ctx.fetch
	});
	output.info(`Resolved node version: ${nodeVersion}`);

	output.topic(`Installing node ${nodeVersion}`);
	await vendorNodeRuntime(ctx, nodeVersion);

	if (pkg) {
		output.topic('Installing dependencies');
		await installNodeModules(ctx, nodeVersion);
	}
	return nodeVersion;
}

/**
 * Provisions the build dir: vendored Ruby and gems, vendored Node.js and
 * npm packages, a default `Procfile`, profile scripts, and finally
 * `make compile`. Any failing step rejects and aborts the remaining ones.
 */
export async function compile(params: CompileParams): Promise<CompileResult> {
	const ctx = await createContext(params);
	const { buildDir, output } = ctx;
	debug('Compiling %o with cache %o', buildDir, ctx.cacheDir);

	const rubyVersion = await getRubyVersion(
		buildDir,
		ctx.config.defaultRubyVersion
	);
	output.topic(`Installing Ruby ${rubyVersion}`);
	await installRuby(ctx, rubyVersion);

	output.topic('Installing gems');
	await installGems(ctx);

	const pkg = await readPackageJson(buildDir);
	if (pkg) {
		const pkgPath = join(buildDir, 'package.json');
		postPackageJson(pkgPath, {
			url: ctx.config.telemetryUrl,
			timeout: ctx.config.telemetryTimeout,
			fetch: ctx.fetch
		}).catch(err => debug('Telemetry failed: %o', err));
	}
	const nodeVersion = await installNodeStep(ctx, pkg);

	const procfile = await writeProcfile(buildDir, pkg);
	if (procfile) {
		output.topic(`Created Procfile with: ${procfile}`);
	}

	output.topic('Writing profile scripts');
	await writeProfileScripts(buildDir);

	output.topic('Running make compile');
	await runMake(ctx);

	return { rubyVersion, nodeVersion, procfile };
}
