import { join } from 'node:path';
import createDebug from 'debug';
import { pathExists } from 'fs-extra';
import { writeFile } from 'node:fs/promises';
import { PackageJson } from './types';

const debug = createDebug('node-gs-buildpack:procfile');

export interface ProcessTypes {
	[name: string]: string;
}

/**
 * The `web` process the app gets when it ships no `Procfile`: `npm start`
 * when a start script is defined, otherwise `node server.js` if that file
 * exists.
 */
export async function defaultProcessTypes(
	buildDir: string,
	pkg: PackageJson | null
): Promise<ProcessTypes> {
	const scripts: { [name: string]: string | undefined } =
		(pkg && pkg.scripts) || {};
	if (typeof scripts.start === 'string') {
		return { web: 'npm start' };
	}
	if (await pathExists(join(buildDir, 'server.js'))) {
		return { web: 'node server.js' };
	}
	return {};
}

export async function writeProcfile(
	buildDir: string,
	pkg: PackageJson | null
): Promise<string | null> {
	const procfile = join(buildDir, 'Procfile');
	if (await pathExists(procfile)) {
		debug('%o already exists', procfile);
		return null;
	}
	const types = await defaultProcessTypes(buildDir, pkg);
	const lines = Object.keys(types).map(name => `${name}: ${types[name]}`);
	if (lines.length === 0) {
		return null;
	}
	const contents = lines.join('\n');
	await writeFile(procfile, `${contents}\n`);
	debug('Wrote %o: %o', procfile, contents);
	return contents;
}
