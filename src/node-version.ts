import { join } from 'node:path';
import createDebug from 'debug';
import { readFile } from 'node:fs/promises';
import { clean, maxSatisfying, rsort, validRange } from 'semver';
import { Fetch, PackageJson } from './types';
import { CompileError, ValidationError, isErrnoException } from './errors';

const debug = createDebug('node-gs-buildpack:node-version');

// An entry of https://nodejs.org/dist/index.json
export interface NodeRelease {
	version: string;
	lts: string | false;
}

export interface ResolveOptions {
	mirror: string;
	fetch: Fetch;
}

/**
 * Reads and parses `package.json` of the build dir.
 * Returns `null` if the file does not exist.
 */
export async function readPackageJson(
	buildDir: string
): Promise<PackageJson | null> {
	const file = join(buildDir, 'package.json');
	let contents: string;
	try {
		contents = await readFile(file, 'utf8');
	} catch (err: unknown) {
		if (isErrnoException(err) && err.code === 'ENOENT') {
			return null;
		}
		throw err;
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(contents);
	} catch (err: unknown) {
		const reason = err instanceof Error ? err.message : String(err);
		throw new ValidationError(`Unable to parse package.json: ${reason}`);
	}
	if (!isPackageJson(parsed)) {
		throw new ValidationError('package.json must contain a JSON object');
	}
	return parsed;
}

function isPackageJson(value: unknown): value is PackageJson {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNodeRelease(value: unknown): value is NodeRelease {
	return (
		typeof value === 'object' &&
		value !== null &&
		'version' in value &&
		typeof value.version === 'string'
	);
}

export async function fetchNodeReleases({
	mirror,
	fetch
}: ResolveOptions): Promise<NodeRelease[]> {
	const url = `${mirror}/index.json`;
	debug('Fetching Node.js releases from %o', url);
	const res = await fetch(url);
	if (!res.ok) {
		throw new CompileError(`HTTP request failed: ${res.status} (${url})`);
	}
	const body: unknown = await res.json();
	if (!Array.isArray(body)) {
		throw new CompileError(`Unexpected response from ${url}`);
	}
	return body.filter(isNodeRelease);
}

export function getEnginesRange(pkg: PackageJson | null): string | undefined {
	const range = pkg && pkg.engines && pkg.engines.node;
	return typeof range === 'string' && range.trim() ? range.trim() : undefined;
}

/**
 * Resolves a semver range (as found in `engines.node`) to a concrete
 * Node.js version such as `20.11.1`.
 */
export async function resolveNodeVersion(
	range: string | undefined,
	opts: ResolveOptions
): Promise<string> {
	if (range) {
		const exact = clean(range);
		if (exact) {
			debug('Range %o is an exact version', range);
			return exact;
		}
		if (!validRange(range)) {
			throw new ValidationError(
				`Invalid Node.js version range in package.json: "${range}"`
			);
		}
	}

	const releases = await fetchNodeReleases(opts);
	let resolved: string | null;
	if (range) {
		resolved = maxSatisfying(
			releases.map(r => r.version),
			range
		);
	} else {
		const lts = releases.filter(r => r.lts).map(r => r.version);
		resolved = lts.length > 0 ? rsort(lts)[0] : null;
	}
	if (!resolved) {
		throw new ValidationError(
			range
				? `No Node.js version satisfies "${range}"`
				: 'No Node.js LTS release found'
		);
	}
	const version = clean(resolved);
	debug('Resolved %o to %o', range || 'lts', version);
	if (!version) {
		throw new ValidationError(`Invalid Node.js version "${resolved}"`);
	}
	return version;
}
