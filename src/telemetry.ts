import createDebug from 'debug';
import { readFile } from 'node:fs/promises';
import { Fetch } from './types';

const debug = createDebug('node-gs-buildpack:telemetry');

export interface TelemetryOptions {
	url?: string;
	timeout: number;
	fetch: Fetch;
}

/**
 * Reports the app's `package.json` to the telemetry endpoint. Never rejects:
 * resolves `false` when nothing was sent or the request failed.
 */
export async function postPackageJson(
	pkgPath: string,
	{ url, timeout, fetch }: TelemetryOptions
): Promise<boolean> {
	if (!url) {
		debug('No telemetry URL configured');
		return false;
	}
	try {
		const body = await readFile(pkgPath, 'utf8');
		const res = await fetch(url, {
			method: 'POST',
			headers: { 'Content-Type': 'application/json' },
			body,
			timeout
		});
		debug('Telemetry POST to %o: %o', url, res.status);
		return res.ok;
	} catch (err) {
		debug('Telemetry POST to %o failed: %o', url, err);
		return false;
	}
}
