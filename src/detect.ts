import { join } from 'node:path';
import { pathExists } from 'fs-extra';

export const buildpackName = 'Node.js/gs';

/**
 * Returns the buildpack name when `buildDir` looks like an app this
 * buildpack can build, `null` otherwise.
 */
export async function detect(buildDir: string): Promise<string | null> {
	for (const marker of ['package.json', '.gems']) {
		if (await pathExists(join(buildDir, marker))) {
			return buildpackName;
		}
	}
	return null;
}
