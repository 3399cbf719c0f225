import { join } from 'node:path';
import { outputFile } from 'fs-extra';

export const profileDir = '.profile.d';

// Sourced by the platform on dyno boot, `$HOME` being the app root
export const profileScripts: { [name: string]: string } = {
	'nodejs.sh':
		'export PATH="$HOME/vendor/node/bin:$HOME/bin:$HOME/node_modules/.bin:$PATH"\n',
	'gs.sh': [
		'export GEM_HOME="$HOME/.gs"',
		'export GEM_PATH="$HOME/.gs"',
		'export PATH="$HOME/vendor/ruby/bin:$HOME/.gs/bin:$PATH"',
		''
	].join('\n')
};

export async function writeProfileScripts(buildDir: string): Promise<string[]> {
	const written: string[] = [];
	for (const name of Object.keys(profileScripts)) {
		const path = join(buildDir, profileDir, name);
		await outputFile(path, profileScripts[name]);
		written.push(path);
	}
	return written;
}
