import { defaultProcessTypes } from './procfile';
import { readPackageJson } from './node-version';

export async function release(buildDir: string): Promise<string> {
	const pkg = await readPackageJson(buildDir);
	const types = await defaultProcessTypes(buildDir, pkg);
	const names = Object.keys(types);
	if (names.length === 0) {
		return '---\n{}\n';
	}
	const lines = names.map(name => `  ${name}: ${types[name]}`);
	return ['---', 'default_process_types:', ...lines, ''].join('\n');
}
