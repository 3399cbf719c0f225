import { exec } from 'tinyexec';
import createDebug from 'debug';
import { RunOptions } from './types';
import { CommandError } from './errors';

const debug = createDebug('node-gs-buildpack:exec');

export async function run(
	command: string,
	args: string[],
	{ cwd, env, output }: RunOptions
): Promise<void> {
	debug('Exec %o in %o', [command, ...args].join(' '), cwd);
	const proc = exec(command, args, {
		nodeOptions: { cwd, env }
	});

	// Lines from both stdout and stderr, in the order they arrive
	for await (const line of proc) {
		output.info(line);
	}

	debug('%o exited with code %o', command, proc.exitCode);
	if (proc.exitCode !== 0) {
		throw new CommandError(command, args, proc.exitCode);
	}
}
