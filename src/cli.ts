import createDebug from 'debug';
import { compile, detect, release } from './index';
import { CompileError } from './errors';
import { Output } from './output';

const debug = createDebug('node-gs-buildpack:cli');

export interface CliIO {
	stdout: NodeJS.WritableStream;
	stderr: NodeJS.WritableStream;
}

export const commands = ['compile', 'detect', 'release'] as const;

export type Command = (typeof commands)[number];

export function isCommand(name: string | undefined): name is Command {
	return commands.some(c => c === name);
}

export const usage = [
	'Usage: buildpack compile <build-dir> <cache-dir> [<env-dir>]',
	'       buildpack detect <build-dir>',
	'       buildpack release <build-dir>'
].join('\n');

async function dispatch(
	command: Command,
	args: string[],
	io: CliIO
): Promise<number> {
	const [buildDir, cacheDir, envDir] = args;
	if (command === 'compile') {
		if (!buildDir || !cacheDir) {
			io.stderr.write(`${usage}\n`);
			return 1;
		}
		await compile({
			buildDir,
			cacheDir,
			envDir,
			output: new Output(io.stdout)
		});
		return 0;
	}

	if (!buildDir) {
		io.stderr.write(`${usage}\n`);
		return 1;
	}
	if (command === 'detect') {
		const name = await detect(buildDir);
		if (!name) {
			io.stdout.write('no\n');
			return 1;
		}
		io.stdout.write(`${name}\n`);
		return 0;
	}
	io.stdout.write(await release(buildDir));
	return 0;
}

/**
 * Runs the buildpack command named by `argv[0]` and resolves the process
 * exit code. Errors are reported on stderr rather than thrown.
 */
export async function main(
	argv: string[],
	io: CliIO = { stdout: process.stdout, stderr: process.stderr }
): Promise<number> {
	const [command, ...args] = argv;
	if (!isCommand(command)) {
		io.stderr.write(`${usage}\n`);
		return 1;
	}
	try {
		return await dispatch(command, args, io);
	} catch (err: unknown) {
		debug('%s failed: %o', command, err);
		const message = err instanceof Error ? err.message : String(err);
		new Output(io.stderr).warn(message);
		return err instanceof CompileError ? err.exitCode : 1;
	}
}

export function runMain(argv: string[]): void {
	main(argv).then(
		code => {
			process.exitCode = code;
		},
		(err: unknown) => {
			console.error(err);
			process.exitCode = 1;
		}
	);
}
