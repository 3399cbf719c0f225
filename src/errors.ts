/**
 * Subclassing `Error` in TypeScript:
 * https://stackoverflow.com/a/41102306/376773
 */

export class CompileError extends Error {
	exitCode: number;

	constructor(message?: string, exitCode: number = 1) {
		super(message || 'Build failed');

		// Restore prototype chain
		this.name = new.target.name;
		Object.setPrototypeOf(this, new.target.prototype);

		this.exitCode = exitCode;
	}
}

export class ValidationError extends CompileError {}

export class CommandError extends CompileError {
	command: string;
	args: string[];

	constructor(command: string, args: string[], exitCode?: number) {
		const line = [command, ...args].join(' ');
		super(
			typeof exitCode === 'number'
				? `Command "${line}" exited with code ${exitCode}`
				: `Command "${line}" was terminated by a signal`,
			typeof exitCode === 'number' && exitCode !== 0 ? exitCode : 1
		);
		this.command = command;
		this.args = args;
	}
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && 'code' in err;
}
