const INDENT = '       ';

export class Output {
	private stream: NodeJS.WritableStream;

	constructor(stream: NodeJS.WritableStream = process.stdout) {
		this.stream = stream;
	}

	topic(message: string): void {
		this.stream.write(`-----> ${message}\n`);
	}

	info(message: string): void {
		for (const line of message.split('\n')) {
			this.stream.write(`${INDENT}${line}\n`);
		}
	}

	warn(message: string): void {
		for (const line of message.split('\n')) {
			this.stream.write(` !     ${line}\n`);
		}
	}
}
