import { RequestInit, Response } from 'node-fetch';
import { Config } from './config';
import { Output } from './output';

export type Env = Record<string, string | undefined>;

export type Fetch = (url: string, init?: RequestInit) => Promise<Response>;

export interface RunOptions {
	cwd: string;
	env: Env;
	output: Output;
}

export type Runner = (
	command: string,
	args: string[],
	opts: RunOptions
) => Promise<void>;

// The subset of `package.json` fields that the build reads
export interface PackageJson {
	name?: string;
	version?: string;
	engines?: { node?: string; npm?: string };
	scripts?: { [name: string]: string | undefined };
	[key: string]: unknown;
}

export interface CompileParams {
	buildDir: string;
	cacheDir: string;
	envDir?: string; // one file per exported variable
	config?: Config;
	run?: Runner;
	fetch?: Fetch;
	output?: Output;
	platform?: string; // platform of the Node.js tarball (default `linux`)
	arch?: string; // architecture of the Node.js tarball (default `x64`)
}

export interface BuildContext {
	buildDir: string;
	cacheDir: string;
	envDir?: string;
	config: Config;
	userEnv: Env; // variables read from `envDir`
	baseEnv: Env; // environment that every child process inherits
	run: Runner;
	fetch: Fetch;
	output: Output;
	platform: string;
	arch: string;
}

export interface CompileResult {
	rubyVersion: string;
	nodeVersion: string;
	procfile: string | null;
}
