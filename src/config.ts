import ms from 'ms';
import { Env } from './types';
import { ValidationError } from './errors';

export interface Config {
	defaultRubyVersion: string;
	rubyMirror: string;
	stack: string;
	nodeMirror: string;
	/**
	 * Where `package.json` is posted after a build. Telemetry is opt-in:
	 * nothing is sent unless `BUILDPACK_TELEMETRY_URL` is set.
	 */
	telemetryUrl?: string;
	telemetryTimeout: number; // milliseconds
}

export const defaults: Config = {
	defaultRubyVersion: '3.2.2',
	rubyMirror: 'https://heroku-buildpack-ruby.s3.us-east-1.amazonaws.com',
	stack: 'heroku-22',
	nodeMirror: 'https://nodejs.org/dist',
	telemetryTimeout: ms('5s')
};

function stripSlash(url: string): string {
	return url.replace(/\/+$/, '');
}

function parseDuration(name: string, value: string): number {
	const parsed = /^\d+$/.test(value) ? Number(value) : ms(value);
	if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
		throw new ValidationError(`Invalid duration for ${name}: "${value}"`);
	}
	return parsed;
}

export function loadConfig(env: Env = process.env): Config {
	const config: Config = {
		defaultRubyVersion:
			env.DEFAULT_RUBY_VERSION || defaults.defaultRubyVersion,
		rubyMirror: stripSlash(env.RUBY_MIRROR || defaults.rubyMirror),
		stack: env.STACK || defaults.stack,
		nodeMirror: stripSlash(env.NODE_MIRROR || defaults.nodeMirror),
		telemetryTimeout: env.BUILDPACK_TELEMETRY_TIMEOUT
			? parseDuration(
					'BUILDPACK_TELEMETRY_TIMEOUT',
					env.BUILDPACK_TELEMETRY_TIMEOUT
			  )
			: defaults.telemetryTimeout
	};
	if (env.BUILDPACK_TELEMETRY_URL) {
		config.telemetryUrl = env.BUILDPACK_TELEMETRY_URL;
	}
	return config;
}
