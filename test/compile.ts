import { join } from 'node:path';
import { outputFile, pathExists } from 'fs-extra';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { compile, CommandError, ValidationError } from '../src';
import {
	CommandHandler,
	captureOutput,
	createTempDir,
	fakeFetch,
	fakeRunner,
	nodeTarball,
	removeDir,
	rubyTarball,
	testConfig
} from './helpers';

const rubyUrl = 'https://ruby.test/test-stack/ruby-3.2.2.tgz';
const indexUrl = 'https://node.test/dist/index.json';
const nodeUrl =
	'https://node.test/dist/v20.11.1/node-v20.11.1-linux-x64.tar.gz';

const index = JSON.stringify([
	{ version: 'v21.6.1', lts: false },
	{ version: 'v20.11.1', lts: 'Iron' },
	{ version: 'v18.19.0', lts: 'Hydrogen' }
]);

const handlers: { [command: string]: CommandHandler } = {
	gem: (_args, { env }) =>
		outputFile(join(env.GEM_HOME || '', 'bin/dep'), 'dep'),
	npm: (args, { cwd }) =>
		args[0] === 'install'
			? outputFile(join(cwd, 'node_modules/left-pad/index.js'), 'module')
			: undefined
};

let root: string;
let buildDir: string;
let cacheDir: string;
let routes: { [url: string]: Buffer | string };

beforeAll(async () => {
	routes = {
		[rubyUrl]: await rubyTarball('3.2.2'),
		[indexUrl]: index,
		[nodeUrl]: await nodeTarball('20.11.1')
	};
});

beforeEach(async () => {
	root = await createTempDir('compile');
	buildDir = join(root, 'build');
	cacheDir = join(root, 'cache');
	await mkdir(buildDir);
	await writeFile(
		join(buildDir, 'package.json'),
		JSON.stringify({
			name: 'app',
			engines: { node: '20.x' },
			scripts: { start: 'node server.js' }
		})
	);
});

afterEach(async () => {
	await removeDir(root);
});

it('compile_provisions_build_dir_and_cache', async () => {
	const runner = fakeRunner(handlers);
	const { fetch, requests } = fakeFetch(routes);
	const { output, capture } = captureOutput();

	const result = await compile({
		buildDir,
		cacheDir,
		config: testConfig,
		run: runner.run,
		fetch,
		output
	});

	expect(result).toEqual({
		rubyVersion: '3.2.2',
		nodeVersion: '20.11.1',
		procfile: 'web: npm start'
	});
	expect(runner.lines()).toEqual([
		'gem install dep gs --no-document',
		'npm install --production',
		'make compile'
	]);
	expect(requests.map(r => r.url)).toEqual([rubyUrl, indexUrl, nodeUrl]);

	expect(await readFile(join(buildDir, 'vendor/ruby/bin/ruby'), 'utf8')).toBe(
		'ruby 3.2.2'
	);
	expect(await readFile(join(buildDir, 'vendor/node/bin/node'), 'utf8')).toBe(
		'node 20.11.1'
	);
	expect(await readFile(join(buildDir, 'Procfile'), 'utf8')).toBe(
		'web: npm start\n'
	);
	expect(await readFile(join(buildDir, '.heroku/node-version'), 'utf8')).toBe(
		'20.11.1\n'
	);
	expect(await pathExists(join(buildDir, '.profile.d/nodejs.sh'))).toBe(true);
	expect(await pathExists(join(buildDir, '.profile.d/gs.sh'))).toBe(true);

	expect(await pathExists(join(cacheDir, 'ruby/ruby-3.2.2/ruby.tgz'))).toBe(
		true
	);
	expect(await pathExists(join(cacheDir, 'ruby/.gs/bin/dep'))).toBe(true);
	expect(await pathExists(join(cacheDir, 'node/node-v20.11.1/bin/node'))).toBe(
		true
	);
	expect(
		await pathExists(join(cacheDir, 'node/node_modules/left-pad/index.js'))
	).toBe(true);

	expect(capture.text.split('\n').filter(l => l.startsWith('-----> '))).toEqual([
		'-----> Installing Ruby 3.2.2',
		'-----> Installing gems',
		'-----> Resolving node version',
		'-----> Installing node 20.11.1',
		'-----> Installing dependencies',
		'-----> Created Procfile with: web: npm start',
		'-----> Writing profile scripts',
		'-----> Running make compile'
	]);
});

it('compile_reuses_cache_on_next_build', async () => {
	await compile({
		buildDir,
		cacheDir,
		config: testConfig,
		run: fakeRunner(handlers).run,
		fetch: fakeFetch(routes).fetch,
		output: captureOutput().output
	});

	const nextBuild = join(root, 'next-build');
	await mkdir(nextBuild);
	await writeFile(
		join(nextBuild, 'package.json'),
		JSON.stringify({ engines: { node: '20.x' } })
	);
	const runner = fakeRunner(handlers);
	const { fetch, requests } = fakeFetch(routes);
	const result = await compile({
		buildDir: nextBuild,
		cacheDir,
		config: testConfig,
		run: runner.run,
		fetch,
		output: captureOutput().output
	});

	expect(result.procfile).toBeNull();
	expect(requests.map(r => r.url)).toEqual([indexUrl]);
	expect(runner.lines()).toEqual([
		'gem install dep gs --no-document',
		'npm prune',
		'npm install --production',
		'make compile'
	]);
	expect(
		await pathExists(join(nextBuild, 'node_modules/left-pad/index.js'))
	).toBe(true);
	expect(await pathExists(join(nextBuild, '.gs/bin/dep'))).toBe(true);
});

it('compile_without_package_json_skips_npm', async () => {
	const plainBuild = join(root, 'plain');
	await mkdir(plainBuild);
	await writeFile(join(plainBuild, '.ruby-version'), 'ruby-3.2.2\n');
	const runner = fakeRunner(handlers);

	const result = await compile({
		buildDir: plainBuild,
		cacheDir,
		config: testConfig,
		run: runner.run,
		fetch: fakeFetch(routes).fetch,
		output: captureOutput().output
	});

	expect(result).toEqual({
		rubyVersion: '3.2.2',
		nodeVersion: '20.11.1',
		procfile: null
	});
	expect(runner.lines()).toEqual([
		'gem install dep gs --no-document',
		'make compile'
	]);
	expect(await pathExists(join(plainBuild, 'vendor/node/bin/node'))).toBe(true);
});

it('compile_posts_package_json_in_background', async () => {
	const url = 'https://telemetry.test/package';
	const { fetch, requests } = fakeFetch({ ...routes, [url]: 'ok' });
	await compile({
		buildDir,
		cacheDir,
		config: { ...testConfig, telemetryUrl: url },
		run: fakeRunner(handlers).run,
		fetch,
		output: captureOutput().output
	});

	await vi.waitFor(() => {
		expect(requests.filter(r => r.method === 'POST')).toHaveLength(1);
	});
	const post = requests.find(r => r.method === 'POST');
	expect(post && post.url).toBe(url);
});

it('compile_failed_telemetry_does_not_fail_build', async () => {
	const url = 'https://telemetry.test/package';
	const { fetch } = fakeFetch({ ...routes, [url]: 500 });
	const result = await compile({
		buildDir,
		cacheDir,
		config: { ...testConfig, telemetryUrl: url },
		run: fakeRunner(handlers).run,
		fetch,
		output: captureOutput().output
	});
	expect(result.nodeVersion).toBe('20.11.1');
});

it('compile_aborts_on_failing_command', async () => {
	const runner = fakeRunner({
		...handlers,
		npm: args => {
			throw new CommandError('npm', args, 1);
		}
	});
	await expect(
		compile({
			buildDir,
			cacheDir,
			config: testConfig,
			run: runner.run,
			fetch: fakeFetch(routes).fetch,
			output: captureOutput().output
		})
	).rejects.toBeInstanceOf(CommandError);
	expect(runner.lines()).toEqual([
		'gem install dep gs --no-document',
		'npm install --production'
	]);
	expect(await pathExists(join(buildDir, 'Procfile'))).toBe(false);
});

it('compile_reads_env_dir', async () => {
	const envDir = join(root, 'env');
	await outputFile(join(envDir, 'NPM_CONFIG_LOGLEVEL'), 'error\n');
	const runner = fakeRunner(handlers);
	await compile({
		buildDir,
		cacheDir,
		envDir,
		config: testConfig,
		run: runner.run,
		fetch: fakeFetch(routes).fetch,
		output: captureOutput().output
	});
	const npm = runner.calls.find(c => c.command === 'npm');
	const make = runner.calls.find(c => c.command === 'make');
	expect(npm && npm.env.NPM_CONFIG_LOGLEVEL).toBe('error');
	expect(make && make.env.NPM_CONFIG_LOGLEVEL).toBe(
		process.env.NPM_CONFIG_LOGLEVEL
	);
});

it('compile_requires_build_dir', async () => {
	await expect(
		compile({
			buildDir: join(root, 'missing'),
			cacheDir,
			config: testConfig,
			run: fakeRunner().run,
			fetch: fakeFetch({}).fetch,
			output: captureOutput().output
		})
	).rejects.toBeInstanceOf(ValidationError);
});
