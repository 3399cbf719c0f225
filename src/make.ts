import { BuildContext } from './types';
import { childEnv } from './layout';

export function runMake(ctx: BuildContext): Promise<void> {
	return ctx.run('make', ['compile'], {
		cwd: ctx.buildDir,
		env: childEnv(ctx),
		output: ctx.output
	});
}
