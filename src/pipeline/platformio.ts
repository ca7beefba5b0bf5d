import { Logger } from '../util/logger';
import { RunCommand, commandLine, runCommand } from '../util/exec';

export interface PlatformIOOptions {
  command?: string;
  projectDir: string;
  environment?: string;
  env?: NodeJS.ProcessEnv;
  run?: RunCommand;
  logger?: Logger;
}

// `pio run` with the given extra arguments, output streamed to the terminal
export const runPlatformIO = async (args: string[], opts: PlatformIOOptions): Promise<boolean> => {
  const command = opts.command || 'pio';
  const run = opts.run || runCommand;
  const logger = opts.logger || new Logger();
  const fullArgs = ['run', ...(opts.environment ? ['-e', opts.environment] : []), ...args];
  logger.log(`Running: ${commandLine(command, fullArgs)}`);
  logger.log('-'.repeat(60));
  const result = await run(command, fullArgs, { cwd: opts.projectDir, env: opts.env, inherit: true });
  if (result.spawnError) logger.error(`${command}: ${result.spawnError}`);
  return result.exitCode === 0;
};

export const build = (opts: PlatformIOOptions) => runPlatformIO([], opts);

export const upload = (opts: PlatformIOOptions & { port?: string }) => runPlatformIO(
  ['-t', 'upload', ...(opts.port ? ['--upload-port', opts.port] : [])],
  opts,
);
