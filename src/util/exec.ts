import execa from 'execa';

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  // stream the child's output straight to this process instead of capturing it
  inherit?: boolean;
}

export interface RunResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  // set when the process could not be started at all
  spawnError?: string;
}

export type RunCommand = (file: string, args: string[], opts?: RunOptions) => Promise<RunResult>;

export const commandLine = (file: string, args: string[]) => [file, ...args].join(' ');

export const runCommand: RunCommand = async (file, args, opts = {}) => {
  const result = await execa(file, args, {
    cwd: opts.cwd,
    env: opts.env,
    stdio: opts.inherit ? 'inherit' : 'pipe',
    reject: false,
  });
  const exitCode = typeof result.exitCode === 'number' ? result.exitCode : null;
  // with reject: false a failed spawn resolves to the ExecaError itself
  const shortMessage = 'shortMessage' in result && typeof result.shortMessage === 'string'
    ? result.shortMessage
    : `Command failed: ${commandLine(file, args)}`;
  return {
    exitCode,
    stdout: typeof result.stdout === 'string' ? result.stdout : '',
    stderr: typeof result.stderr === 'string' ? result.stderr : '',
    spawnError: result.failed && exitCode === null ? shortMessage : undefined,
  };
};

