import fs from 'fs';
import os from 'os';
import path from 'path';
import { ComposeFailedError, ToolUnavailableError } from '../errors';
import { Logger } from '../util/logger';
import { resolveFirst, Candidate } from '../util/resolver';
import { runCommand, commandLine, RunCommand } from '../util/exec';
import { FlashParams, Segment, hex, imageLength } from './layout';

export interface ComposeRequest {
  segments: Segment[];
  // path the composed image is written to; the caller moves it into place
  output: string;
  params: FlashParams;
  chip: string;
  padByte: number;
}

export interface Composer {
  name: string;
  compose: (request: ComposeRequest) => Promise<void>;
}

// place every segment at its offset in a pad-filled buffer, bytes are copied untouched
export const composeImage = (segments: Segment[], padByte = 0xff): Buffer => {
  const image = Buffer.alloc(imageLength(segments), padByte);
  segments.forEach((segment) => {
    image.set(segment.data, segment.offset);
  });
  return image;
};

export const builtinComposer: Composer = {
  name: 'builtin',
  compose: async ({ segments, output, padByte }) => {
    try {
      await fs.promises.writeFile(output, composeImage(segments, padByte));
    } catch (err) {
      throw new ComposeFailedError(err instanceof Error ? err.message : String(err));
    }
  },
};

export interface ResolvedTool {
  command: string;
  // arguments that go before the tool's own, e.g. the script path for a python tool
  prefix: string[];
  location: string;
}

export interface EsptoolOptions {
  locations?: string[];
  commands?: string[];
  python?: string;
  run?: RunCommand;
  logger?: Logger;
}

export const defaultEsptoolLocations = (home = os.homedir()): string[] => [
  path.join(home, '.platformio', 'packages', 'tool-esptoolpy', 'esptool.py'),
  '/opt/homebrew/bin/esptool.py',
  '/opt/homebrew/bin/esptool',
  '/usr/local/bin/esptool.py',
  '/usr/local/bin/esptool',
];

export const DEFAULT_ESPTOOL_COMMANDS = ['esptool', 'esptool.py'];

const fileCandidate = (location: string, python: string): Candidate<ResolvedTool> => ({
  location,
  resolve: async () => {
    try {
      await fs.promises.access(location, fs.constants.F_OK);
    } catch {
      return null;
    }
    return location.endsWith('.py')
      ? { command: python, prefix: [location], location }
      : { command: location, prefix: [], location };
  },
});

const pathCandidate = (command: string, run: RunCommand): Candidate<ResolvedTool> => ({
  location: `PATH: ${command} --version`,
  resolve: async () => {
    const result = await run(command, ['--version']);
    return result.exitCode === 0 ? { command, prefix: [], location: command } : null;
  },
});

/**
 * Look for esptool in the prioritized file locations first, then fall back to
 * asking each PATH command for its version.
 */
export const resolveEsptool = async (opts: EsptoolOptions = {}): Promise<ResolvedTool> => {
  const python = opts.python || 'python3';
  const run = opts.run || runCommand;
  const { value, tried } = await resolveFirst([
    ...(opts.locations || defaultEsptoolLocations()).map((location) => fileCandidate(location, python)),
    ...(opts.commands || DEFAULT_ESPTOOL_COMMANDS).map((command) => pathCandidate(command, run)),
  ]);
  if (!value) throw new ToolUnavailableError('esptool', tried);
  return value;
};

export const esptoolMergeArgs = ({ segments, output, params, chip }: ComposeRequest): string[] => [
  '--chip', chip, 'merge_bin',
  '-o', output,
  '--flash_mode', params.flashMode,
  '--flash_freq', params.flashFreq,
  '--flash_size', params.flashSize,
  ...segments.flatMap((segment) => [hex(segment.offset), segment.path]),
];

// compose through a tool found by resolveEsptool
export const esptoolComposer = (tool: ResolvedTool, opts: EsptoolOptions = {}): Composer => ({
  name: 'esptool',
  compose: async (request) => {
    const run = opts.run || runCommand;
    const args = [...tool.prefix, ...esptoolMergeArgs(request)];
    opts.logger?.log(`Using esptool: ${tool.location}`);
    opts.logger?.debug(`Running: ${commandLine(tool.command, args)}`);
    const result = await run(tool.command, args);
    if (result.exitCode !== 0) {
      const diagnostics = result.spawnError || [result.stderr, result.stdout].filter(Boolean).join('\n');
      throw new ComposeFailedError(diagnostics, result.exitCode);
    }
  },
});
