import path from 'path';
import { FirmwareConfig, resolveSegments } from '../config';
import { FirmwareError, PortUnavailableError, errorMessage } from '../errors';
import { Logger, StdOut } from '../util/logger';
import { RunCommand } from '../util/exec';
import { listPorts as listSystemPorts } from '../util/serial-helpers';
import {
  findCompiler as findSystemCompiler, listPackages, platformioPackagesDir, prependPath,
} from '../toolchain/index';
import { mergeImage as mergeSystemImage } from '../merge/index';
import { runSession as runSystemSession } from '../session/index';
import { build, upload } from './platformio';

export type Step = 'build' | 'upload' | 'merge' | 'monitor';
export type StepName = Step | 'all';

export const STEP_NAMES: StepName[] = ['build', 'upload', 'merge', 'monitor', 'all'];

const ALL_STEPS: Step[] = ['build', 'upload', 'monitor'];

export const isStepName = (value: string): value is StepName => STEP_NAMES.some((name) => name === value);

// 'all' (and no steps at all) expands to build, upload, monitor
export const expandSteps = (names: StepName[]): Step[] => {
  if (!names.length) return ALL_STEPS;
  return names.flatMap((name) => (name === 'all' ? ALL_STEPS : [name]));
};

export interface PipelineDeps {
  logger?: Logger;
  // where device lines go during monitor
  output?: StdOut;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
  home?: string;
  tag?: string;
  run?: RunCommand;
  findCompiler?: typeof findSystemCompiler;
  mergeImage?: typeof mergeSystemImage;
  runSession?: typeof runSystemSession;
  listPorts?: () => Promise<string[]>;
}

export interface PipelineResult {
  ok: boolean;
  completed: Step[];
  failed?: Step;
  // set when the signal aborted before `failed` could start
  interrupted?: boolean;
}

const HEADINGS: Record<Step, string> = {
  build: 'Building',
  upload: 'Uploading',
  merge: 'Merging',
  monitor: 'Monitoring Serial Output',
};

export class Pipeline {
  config: FirmwareConfig;
  deps: PipelineDeps;
  logger: Logger;

  constructor(config: FirmwareConfig, deps: PipelineDeps = {}) {
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger || new Logger();
  }

  async #toolchainEnv(): Promise<NodeJS.ProcessEnv> {
    const env = this.deps.env || process.env;
    const { patterns, compiler } = this.config.build.toolchain;
    const logger = this.logger.child('TOOLCHAIN');
    const find = this.deps.findCompiler || findSystemCompiler;
    const { directory } = await find(patterns, compiler, this.deps.home);
    if (directory) {
      logger.log(`Adding toolchain path: ${directory}`);
      return { ...env, PATH: prependPath(directory, env.PATH) };
    }
    logger.warn(`Could not find ${compiler} toolchain!`);
    logger.log('Searched patterns:');
    patterns.forEach((pattern) => logger.log(`  - ${pattern}`));
    const packages = await listPackages(platformioPackagesDir(this.deps.home));
    if (packages.length) {
      logger.log('Available packages:');
      packages.forEach((pkg) => logger.log(`  - ${pkg}`));
    }
    return env;
  }

  #platformio(env?: NodeJS.ProcessEnv) {
    return {
      command: this.config.build.command,
      projectDir: this.config.projectDir,
      environment: this.config.build.environment,
      env,
      run: this.deps.run,
      logger: this.logger,
    };
  }

  async build(): Promise<boolean> {
    const env = await this.#toolchainEnv();
    if (!(await build(this.#platformio(env)))) {
      this.logger.log('Build failed!');
      return false;
    }
    if (!this.config.merge.afterBuild) return true;
    return this.merge();
  }

  async upload(): Promise<boolean> {
    const ok = await upload({ ...this.#platformio(), port: this.config.serial.port || undefined });
    if (!ok) this.logger.log('Upload failed!');
    return ok;
  }

  async merge(): Promise<boolean> {
    const { merge } = this.config;
    const mergeImage = this.deps.mergeImage || mergeSystemImage;
    const logger = this.logger.child('MERGE');
    try {
      await mergeImage({
        segments: resolveSegments(this.config),
        output: path.resolve(this.config.projectDir, merge.output),
        tag: this.deps.tag,
        chip: merge.chip,
        flashMode: merge.flashMode,
        flashFreq: merge.flashFreq,
        flashSize: merge.flashSize,
        padByte: merge.padByte,
        composer: merge.composer,
        verify: merge.verify,
        esptool: { ...merge.esptool, run: this.deps.run },
      }, { logger });
      return true;
    } catch (err) {
      if (!(err instanceof FirmwareError)) throw err;
      logger.error(err.message);
      return false;
    }
  }

  async #logPorts(logger: Logger) {
    const list = this.deps.listPorts || listSystemPorts;
    try {
      const ports = await list();
      logger.log(ports.length ? 'Available ports:' : 'No serial ports found');
      ports.forEach((port) => logger.log(`  - ${port}`));
    } catch (err) {
      logger.warn(`Could not list serial ports: ${errorMessage(err)}`);
    }
  }

  async monitor(): Promise<boolean> {
    const { serial } = this.config;
    const logger = this.logger.child('MONITOR');
    if (!serial.port) {
      logger.error('No serial port configured (set serial.port, FW_SERIAL_PORT or --port)');
      await this.#logPorts(logger);
      return false;
    }
    logger.log('Press Ctrl+C to exit');
    const runSession = this.deps.runSession || runSystemSession;
    const outcome = await runSession({
      port: serial.port,
      baudRate: serial.baudRate,
      timeout: serial.monitorTimeout,
      reset: serial.reset,
      resetDelay: serial.resetDelay,
      pollInterval: serial.pollInterval,
      signal: this.deps.signal,
      output: this.deps.output,
      logger,
    });
    if (outcome.error instanceof PortUnavailableError) await this.#logPorts(logger);
    return outcome.ok;
  }

  async runStep(step: Step): Promise<boolean> {
    this.logger.log('');
    this.logger.log(`=== ${HEADINGS[step]} ===`);
    this.logger.log('');
    switch (step) {
      case 'build':
        return this.build();
      case 'upload':
        return this.upload();
      case 'merge':
        return this.merge();
      case 'monitor':
        return this.monitor();
      default:
        throw new Error(`Step ${step} not supported`);
    }
  }

  // steps run in order, the first failure or an interrupt stops the rest
  async run(steps: Step[]): Promise<PipelineResult> {
    const completed: Step[] = [];
    for (const step of steps) {
      if (this.deps.signal?.aborted) {
        this.logger.log('');
        this.logger.log('Interrupted');
        return {
          ok: false, completed, failed: step, interrupted: true,
        };
      }
      if (!(await this.runStep(step))) {
        // a child killed by the same Ctrl+C fails its step
        const interrupted = this.deps.signal?.aborted ? { interrupted: true } : {};
        return {
          ok: false, completed, failed: step, ...interrupted,
        };
      }
      completed.push(step);
    }
    this.logger.log('');
    this.logger.log('Done!');
    return { ok: true, completed };
  }
}

export const runPipeline = (
  steps: StepName[],
  config: FirmwareConfig,
  deps: PipelineDeps = {},
): Promise<PipelineResult> => new Pipeline(config, deps).run(expandSteps(steps));
