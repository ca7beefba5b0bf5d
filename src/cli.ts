#!/usr/bin/env node
import { parseArgs } from 'util';
import { loadConfig, Overrides } from './config';
import { Logger } from './util/logger';
import { errorMessage } from './errors';
import { StepName, isStepName, runPipeline } from './pipeline/index';

export const USAGE = `Build, upload, and monitor firmware.

Usage:
    fwpipe                 Build, upload, and monitor
    fwpipe build           Build (and merge the release image)
    fwpipe upload          Upload only
    fwpipe merge           Merge the release image only
    fwpipe monitor         Monitor only

Options:
    --config <file>        Config file (default firmware.config.yml)
    --port <path>          Serial port
    --baud <rate>          Baud rate
    --timeout <seconds>    Monitor timeout, 0 runs until interrupted
    --tag <version>        Suffix for the merged image name
    -v, --verbose          More output
    -q, --quiet            Less output
    -h, --help             Show this text
`;

const numberArg = (name: string, value: string | undefined): number | undefined => {
  if (value === undefined) return undefined;
  const num = Number(value);
  if (Number.isNaN(num)) throw new Error(`--${name} expects a number, got ${value}`);
  return num;
};

export const main = async (argv: string[] = process.argv.slice(2)): Promise<number> => {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string' },
      port: { type: 'string' },
      baud: { type: 'string' },
      timeout: { type: 'string' },
      tag: { type: 'string' },
      verbose: { type: 'boolean', short: 'v' },
      quiet: { type: 'boolean', short: 'q' },
      help: { type: 'boolean', short: 'h' },
    },
  });
  const logger = new Logger({ quiet: values.quiet, verbose: values.verbose });
  if (values.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  const steps: StepName[] = [];
  for (const arg of positionals) {
    if (!isStepName(arg)) {
      logger.error(`Unknown command: ${arg}`);
      process.stdout.write(USAGE);
      return 1;
    }
    steps.push(arg);
  }

  const overrides: Overrides = {
    port: values.port,
    baudRate: numberArg('baud', values.baud),
    monitorTimeout: numberArg('timeout', values.timeout),
  };
  const config = await loadConfig({ file: values.config, overrides });

  // Ctrl+C ends a monitor session normally; in any other step it stops the
  // pipeline before the next step starts
  const controller = new AbortController();
  const handleInterrupt = () => controller.abort();
  process.on('SIGINT', handleInterrupt);
  try {
    const result = await runPipeline(steps, config, {
      logger,
      signal: controller.signal,
      tag: values.tag,
    });
    if (result.interrupted) return 130;
    return result.ok ? 0 : 1;
  } finally {
    process.off('SIGINT', handleInterrupt);
  }
};

if (require.main === module) {
  main().then((code) => {
    process.exitCode = code;
  }).catch((err: unknown) => {
    new Logger().error(errorMessage(err));
    process.exitCode = 1;
  });
}
