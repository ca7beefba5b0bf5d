import fs from 'fs';
import path from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { DEFAULT_TOOLCHAIN_PATTERNS, DEFAULT_COMPILER } from './toolchain/index';
import { FLASH_SIZE_NAMES } from './merge/layout';

export const DEFAULT_CONFIG_FILE = 'firmware.config.yml';

// offsets may be written as YAML ints (0x2000) or as strings ("0x2000")
const offset = z.union([
  z.number().int().nonnegative(),
  z.string().regex(/^(0x[0-9a-f]+|\d+)$/i, 'expected a decimal or 0x-prefixed offset')
    .transform((value) => Number(value)),
]);

const segmentSchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1),
  offset,
});

const flashMode = z.enum(['qio', 'qout', 'dio', 'dout', 'keep']);
const flashFreq = z.enum(['80m', '40m', '26m', '20m', 'keep']);
const flashSize = z.enum([...FLASH_SIZE_NAMES, 'keep'] as const);
const resetStrategy = z.enum(['dtr', 'rts', 'none']);

const DEFAULT_SEGMENTS = [
  { name: 'bootloader', path: '{buildDir}/bootloader.bin', offset: 0x2000 },
  { name: 'partitions', path: '{buildDir}/partitions.bin', offset: 0x8000 },
  { name: 'application', path: '{buildDir}/firmware.bin', offset: 0x10000 },
];

export const configSchema = z.object({
  projectDir: z.string().default('.'),
  serial: z.object({
    port: z.string().default(''),
    baudRate: z.number().int().positive().default(115200),
    // seconds, <= 0 monitors until interrupted
    monitorTimeout: z.number().default(60),
    reset: resetStrategy.default('dtr'),
    resetDelay: z.number().int().nonnegative().default(300),
    pollInterval: z.number().int().positive().default(10),
  }).default({}),
  build: z.object({
    command: z.string().default('pio'),
    environment: z.string().default('esp32p4_pioarduino'),
    buildDir: z.string().optional(),
    toolchain: z.object({
      patterns: z.array(z.string()).default(DEFAULT_TOOLCHAIN_PATTERNS),
      compiler: z.string().default(DEFAULT_COMPILER),
    }).default({}),
  }).default({}),
  merge: z.object({
    afterBuild: z.boolean().default(true),
    chip: z.string().default('esp32p4'),
    output: z.string().default('release/firmware.bin'),
    flashMode: flashMode.default('qio'),
    flashFreq: flashFreq.default('80m'),
    flashSize: flashSize.default('16MB'),
    padByte: z.number().int().min(0).max(0xff).default(0xff),
    composer: z.enum(['builtin', 'esptool']).default('builtin'),
    verify: z.object({
      offset: offset.optional(),
      magic: z.number().int().min(0).max(0xff).default(0xe9),
    }).default({}),
    esptool: z.object({
      locations: z.array(z.string()).optional(),
      commands: z.array(z.string()).optional(),
      python: z.string().default('python3'),
    }).default({}),
    segments: z.array(segmentSchema).min(1).default(DEFAULT_SEGMENTS),
  }).default({}),
});

export type FirmwareConfig = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

export class ConfigError extends Error {
  constructor(source: string, issues: string[]) {
    super([`Invalid configuration in ${source}:`, ...issues.map((issue) => `  - ${issue}`)].join('\n'));
    this.name = 'ConfigError';
  }
}

export interface Overrides {
  port?: string;
  baudRate?: number;
  monitorTimeout?: number;
}

const parseNumber = (name: string, value: string | undefined): number | undefined => {
  if (value === undefined || value === '') return undefined;
  const num = Number(value);
  if (Number.isNaN(num)) throw new ConfigError(name, [`${value} is not a number`]);
  return num;
};

// FW_SERIAL_PORT, FW_BAUD_RATE and FW_MONITOR_TIMEOUT
export const envOverrides = (env: NodeJS.ProcessEnv = process.env): Overrides => ({
  port: env.FW_SERIAL_PORT || undefined,
  baudRate: parseNumber('FW_BAUD_RATE', env.FW_BAUD_RATE),
  monitorTimeout: parseNumber('FW_MONITOR_TIMEOUT', env.FW_MONITOR_TIMEOUT),
});

export const parseConfig = (input: unknown, source = 'config'): FirmwareConfig => {
  const result = configSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigError(source, result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`));
  }
  return result.data;
};

export const applyOverrides = (config: FirmwareConfig, ...overrides: Overrides[]): FirmwareConfig => overrides.reduce(
  (acc, o) => ({
    ...acc,
    serial: {
      ...acc.serial,
      port: o.port ?? acc.serial.port,
      baudRate: o.baudRate ?? acc.serial.baudRate,
      monitorTimeout: o.monitorTimeout ?? acc.serial.monitorTimeout,
    },
  }),
  config,
);

/**
 * Read the YAML config file (optional unless named explicitly), apply the
 * environment, then the command line. Relative paths resolve against the
 * config file's directory.
 */
export const loadConfig = async (opts: {
  file?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Overrides;
} = {}): Promise<FirmwareConfig> => {
  const cwd = opts.cwd || process.cwd();
  const file = path.resolve(cwd, opts.file || DEFAULT_CONFIG_FILE);
  let input: unknown = {};
  try {
    input = YAML.parse(await fs.promises.readFile(file, 'utf8'));
  } catch (err) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    if (!missing || opts.file) throw err;
  }
  const config = parseConfig(input, file);
  config.projectDir = path.resolve(path.dirname(file), config.projectDir);
  return applyOverrides(config, envOverrides(opts.env), opts.overrides || {});
};

export const buildDir = (config: FirmwareConfig): string => path.resolve(
  config.projectDir,
  config.build.buildDir || path.join('.pio', 'build', config.build.environment),
);

// segment paths with {buildDir} expanded, relative to the project
export const resolveSegments = (config: FirmwareConfig) => config.merge.segments.map((segment) => ({
  ...segment,
  path: path.resolve(config.projectDir, segment.path.replace(/\{buildDir\}/g, buildDir(config))),
}));
