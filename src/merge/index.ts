import fs from 'fs';
import path from 'path';
import { ComposeFailedError, FirmwareError, LayoutConflictError, errorMessage } from '../errors';
import { Logger } from '../util/logger';
import {
  ESP_IMAGE_MAGIC, FlashParams, Segment, SegmentDef,
  expectedHeaderParams, loadSegments, validateLayout,
} from './layout';
import {
  Composer, EsptoolOptions, builtinComposer, esptoolComposer, resolveEsptool,
} from './compose';
import { VerificationResult, VerifyOptions, reportLines, verifyImage } from './verify';
import { buildManifest, manifestPath, writeManifest } from './manifest';

export type ComposerName = 'builtin' | 'esptool';

export interface MergeSpec extends Partial<FlashParams> {
  segments: SegmentDef[];
  output: string;
  chip?: string;
  padByte?: number;
  // defaults to the bootloader segment's offset and the ESP image magic
  verify?: Partial<VerifyOptions>;
  composer?: ComposerName;
  esptool?: EsptoolOptions;
  // release name suffix, firmware.bin becomes firmware-<tag>.bin
  tag?: string;
}

export interface MergeOptions {
  logger?: Logger;
}

export interface MergedImage {
  path: string;
  size: number;
  segments: Segment[];
  verification: VerificationResult;
  warnings: string[];
  manifestPath: string;
}

export const taggedOutput = (output: string, tag?: string): string => {
  if (!tag) return output;
  const ext = path.extname(output);
  return path.join(path.dirname(output), `${path.basename(output, ext)}-${tag}${ext}`);
};

const verifyDefaults = (segments: SegmentDef[], verify: Partial<VerifyOptions> = {}): VerifyOptions => {
  const bootloader = segments.find((segment) => segment.name === 'bootloader') || segments[0];
  return {
    offset: verify.offset ?? bootloader.offset,
    magic: verify.magic ?? ESP_IMAGE_MAGIC,
  };
};

// the external tool is located up front so a missing one aborts before any write
const pickComposer = async (spec: MergeSpec, logger: Logger): Promise<Composer> => {
  if (spec.composer !== 'esptool') return builtinComposer;
  const esptool = { logger, ...spec.esptool };
  return esptoolComposer(await resolveEsptool(esptool), esptool);
};

// temp files are removed, then anything that is not already a FirmwareError becomes a ComposeFailedError
const abort = async (err: unknown, cleanup: string[]): Promise<never> => {
  await Promise.all(cleanup.map((file) => fs.promises.rm(file, { recursive: true, force: true })));
  if (err instanceof FirmwareError) throw err;
  throw new ComposeFailedError(errorMessage(err));
};

/**
 * Merge the segments into one image at their offsets and write it to the
 * output path, with a manifest of the layout beside it. Every check runs
 * before anything touches the filesystem. The image and manifest are written
 * to temp files and only renamed into place once both are complete, so a
 * failed merge leaves no output behind.
 */
export const mergeImage = async (spec: MergeSpec, opts: MergeOptions = {}): Promise<MergedImage> => {
  const logger = opts.logger || new Logger({ tag: 'MERGE' });
  if (!spec.segments.length) throw new LayoutConflictError('empty', 'No segments to merge');
  const params: FlashParams = {
    flashMode: spec.flashMode || 'keep',
    flashFreq: spec.flashFreq || 'keep',
    flashSize: spec.flashSize || 'keep',
  };
  const padByte = spec.padByte ?? 0xff;
  const chip = spec.chip || 'esp32p4';
  const output = taggedOutput(spec.output, spec.tag);
  const manifestFile = manifestPath(output);

  const segments = await loadSegments(spec.segments);
  validateLayout(segments, params.flashSize);
  // rejects an unsupported flash size before anything is written
  expectedHeaderParams(params);
  const verify = verifyDefaults(spec.segments, spec.verify);
  const composer = await pickComposer(spec, logger);

  logger.log('Creating merged release binary...');
  segments.forEach((segment) => {
    logger.debug(`${segment.name}: 0x${segment.offset.toString(16)} ${segment.path} (${segment.data.length} bytes)`);
  });

  // the first directory mkdir had to create, if any, goes again on failure
  const created = await fs.promises.mkdir(path.dirname(path.resolve(output)), { recursive: true });
  const tmp = `${output}.${process.pid}.tmp`;
  const manifestTmp = `${manifestFile}.${process.pid}.tmp`;
  const cleanup = [tmp, manifestTmp, ...(created ? [created] : [])];

  let image: Buffer;
  let verification: VerificationResult;
  try {
    await composer.compose({
      segments, output: tmp, params, chip, padByte,
    });
    image = await fs.promises.readFile(tmp);
    verification = await verifyImage(tmp, verify, params);
    await writeManifest(manifestTmp, buildManifest({
      chip, composer: composer.name, params, padByte, segments, output, image,
    }));
    await fs.promises.rename(manifestTmp, manifestFile);
  } catch (err) {
    return abort(err, cleanup);
  }
  try {
    await fs.promises.rename(tmp, output);
  } catch (err) {
    // the new manifest must not outlive the image it describes
    return abort(err, [...cleanup, manifestFile]);
  }

  const report = reportLines(output, image.length, verification);
  report.info.forEach((line) => logger.log(line));
  report.warnings.forEach((line) => logger.warn(line));
  logger.debug(`Manifest: ${manifestFile}`);

  return {
    path: output,
    size: image.length,
    segments,
    verification,
    warnings: report.warnings,
    manifestPath: manifestFile,
  };
};
