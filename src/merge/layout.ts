import fs from 'fs';
import path from 'path';
import { LayoutConflictError, MissingInputError, MissingFile } from '../errors';

export interface SegmentDef {
  name: string;
  path: string;
  offset: number;
}

export interface Segment extends SegmentDef {
  data: Buffer;
}

export type FlashMode = 'qio' | 'qout' | 'dio' | 'dout';
export type FlashFreq = '80m' | '40m' | '26m' | '20m';

export interface FlashParams {
  flashMode: FlashMode | 'keep';
  flashFreq: FlashFreq | 'keep';
  flashSize: string; // e.g. '16MB' or 'keep'
}

export const ESP_IMAGE_MAGIC = 0xe9;

// https://docs.espressif.com/projects/esptool/en/latest/esp32/advanced-topics/firmware-image-format.html
export const FLASH_MODES: Record<FlashMode, number> = {
  qio: 0, qout: 1, dio: 2, dout: 3,
};

export const FLASH_FREQS: Record<FlashFreq, number> = {
  '40m': 0, '26m': 1, '20m': 2, '80m': 0xf,
};

export const FLASH_SIZE_NAMES = ['1MB', '2MB', '4MB', '8MB', '16MB', '32MB', '64MB', '128MB'] as const;
export type FlashSize = typeof FLASH_SIZE_NAMES[number];

// high nibble of the size/frequency header byte
export const FLASH_SIZES: Record<FlashSize, number> = {
  '1MB': 0x00, '2MB': 0x10, '4MB': 0x20, '8MB': 0x30, '16MB': 0x40, '32MB': 0x50, '64MB': 0x60, '128MB': 0x70,
};

const has = (obj: object, key: string) => Object.prototype.hasOwnProperty.call(obj, key);

export const isFlashMode = (value: string): value is FlashMode => has(FLASH_MODES, value);
export const isFlashFreq = (value: string): value is FlashFreq => has(FLASH_FREQS, value);
export const isFlashSize = (value: string): value is FlashSize => has(FLASH_SIZES, value);

export const hex = (num: number): string => `0x${num.toString(16)}`;

// resolve a byte size from text such as 4MB or 512KB, null for 'keep'
export const flashSizeBytes = (flashSizeStr: string): number | null => {
  if (flashSizeStr === 'keep') return null;
  const match = /^(\d+)\s*(KB|MB|GB)?$/i.exec(flashSizeStr.trim());
  if (!match) throw new LayoutConflictError('out-of-bounds', `Invalid flash size ${flashSizeStr}`);
  const size = parseInt(match[1], 10);
  switch ((match[2] || '').toUpperCase()) {
    case 'KB':
      return size * 1024;
    case 'MB':
      return size * 1024 * 1024;
    case 'GB':
      return size * 1024 * 1024 * 1024;
    default:
      return size;
  }
};

/**
 * The two header bytes (flash mode, size|freq) that the layout parameters
 * imply for a bootloader image, or null for a field left as 'keep'.
 */
export const expectedHeaderParams = (params: FlashParams): { mode: number | null; sizeFreq: number | null } => {
  const mode = params.flashMode === 'keep' ? null : FLASH_MODES[params.flashMode];
  if (params.flashFreq === 'keep' || params.flashSize === 'keep') {
    return { mode, sizeFreq: null };
  }
  const sizeKey = params.flashSize.toUpperCase();
  if (!isFlashSize(sizeKey)) {
    throw new LayoutConflictError('out-of-bounds', `Flash size ${params.flashSize} is not supported. Supported sizes: ${
      FLASH_SIZE_NAMES.join(', ')
    }`);
  }
  return { mode, sizeFreq: FLASH_SIZES[sizeKey] | FLASH_FREQS[params.flashFreq] };
};

const isReadableFile = async (file: string) => {
  try {
    if (!(await fs.promises.stat(file)).isFile()) return false;
    await fs.promises.access(file, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
};

// every declared file must be present, and a regular file, before anything is read
export const checkSegmentsExist = async (defs: SegmentDef[]): Promise<void> => {
  const missing: MissingFile[] = [];
  for (const def of defs) {
    if (!(await isReadableFile(def.path))) missing.push({ name: def.name, path: path.resolve(def.path) });
  }
  if (missing.length) throw new MissingInputError(missing);
};

export const loadSegments = async (defs: SegmentDef[]): Promise<Segment[]> => {
  await checkSegmentsExist(defs);
  return Promise.all(defs.map(async (def) => ({
    ...def,
    data: await fs.promises.readFile(def.path),
  })));
};

const range = (segment: Segment) => `[${hex(segment.offset)}, ${hex(segment.offset + segment.data.length)})`;

/**
 * Checks that offsets are valid, supplied in ascending order, do not overlap
 * and end within the flash. The order is validated, never inferred.
 */
export const validateLayout = (segments: Segment[], flashSize: string): void => {
  const flashEnd = flashSizeBytes(flashSize);
  segments.forEach((segment, i) => {
    if (!Number.isInteger(segment.offset) || segment.offset < 0) {
      throw new LayoutConflictError('invalid-offset', `Segment ${segment.name} has invalid offset ${segment.offset}`);
    }
    if (flashEnd !== null && segment.offset + segment.data.length > flashEnd) {
      throw new LayoutConflictError('out-of-bounds', `Segment ${segment.name} ${range(segment)} doesn't fit in ${flashSize} of flash`);
    }
    if (i === 0) return;
    const prev = segments[i - 1];
    if (segment.offset < prev.offset) {
      throw new LayoutConflictError('unordered', `Segment ${segment.name} at ${hex(segment.offset)} is declared after ${
        prev.name
      } at ${hex(prev.offset)}; offsets must be ascending`);
    }
    if (prev.offset + prev.data.length > segment.offset) {
      throw new LayoutConflictError('overlap', `Segment ${prev.name} ${range(prev)} overlaps ${segment.name} ${range(segment)}`);
    }
  });
};

export const imageLength = (segments: Segment[]): number => segments.reduce(
  (max, segment) => Math.max(max, segment.offset + segment.data.length),
  0,
);
