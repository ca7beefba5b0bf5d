import fs from 'fs';
import { FlashParams, expectedHeaderParams, hex } from './layout';

export interface VerifyOptions {
  offset: number;
  magic: number;
}

export type MagicStatus = 'valid' | 'unexpected' | 'out-of-range';

export interface VerificationResult {
  offset: number;
  magic: number;
  status: MagicStatus;
  // the byte found at the offset, null when the image ends before it
  actual: number | null;
  header: string;
  flashParams: {
    expected: string | null;
    actual: string | null;
    matches: boolean;
  };
}

const hex2 = (byte: number) => byte.toString(16).padStart(2, '0');

// read up to `length` bytes of the written image starting at `position`
const readAt = async (file: string, position: number, length: number): Promise<Buffer> => {
  const handle = await fs.promises.open(file, 'r');
  try {
    const buff = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buff, 0, length, position);
    return buff.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
};

/**
 * Checks the magic byte of the bootloader in a written image, and compares
 * its flash parameter bytes against what the layout parameters imply.
 * Neither check fails the merge; a mismatch is only reported.
 */
export const verifyImage = async (file: string, verify: VerifyOptions, params: FlashParams): Promise<VerificationResult> => {
  const header = await readAt(file, verify.offset, 4);
  const actual = header.length ? header[0] : null;
  let status: MagicStatus = 'out-of-range';
  if (actual !== null) status = actual === verify.magic ? 'valid' : 'unexpected';

  const expected = expectedHeaderParams(params);
  let expectedParams: string | null = null;
  let actualParams: string | null = null;
  let matches = true;
  if (header.length >= 4 && (expected.mode !== null || expected.sizeFreq !== null)) {
    expectedParams = `${expected.mode === null ? '..' : hex2(expected.mode)}${
      expected.sizeFreq === null ? '..' : hex2(expected.sizeFreq)
    }`;
    actualParams = `${hex2(header[2])}${hex2(header[3])}`;
    matches = (expected.mode === null || expected.mode === header[2])
      && (expected.sizeFreq === null || expected.sizeFreq === header[3]);
  }

  return {
    offset: verify.offset,
    magic: verify.magic,
    status,
    actual,
    header: header.toString('hex'),
    flashParams: { expected: expectedParams, actual: actualParams, matches },
  };
};

export const formatSize = (size: number): string => `${size.toLocaleString('en-US')} bytes (${(size / 1024 / 1024).toFixed(2)} MB)`;

// the human readable verification report
export const reportLines = (file: string, size: number, result: VerificationResult): { info: string[]; warnings: string[] } => {
  const info = [`Created: ${file}`, `Size: ${formatSize(size)}`];
  const warnings: string[] = [];
  if (result.status === 'valid') {
    info.push('Bootloader header: VALID');
  } else if (result.status === 'unexpected' && result.actual !== null) {
    warnings.push(`Unexpected bootloader header: 0x${hex2(result.actual)} at ${hex(result.offset)} (expected 0x${hex2(result.magic)}), header bytes ${result.header}`);
  } else {
    warnings.push(`Bootloader header missing: image ends before ${hex(result.offset)}`);
  }
  if (!result.flashParams.matches) {
    warnings.push(`Bootloader flash params ${result.flashParams.actual} differ from expected ${result.flashParams.expected}`);
  }
  return { info, warnings };
};
