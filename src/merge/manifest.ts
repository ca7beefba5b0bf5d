import fs from 'fs';
import MD5 from 'crypto-js/md5';
import encBase64 from 'crypto-js/enc-base64';
import { FlashParams, Segment } from './layout';

export interface ManifestSegment {
  name: string;
  path: string;
  offset: number;
  size: number;
  md5: string;
}

export interface Manifest {
  chip: string;
  composer: string;
  flashMode: string;
  flashFreq: string;
  flashSize: string;
  padByte: number;
  segments: ManifestSegment[];
  image: {
    file: string;
    size: number;
    md5: string;
  };
}

export const md5 = (data: Buffer): string => MD5(encBase64.parse(data.toString('base64'))).toString();

export const manifestPath = (output: string) => `${output}.manifest.json`;

export const buildManifest = (opts: {
  chip: string;
  composer: string;
  params: FlashParams;
  padByte: number;
  segments: Segment[];
  output: string;
  image: Buffer;
}): Manifest => ({
  chip: opts.chip,
  composer: opts.composer,
  flashMode: opts.params.flashMode,
  flashFreq: opts.params.flashFreq,
  flashSize: opts.params.flashSize,
  padByte: opts.padByte,
  segments: opts.segments.map((segment) => ({
    name: segment.name,
    path: segment.path,
    offset: segment.offset,
    size: segment.data.length,
    md5: md5(segment.data),
  })),
  image: {
    file: opts.output,
    size: opts.image.length,
    md5: md5(opts.image),
  },
});

export const serializeManifest = (manifest: Manifest): string => `${JSON.stringify(manifest, null, 2)}\n`;

export const writeManifest = async (file: string, manifest: Manifest): Promise<void> => {
  await fs.promises.writeFile(file, serializeManifest(manifest));
};
