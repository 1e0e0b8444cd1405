import fs from 'node:fs/promises';
import path from 'node:path';

import { Volume } from '../core/volume.ts';
import { VolumeMetadata } from '../core/volumeMetadata.ts';
import { silentLogger, type Logger } from '../shared/utils/logging.ts';

export type LoadVolumeOptions = {
  metadataPath: string;
  dataPath: string;
  log?: Logger;
};

export type LoadedVolume = {
  metadata: VolumeMetadata;
  volume: Volume;
};

export async function loadVolumeFromFiles({
  metadataPath,
  dataPath,
  log = silentLogger
}: LoadVolumeOptions): Promise<LoadedVolume> {
  const metadataText = await fs.readFile(metadataPath, 'utf8');
  const metadata = VolumeMetadata.parse(metadataText, { log });

  log.info(`Loaded metadata from ${metadataPath}`);
  log.info(`  X-dim = ${metadata.xdim}`);
  log.info(`  Y-dim = ${metadata.ydim}`);
  log.info(`  Z-dim = ${metadata.zdim}`);

  const data = await fs.readFile(dataPath);
  log.info(`Read ${data.byteLength} bytes of data from ${dataPath}`);

  const volume = Volume.open(metadata, data);
  return { metadata, volume };
}

export async function writeFrameFile(outputPath: string, bytes: Uint8Array): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
  await fs.writeFile(outputPath, bytes);
}
