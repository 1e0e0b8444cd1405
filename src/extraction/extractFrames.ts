import { collectRawFrame, rasterizeFrame } from '../frames/frameRaster.ts';
import type { Volume } from '../core/volume.ts';
import { loadVolumeFromFiles, writeFrameFile } from '../loaders/volumeLoader.ts';
import { encodeFrameTiff } from '../shared/utils/tiffWriter.ts';
import { silentLogger, type Logger } from '../shared/utils/logging.ts';
import type { FrameAxis, FrameFormat, RasterChannels } from '../types/volume.ts';

export type FrameRequest = {
  axis: FrameAxis;
  /** Defaults to the middle frame of the axis. */
  index?: number;
};

export type ExtractedFrame = {
  axis: FrameAxis;
  index: number;
  width: number;
  height: number;
  format: FrameFormat;
  bytes: Uint8Array;
};

export type ExtractFramesOptions = {
  volume: Volume;
  requests: FrameRequest[];
  format: FrameFormat;
  channels?: RasterChannels;
  log?: Logger;
};

export function middleFrameIndex(volume: Volume, axis: FrameAxis): number {
  return Math.floor(volume.metadata.dimension(axis) / 2);
}

export function extractFrame(
  volume: Volume,
  request: FrameRequest,
  format: FrameFormat,
  channels: RasterChannels = 1
): ExtractedFrame {
  const index = request.index ?? middleFrameIndex(volume, request.axis);
  const frame = volume.frame(request.axis, index);
  const { width, height } = frame.shape;

  if (format === 'raw') {
    return { axis: request.axis, index, width, height, format, bytes: collectRawFrame(frame, frame.shape) };
  }

  const pixels = rasterizeFrame(frame, frame.shape, { channels });
  const tiff = encodeFrameTiff({ width, height, channels, pixels });
  return { axis: request.axis, index, width, height, format, bytes: new Uint8Array(tiff) };
}

export function extractFrames({
  volume,
  requests,
  format,
  channels = 1,
  log = silentLogger
}: ExtractFramesOptions): ExtractedFrame[] {
  return requests.map((request) => {
    const extracted = extractFrame(volume, request, format, channels);
    log.debug(
      `Extracted ${extracted.axis.toUpperCase()} frame ${extracted.index} (${extracted.width}x${extracted.height}, ${extracted.format})`
    );
    return extracted;
  });
}

export type FrameOutput = FrameRequest & {
  outputPath: string;
};

export type RunExtractionOptions = {
  metadataPath: string;
  dataPath: string;
  outputs: FrameOutput[];
  format: FrameFormat;
  channels?: RasterChannels;
  log?: Logger;
};

export type ExtractionSummary = {
  dimensions: [number, number, number];
  frames: Array<Omit<ExtractedFrame, 'bytes'> & { outputPath: string; byteLength: number }>;
};

export async function runExtraction({
  metadataPath,
  dataPath,
  outputs,
  format,
  channels = 1,
  log = silentLogger
}: RunExtractionOptions): Promise<ExtractionSummary> {
  if (outputs.length === 0) {
    throw new Error('At least one frame output is required.');
  }

  const { metadata, volume } = await loadVolumeFromFiles({ metadataPath, dataPath, log });
  const summary: ExtractionSummary = {
    dimensions: [metadata.xdim, metadata.ydim, metadata.zdim],
    frames: []
  };

  for (const output of outputs) {
    const extracted = extractFrame(volume, output, format, channels);
    log.info(`Saving ${extracted.axis.toUpperCase()} frame to ${output.outputPath}`);
    await writeFrameFile(output.outputPath, extracted.bytes);

    const { bytes, ...rest } = extracted;
    summary.frames.push({ ...rest, outputPath: output.outputPath, byteLength: bytes.byteLength });
  }

  return summary;
}
