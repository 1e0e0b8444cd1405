export { Volume, VolumeFrame } from './core/volume.ts';
export { VolumeMetadata, DIM_SIZE_KEY, type ParseVolumeMetadataOptions } from './core/volumeMetadata.ts';
export { Voxel, type VoxelResult } from './core/voxel.ts';
export * from './core/errors.ts';
export { collectRawFrame, rasterizeFrame, type RasterizeFrameOptions } from './frames/frameRaster.ts';
export { encodeFrameTiff } from './shared/utils/tiffWriter.ts';
export { normalizeSample, sampleFromBytes, encodeSampleLe } from './shared/utils/voxelSamples.ts';
export { loadVolumeFromFiles, writeFrameFile, type LoadedVolume, type LoadVolumeOptions } from './loaders/volumeLoader.ts';
export {
  extractFrame,
  extractFrames,
  middleFrameIndex,
  runExtraction,
  type ExtractedFrame,
  type ExtractionSummary,
  type FrameOutput,
  type FrameRequest
} from './extraction/extractFrames.ts';
export { resolveExtractionConfig, type ExtractionConfig } from './config/extractionConfig.ts';
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from './shared/utils/logging.ts';
export type { FrameAxis, FrameFormat, FrameSample, FrameShape, RasterChannels } from './types/volume.ts';
