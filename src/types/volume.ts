import type { Voxel } from '../core/voxel.ts';
import type { VoxelValueOutOfRangeError } from '../core/errors.ts';

export type FrameAxis = 'x' | 'y' | 'z';

export const FRAME_AXES: readonly FrameAxis[] = ['x', 'y', 'z'];

export type FrameShape = {
  width: number;
  height: number;
};

export type FrameSample =
  | { ok: true; voxel: Voxel; x: number; y: number }
  | { ok: false; error: VoxelValueOutOfRangeError; x: number; y: number };

export type FrameFormat = 'tiff' | 'raw';

export const FRAME_FORMATS: readonly FrameFormat[] = ['tiff', 'raw'];

export function isFrameAxis(value: string): value is FrameAxis {
  return (FRAME_AXES as readonly string[]).includes(value);
}

export function isFrameFormat(value: string): value is FrameFormat {
  return (FRAME_FORMATS as readonly string[]).includes(value);
}

export type RasterChannels = 1 | 3;
