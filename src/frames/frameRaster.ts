import type { FrameSample, FrameShape, RasterChannels } from '../types/volume.ts';
import { encodeSampleLe, VOXEL_BYTE_WIDTH } from '../shared/utils/voxelSamples.ts';

export type RasterizeFrameOptions = {
  channels?: RasterChannels;
};

function assertSampleInside(sample: FrameSample, shape: FrameShape) {
  if (sample.x < 0 || sample.x >= shape.width || sample.y < 0 || sample.y >= shape.height) {
    throw new RangeError(
      `Frame sample (${sample.x}, ${sample.y}) is outside the ${shape.width}x${shape.height} frame.`
    );
  }
}

/**
 * Places each sample's 8-bit display value at its (x, y) pixel. With three channels the
 * value is repeated for R, G and B. The first out-of-range voxel aborts the raster.
 */
export function rasterizeFrame(
  samples: Iterable<FrameSample>,
  shape: FrameShape,
  { channels = 1 }: RasterizeFrameOptions = {}
): Uint8Array {
  const pixels = new Uint8Array(shape.width * shape.height * channels);

  for (const sample of samples) {
    if (!sample.ok) {
      throw sample.error;
    }
    assertSampleInside(sample, shape);

    const value = sample.voxel.normalized();
    const offset = (sample.y * shape.width + sample.x) * channels;
    for (let channel = 0; channel < channels; channel++) {
      pixels[offset + channel] = value;
    }
  }

  return pixels;
}

/**
 * Dumps the raw 16-bit values, little-endian, in the order the samples arrive.
 */
export function collectRawFrame(samples: Iterable<FrameSample>, shape: FrameShape): Uint8Array {
  const capacity = shape.width * shape.height;
  const bytes = new Uint8Array(capacity * VOXEL_BYTE_WIDTH);
  let count = 0;

  for (const sample of samples) {
    if (!sample.ok) {
      throw sample.error;
    }
    assertSampleInside(sample, shape);
    if (count >= capacity) {
      throw new RangeError(`Frame produced more than ${capacity} samples.`);
    }

    encodeSampleLe(sample.voxel.value, bytes, count * VOXEL_BYTE_WIDTH);
    count++;
  }

  return count === capacity ? bytes : bytes.subarray(0, count * VOXEL_BYTE_WIDTH);
}
