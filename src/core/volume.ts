import { DataSizeMismatchError, DataSizeUnevenError } from './errors.ts';
import { Voxel } from './voxel.ts';
import type { VolumeMetadata } from './volumeMetadata.ts';
import type { FrameAxis, FrameSample, FrameShape } from '../types/volume.ts';

/**
 * Byte-level walk over a frame: `outerCount` runs of `innerCount` samples. Runs start
 * `outerStride` bytes apart (negative when Z is walked back to front) and samples within
 * a run sit `innerStride` bytes apart.
 */
type FrameTraversal = {
  start: number;
  outerCount: number;
  outerStride: number;
  innerCount: number;
  innerStride: number;
  width: number;
};

function* traverseFrame(data: Uint8Array, traversal: FrameTraversal): Generator<FrameSample, void, undefined> {
  const { start, outerCount, outerStride, innerCount, innerStride, width } = traversal;
  let sampleIndex = 0;

  for (let outer = 0; outer < outerCount; outer++) {
    const runStart = start + outer * outerStride;
    for (let inner = 0; inner < innerCount; inner++) {
      const offset = runStart + inner * innerStride;
      const result = Voxel.tryDecodeLe(data[offset], data[offset + 1]);
      const x = sampleIndex % width;
      const y = Math.floor(sampleIndex / width);
      sampleIndex++;

      if (result.ok) {
        yield { ok: true, voxel: result.voxel, x, y };
      } else {
        yield { ok: false, error: result.error, x, y };
      }
    }
  }
}

/**
 * One 2D frame of a volume. Iterating decodes samples on demand; each iteration starts
 * a new scan and stopping early leaves the rest of the frame undecoded.
 */
export class VolumeFrame implements Iterable<FrameSample> {
  constructor(
    public readonly axis: FrameAxis,
    public readonly index: number,
    public readonly shape: FrameShape,
    private readonly data: Uint8Array,
    private readonly traversal: FrameTraversal
  ) {}

  get length(): number {
    return this.shape.width * this.shape.height;
  }

  [Symbol.iterator](): Iterator<FrameSample> {
    return traverseFrame(this.data, this.traversal);
  }
}

/**
 * A read-only view over a flat buffer of 16-bit little-endian voxels, stored with X
 * varying fastest, then Y, then Z. The buffer is borrowed, never copied, and must not
 * be mutated while frames are read from it.
 */
export class Volume {
  private constructor(
    public readonly metadata: VolumeMetadata,
    private readonly data: Uint8Array
  ) {}

  /**
   * Only the byte length is checked here. Sample values are validated lazily, one at
   * a time, as frames are iterated.
   */
  static open(metadata: VolumeMetadata, data: Uint8Array): Volume {
    const expected = metadata.voxelCount * Voxel.BYTE_WIDTH;

    if (data.byteLength !== expected) {
      throw new DataSizeMismatchError(data.byteLength, expected);
    }

    if (data.byteLength % Voxel.BYTE_WIDTH !== 0) {
      throw new DataSizeUnevenError(data.byteLength);
    }

    return new Volume(metadata, data);
  }

  get byteLength(): number {
    return this.data.byteLength;
  }

  private get zframeBytes(): number {
    return this.metadata.zframeLength * Voxel.BYTE_WIDTH;
  }

  private get rowBytes(): number {
    return this.metadata.xdim * Voxel.BYTE_WIDTH;
  }

  private assertFrameIndex(axis: FrameAxis, index: number) {
    const dimension = this.metadata.dimension(axis);
    if (!Number.isInteger(index) || index < 0 || index >= dimension) {
      throw new RangeError(
        `Frame index ${index} is outside the ${axis.toUpperCase()} axis (expected 0 to ${dimension - 1}).`
      );
    }
  }

  /** A contiguous slab of the buffer. */
  zframe(index: number): VolumeFrame {
    this.assertFrameIndex('z', index);
    const { xdim, ydim } = this.metadata;
    return new VolumeFrame('z', index, this.metadata.frameShape('z'), this.data, {
      start: index * this.zframeBytes,
      outerCount: 1,
      outerStride: 0,
      innerCount: xdim * ydim,
      innerStride: Voxel.BYTE_WIDTH,
      width: xdim
    });
  }

  /** Row `index` of every Z-frame, from the last Z-frame to the first. */
  yframe(index: number): VolumeFrame {
    this.assertFrameIndex('y', index);
    const { xdim, zdim } = this.metadata;
    return new VolumeFrame('y', index, this.metadata.frameShape('y'), this.data, {
      start: (zdim - 1) * this.zframeBytes + index * this.rowBytes,
      outerCount: zdim,
      outerStride: -this.zframeBytes,
      innerCount: xdim,
      innerStride: Voxel.BYTE_WIDTH,
      width: xdim
    });
  }

  /**
   * Column `index` of every Z-frame, from the last Z-frame to the first. Columns are not
   * contiguous: each sample is a separate read one row apart.
   */
  xframe(index: number): VolumeFrame {
    this.assertFrameIndex('x', index);
    const { ydim, zdim } = this.metadata;
    return new VolumeFrame('x', index, this.metadata.frameShape('x'), this.data, {
      start: (zdim - 1) * this.zframeBytes + index * Voxel.BYTE_WIDTH,
      outerCount: zdim,
      outerStride: -this.zframeBytes,
      innerCount: ydim,
      innerStride: this.rowBytes,
      width: ydim
    });
  }

  frame(axis: FrameAxis, index: number): VolumeFrame {
    switch (axis) {
      case 'x':
        return this.xframe(index);
      case 'y':
        return this.yframe(index);
      case 'z':
        return this.zframe(index);
    }
  }
}
