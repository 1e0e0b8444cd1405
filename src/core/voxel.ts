import { VoxelValueOutOfRangeError } from './errors.ts';
import {
  encodeSampleLe,
  normalizeSample,
  sampleFromBytes,
  VOXEL_BYTE_WIDTH,
  VOXEL_MAX_VALUE
} from '../shared/utils/voxelSamples.ts';

export type VoxelResult =
  | { ok: true; voxel: Voxel }
  | { ok: false; error: VoxelValueOutOfRangeError };

/**
 * A single 12-bit sample stored in a 16-bit little-endian container.
 *
 * The constructor is private: {@link Voxel.create} and the decode helpers are the only
 * way to obtain an instance, so every `Voxel` in circulation holds a value in [0, 4095].
 */
export class Voxel {
  public static readonly MAX_VALUE = VOXEL_MAX_VALUE;
  public static readonly BYTE_WIDTH = VOXEL_BYTE_WIDTH;

  private constructor(public readonly value: number) {}

  static create(value: number): Voxel {
    const result = Voxel.tryCreate(value);
    if (!result.ok) {
      throw result.error;
    }
    return result.voxel;
  }

  static tryCreate(value: number): VoxelResult {
    if (!Number.isInteger(value) || value < 0 || value > VOXEL_MAX_VALUE) {
      return { ok: false, error: new VoxelValueOutOfRangeError(value) };
    }
    return { ok: true, voxel: new Voxel(value) };
  }

  static decodeLe(byte0: number, byte1: number): Voxel {
    return Voxel.create(sampleFromBytes(byte0, byte1));
  }

  static tryDecodeLe(byte0: number, byte1: number): VoxelResult {
    return Voxel.tryCreate(sampleFromBytes(byte0, byte1));
  }

  static byteWidth(): number {
    return VOXEL_BYTE_WIDTH;
  }

  normalized(): number {
    return normalizeSample(this.value);
  }

  encodeLe(): Uint8Array {
    return encodeSampleLe(this.value);
  }
}
