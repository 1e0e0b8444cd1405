export const VOXEL_MAX_VALUE = 4095;
export const NORMALIZED_MAX_VALUE = 255;
export const VOXEL_BYTE_WIDTH = 2;

// Callers pass values already bounded to [0, 4095], so the result is always in [0, 255].
export function normalizeSample(value: number): number {
  return Math.round((value / VOXEL_MAX_VALUE) * NORMALIZED_MAX_VALUE);
}

export function sampleFromBytes(byte0: number, byte1: number): number {
  return (byte0 & 0xff) | ((byte1 & 0xff) << 8);
}

export function encodeSampleLe(
  value: number,
  target: Uint8Array = new Uint8Array(VOXEL_BYTE_WIDTH),
  offset = 0
): Uint8Array {
  target[offset] = value & 0xff;
  target[offset + 1] = (value >>> 8) & 0xff;
  return target;
}
