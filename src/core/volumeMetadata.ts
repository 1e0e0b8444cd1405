import {
  DimSizeNotFoundError,
  DuplicateKeyError,
  InvalidDimSizeValueError,
  MissingDimSizeValuesError,
  TooManyDimSizeValuesError
} from './errors.ts';
import { silentLogger, type Logger } from '../shared/utils/logging.ts';
import type { FrameAxis, FrameShape } from '../types/volume.ts';

export const DIM_SIZE_KEY = 'DimSize';

const DIGITS_PATTERN = /^[0-9]+$/;

export type ParseVolumeMetadataOptions = {
  log?: Pick<Logger, 'debug' | 'warn'>;
};

function assertDimension(name: string, value: number) {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`VolumeMetadata: ${name} must be a non-negative integer (got ${value}).`);
  }
}

function parseDimensionToken(token: string, lineNumber: number): number {
  if (!DIGITS_PATTERN.test(token)) {
    throw new InvalidDimSizeValueError(lineNumber, token);
  }
  const value = Number(token);
  if (!Number.isSafeInteger(value)) {
    throw new InvalidDimSizeValueError(lineNumber, token);
  }
  return value;
}

/**
 * Voxel counts along each axis of a volume. Immutable once constructed.
 */
export class VolumeMetadata {
  public readonly xdim: number;
  public readonly ydim: number;
  public readonly zdim: number;

  constructor(xdim: number, ydim: number, zdim: number) {
    assertDimension('xdim', xdim);
    assertDimension('ydim', ydim);
    assertDimension('zdim', zdim);
    this.xdim = xdim;
    this.ydim = ydim;
    this.zdim = zdim;
    Object.freeze(this);
  }

  /**
   * Reads the dimensions from `key = value` metadata text.
   *
   * This is not a grammar: lines are split at their first `=`, everything but the
   * `DimSize` key is skipped, and the whole text is scanned so that a second `DimSize`
   * line is reported even after a valid one.
   */
  static parse(text: string, options: ParseVolumeMetadataOptions = {}): VolumeMetadata {
    const log = options.log ?? silentLogger;
    let result: VolumeMetadata | null = null;

    const lines = text.split('\n');
    for (let lineIndex = 0; lineIndex < lines.length; lineIndex++) {
      const lineNumber = lineIndex + 1;
      const line = lines[lineIndex] ?? '';

      const separatorIndex = line.indexOf('=');
      if (separatorIndex === -1) {
        if (line.trim()) {
          log.warn(`Line ${lineNumber}: Skipping entry without an \`=\` sign`);
        } else {
          log.debug(`Line ${lineNumber}: Skipping empty line`);
        }
        continue;
      }

      const key = line.slice(0, separatorIndex).trim();
      if (!key) {
        log.debug(`Line ${lineNumber}: Skipping line with empty key`);
        continue;
      }

      if (key !== DIM_SIZE_KEY) {
        log.debug(`Line ${lineNumber}: Skipping key ${key}`);
        continue;
      }

      if (result) {
        throw new DuplicateKeyError(lineNumber);
      }

      const tokens = line
        .slice(separatorIndex + 1)
        .trim()
        .split(/\s+/)
        .filter(Boolean);

      if (tokens.length < 3) {
        throw new MissingDimSizeValuesError(lineNumber);
      }
      if (tokens.length > 3) {
        throw new TooManyDimSizeValuesError(lineNumber);
      }

      const [xdim, ydim, zdim] = tokens.map((token) => parseDimensionToken(token, lineNumber));
      result = new VolumeMetadata(xdim ?? 0, ydim ?? 0, zdim ?? 0);
    }

    if (!result) {
      throw new DimSizeNotFoundError();
    }
    return result;
  }

  get xframeLength(): number {
    return this.ydim * this.zdim;
  }

  get yframeLength(): number {
    return this.xdim * this.zdim;
  }

  get zframeLength(): number {
    return this.xdim * this.ydim;
  }

  get voxelCount(): number {
    return this.xdim * this.ydim * this.zdim;
  }

  dimension(axis: FrameAxis): number {
    switch (axis) {
      case 'x':
        return this.xdim;
      case 'y':
        return this.ydim;
      case 'z':
        return this.zdim;
    }
  }

  frameShape(axis: FrameAxis): FrameShape {
    switch (axis) {
      case 'x':
        return { width: this.ydim, height: this.zdim };
      case 'y':
        return { width: this.xdim, height: this.zdim };
      case 'z':
        return { width: this.xdim, height: this.ydim };
    }
  }

  equals(other: VolumeMetadata): boolean {
    return this.xdim === other.xdim && this.ydim === other.ydim && this.zdim === other.zdim;
  }
}
