export type VolumeFrameErrorCode =
  | 'MISSING_DIM_SIZE_VALUES'
  | 'INVALID_DIM_SIZE_VALUE'
  | 'DUPLICATE_KEY'
  | 'DIM_SIZE_NOT_FOUND'
  | 'TOO_MANY_DIM_SIZE_VALUES'
  | 'DATA_SIZE_MISMATCH'
  | 'DATA_SIZE_UNEVEN'
  | 'VOXEL_VALUE_OUT_OF_RANGE';

export class VolumeFrameError extends Error {
  public readonly code: VolumeFrameErrorCode;

  constructor(code: VolumeFrameErrorCode, message: string) {
    super(message);
    this.name = 'VolumeFrameError';
    this.code = code;
  }
}

/**
 * Raised while reading the metadata text. Every variant except
 * {@link DimSizeNotFoundError} points at the 1-based line that caused it.
 */
export class MetadataError extends VolumeFrameError {
  constructor(code: VolumeFrameErrorCode, message: string) {
    super(code, message);
    this.name = 'MetadataError';
  }
}

export class MissingDimSizeValuesError extends MetadataError {
  public readonly lineNumber: number;

  constructor(lineNumber: number) {
    super('MISSING_DIM_SIZE_VALUES', `Line ${lineNumber}: Expecting values for \`DimSize\` key`);
    this.name = 'MissingDimSizeValuesError';
    this.lineNumber = lineNumber;
  }
}

export class InvalidDimSizeValueError extends MetadataError {
  public readonly lineNumber: number;
  public readonly value: string;

  constructor(lineNumber: number, value: string) {
    super('INVALID_DIM_SIZE_VALUE', `Line ${lineNumber}: Invalid value ${value} for dimension size`);
    this.name = 'InvalidDimSizeValueError';
    this.lineNumber = lineNumber;
    this.value = value;
  }
}

export class DuplicateKeyError extends MetadataError {
  public readonly lineNumber: number;

  constructor(lineNumber: number) {
    super('DUPLICATE_KEY', `Line ${lineNumber}: Duplicated \`DimSize\` key`);
    this.name = 'DuplicateKeyError';
    this.lineNumber = lineNumber;
  }
}

export class DimSizeNotFoundError extends MetadataError {
  constructor() {
    super('DIM_SIZE_NOT_FOUND', 'Invalid metadata, `DimSize` key not found');
    this.name = 'DimSizeNotFoundError';
  }
}

export class TooManyDimSizeValuesError extends MetadataError {
  public readonly lineNumber: number;

  constructor(lineNumber: number) {
    super('TOO_MANY_DIM_SIZE_VALUES', `Line ${lineNumber}: Too many values for \`DimSize\` key`);
    this.name = 'TooManyDimSizeValuesError';
    this.lineNumber = lineNumber;
  }
}

export class VolumeDataError extends VolumeFrameError {
  constructor(code: VolumeFrameErrorCode, message: string) {
    super(code, message);
    this.name = 'VolumeDataError';
  }
}

export class DataSizeMismatchError extends VolumeDataError {
  public readonly actual: number;
  public readonly expected: number;

  constructor(actual: number, expected: number) {
    super(
      'DATA_SIZE_MISMATCH',
      `Data size of ${actual} bytes does not match metadata: expecting ${expected} bytes`
    );
    this.name = 'DataSizeMismatchError';
    this.actual = actual;
    this.expected = expected;
  }
}

export class DataSizeUnevenError extends VolumeDataError {
  public readonly size: number;

  constructor(size: number) {
    super('DATA_SIZE_UNEVEN', `Data size of ${size} bytes is uneven`);
    this.name = 'DataSizeUnevenError';
    this.size = size;
  }
}

export class VoxelValueOutOfRangeError extends VolumeDataError {
  public readonly value: number;

  constructor(value: number) {
    super('VOXEL_VALUE_OUT_OF_RANGE', `Voxel value ${value} is out of the 0-4095 range.`);
    this.name = 'VoxelValueOutOfRangeError';
    this.value = value;
  }
}
