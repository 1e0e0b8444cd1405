import type { RasterChannels } from '../../types/volume.ts';

type FrameTiffInput = {
  width: number;
  height: number;
  channels: RasterChannels;
  /**
   * 8-bit pixels in row-major order, channels interleaved.
   * Length must be width * height * channels.
   */
  pixels: Uint8Array;
};

const TIFF_MAGIC = 42;

const TYPE_SHORT = 3;
const TYPE_LONG = 4;

const TAG_IMAGE_WIDTH = 256;
const TAG_IMAGE_LENGTH = 257;
const TAG_BITS_PER_SAMPLE = 258;
const TAG_COMPRESSION = 259;
const TAG_PHOTOMETRIC_INTERPRETATION = 262;
const TAG_STRIP_OFFSETS = 273;
const TAG_SAMPLES_PER_PIXEL = 277;
const TAG_ROWS_PER_STRIP = 278;
const TAG_STRIP_BYTE_COUNTS = 279;
const TAG_PLANAR_CONFIGURATION = 284;
const TAG_SAMPLE_FORMAT = 339;

const PHOTOMETRIC_BLACK_IS_ZERO = 1;
const PHOTOMETRIC_RGB = 2;

const writeAscii = (view: DataView, offset: number, text: string) => {
  for (let i = 0; i < text.length; i++) {
    view.setUint8(offset + i, text.charCodeAt(i) & 0xff);
  }
};

type TiffEntry = {
  tag: number;
  type: number;
  count: number;
  value: number;
};

const writeIfdEntry = (view: DataView, offset: number, entry: TiffEntry) => {
  view.setUint16(offset, entry.tag, true);
  view.setUint16(offset + 2, entry.type, true);
  view.setUint32(offset + 4, entry.count >>> 0, true);
  // A single SHORT is stored left-justified in the 4-byte value field.
  if (entry.type === TYPE_SHORT && entry.count === 1) {
    view.setUint16(offset + 8, entry.value, true);
    view.setUint16(offset + 10, 0, true);
    return;
  }
  view.setUint32(offset + 8, entry.value >>> 0, true);
};

export function encodeFrameTiff({ width, height, channels, pixels }: FrameTiffInput): ArrayBuffer {
  if (!Number.isFinite(width) || width <= 0 || !Number.isInteger(width)) {
    throw new Error('encodeFrameTiff: width must be a positive integer.');
  }
  if (!Number.isFinite(height) || height <= 0 || !Number.isInteger(height)) {
    throw new Error('encodeFrameTiff: height must be a positive integer.');
  }
  if (channels !== 1 && channels !== 3) {
    throw new Error('encodeFrameTiff: channels must be 1 or 3.');
  }

  const expectedLength = width * height * channels;
  if (pixels.length !== expectedLength) {
    throw new Error(`encodeFrameTiff: pixel length must be ${expectedLength} bytes.`);
  }

  const headerSize = 8;
  const dataStart = headerSize;
  const dataSize = expectedLength;
  const ifdEntryCount = 11;
  const ifdSize = 2 + ifdEntryCount * 12 + 4;
  // IFDs start on a word boundary.
  const ifdStart = dataStart + dataSize + (dataSize % 2);
  const extraArraysStart = ifdStart + ifdSize;
  const bitsPerSampleOffset = extraArraysStart;
  const sampleFormatOffset = bitsPerSampleOffset + channels * 2;
  const totalSize = channels === 1 ? extraArraysStart : sampleFormatOffset + channels * 2;

  const buffer = new ArrayBuffer(totalSize);
  const view = new DataView(buffer);
  const bytes = new Uint8Array(buffer);

  // Header: little-endian (II), magic 42, first IFD offset.
  writeAscii(view, 0, 'II');
  view.setUint16(2, TIFF_MAGIC, true);
  view.setUint32(4, ifdStart, true);

  // Image data (uncompressed, a single strip).
  bytes.set(pixels, dataStart);

  if (channels === 3) {
    for (let channel = 0; channel < channels; channel++) {
      view.setUint16(bitsPerSampleOffset + channel * 2, 8, true);
      view.setUint16(sampleFormatOffset + channel * 2, 1, true);
    }
  }

  const entries: TiffEntry[] = [
    { tag: TAG_IMAGE_WIDTH, type: TYPE_LONG, count: 1, value: width },
    { tag: TAG_IMAGE_LENGTH, type: TYPE_LONG, count: 1, value: height },
    {
      tag: TAG_BITS_PER_SAMPLE,
      type: TYPE_SHORT,
      count: channels,
      value: channels === 1 ? 8 : bitsPerSampleOffset
    },
    { tag: TAG_COMPRESSION, type: TYPE_SHORT, count: 1, value: 1 },
    {
      tag: TAG_PHOTOMETRIC_INTERPRETATION,
      type: TYPE_SHORT,
      count: 1,
      value: channels === 1 ? PHOTOMETRIC_BLACK_IS_ZERO : PHOTOMETRIC_RGB
    },
    { tag: TAG_STRIP_OFFSETS, type: TYPE_LONG, count: 1, value: dataStart },
    { tag: TAG_SAMPLES_PER_PIXEL, type: TYPE_SHORT, count: 1, value: channels },
    { tag: TAG_ROWS_PER_STRIP, type: TYPE_LONG, count: 1, value: height },
    { tag: TAG_STRIP_BYTE_COUNTS, type: TYPE_LONG, count: 1, value: dataSize },
    { tag: TAG_PLANAR_CONFIGURATION, type: TYPE_SHORT, count: 1, value: 1 },
    {
      tag: TAG_SAMPLE_FORMAT,
      type: TYPE_SHORT,
      count: channels,
      value: channels === 1 ? 1 : sampleFormatOffset
    }
  ];

  view.setUint16(ifdStart, ifdEntryCount, true);
  let entryOffset = ifdStart + 2;
  for (const entry of entries) {
    writeIfdEntry(view, entryOffset, entry);
    entryOffset += 12;
  }
  view.setUint32(entryOffset, 0, true);

  return buffer;
}
