import assert from 'node:assert/strict';
import { test } from 'node:test';

import { Volume } from '../src/core/volume.ts';
import { VolumeMetadata } from '../src/core/volumeMetadata.ts';
import { DataSizeMismatchError, DataSizeUnevenError, VoxelValueOutOfRangeError } from '../src/core/errors.ts';
import type { FrameSample } from '../src/types/volume.ts';
import { createCoordinateVolumeBytes, decodeCoordinate, encodeSamples } from './helpers/syntheticVolume.ts';

type Triple = [value: number, x: number, y: number];

function toTriples(samples: Iterable<FrameSample>): Triple[] {
  const triples: Triple[] = [];
  for (const sample of samples) {
    if (!sample.ok) {
      throw sample.error;
    }
    triples.push([sample.voxel.value, sample.x, sample.y]);
  }
  return triples;
}

function openSequentialCube() {
  const metadata = VolumeMetadata.parse('DimSize = 2 2 2');
  return Volume.open(metadata, encodeSamples([0, 1, 2, 3, 4, 5, 6, 7]));
}

test('open accepts a buffer of exactly xdim * ydim * zdim * 2 bytes', () => {
  const metadata = new VolumeMetadata(3, 4, 5);
  const volume = Volume.open(metadata, new Uint8Array(120));
  assert.equal(volume.byteLength, 120);
  assert.equal(volume.metadata, metadata);
});

test('open rejects any other buffer length', () => {
  const metadata = new VolumeMetadata(3, 4, 5);
  for (const length of [0, 119, 121, 122, 240]) {
    assert.throws(
      () => Volume.open(metadata, new Uint8Array(length)),
      (error: unknown) =>
        error instanceof DataSizeMismatchError && error.actual === length && error.expected === 120,
      `length ${length} should be rejected`
    );
  }
});

test('size errors describe the byte counts', () => {
  assert.equal(
    new DataSizeMismatchError(3, 16).message,
    'Data size of 3 bytes does not match metadata: expecting 16 bytes'
  );
  const uneven = new DataSizeUnevenError(7);
  assert.equal(uneven.message, 'Data size of 7 bytes is uneven');
  assert.equal(uneven.code, 'DATA_SIZE_UNEVEN');
});

test('open does not scan sample values', () => {
  const metadata = new VolumeMetadata(2, 1, 1);
  assert.doesNotThrow(() => Volume.open(metadata, new Uint8Array([0xff, 0xff, 0xff, 0xff])));
});

test('zframe walks a contiguous slab in row-major order', () => {
  const volume = openSequentialCube();
  assert.deepEqual(toTriples(volume.zframe(0)), [
    [0, 0, 0],
    [1, 1, 0],
    [2, 0, 1],
    [3, 1, 1]
  ]);
  assert.deepEqual(toTriples(volume.zframe(1)), [
    [4, 0, 0],
    [5, 1, 0],
    [6, 0, 1],
    [7, 1, 1]
  ]);
});

test('yframe reads one row per Z-frame starting from the last Z-frame', () => {
  const volume = openSequentialCube();
  assert.deepEqual(toTriples(volume.yframe(0)), [
    [4, 0, 0],
    [5, 1, 0],
    [0, 0, 1],
    [1, 1, 1]
  ]);
  assert.deepEqual(toTriples(volume.yframe(1)), [
    [6, 0, 0],
    [7, 1, 0],
    [2, 0, 1],
    [3, 1, 1]
  ]);
});

test('xframe reads one column per Z-frame starting from the last Z-frame', () => {
  const volume = openSequentialCube();
  assert.deepEqual(toTriples(volume.xframe(0)), [
    [4, 0, 0],
    [6, 1, 0],
    [0, 0, 1],
    [2, 1, 1]
  ]);
  assert.deepEqual(toTriples(volume.xframe(1)), [
    [5, 0, 0],
    [7, 1, 0],
    [1, 0, 1],
    [3, 1, 1]
  ]);
});

test('every frame of a coordinate-encoded volume matches the traversal order', () => {
  const [xdim, ydim, zdim] = [3, 4, 5];
  const volume = Volume.open(new VolumeMetadata(xdim, ydim, zdim), createCoordinateVolumeBytes(xdim, ydim, zdim));

  const expectFrame = (
    frame: Iterable<FrameSample>,
    width: number,
    height: number,
    toVoxel: (x: number, y: number) => [number, number, number]
  ) => {
    const triples = toTriples(frame);
    assert.equal(triples.length, width * height);
    triples.forEach(([value, x, y], position) => {
      assert.equal(x, position % width);
      assert.equal(y, Math.floor(position / width));
      assert.deepEqual(decodeCoordinate(value), toVoxel(x, y));
    });
  };

  for (let z = 0; z < zdim; z++) {
    expectFrame(volume.zframe(z), xdim, ydim, (x, y) => [x, y, z]);
  }
  for (let y = 0; y < ydim; y++) {
    expectFrame(volume.yframe(y), xdim, zdim, (x, row) => [x, y, zdim - 1 - row]);
  }
  for (let x = 0; x < xdim; x++) {
    expectFrame(volume.xframe(x), ydim, zdim, (column, row) => [x, column, zdim - 1 - row]);
  }
});

test('frame shapes and lengths follow the axis', () => {
  const volume = Volume.open(new VolumeMetadata(3, 4, 5), new Uint8Array(120));
  const x = volume.frame('x', 2);
  const y = volume.frame('y', 3);
  const z = volume.frame('z', 4);
  assert.deepEqual([x.axis, x.index, x.shape, x.length], ['x', 2, { width: 4, height: 5 }, 20]);
  assert.deepEqual([y.axis, y.index, y.shape, y.length], ['y', 3, { width: 3, height: 5 }, 15]);
  assert.deepEqual([z.axis, z.index, z.shape, z.length], ['z', 4, { width: 3, height: 4 }, 12]);
  assert.equal(Array.from(x).length, 20);
  assert.equal(Array.from(y).length, 15);
  assert.equal(Array.from(z).length, 12);
});

test('out-of-range samples surface per element and only when decoded', () => {
  const volume = Volume.open(new VolumeMetadata(3, 1, 1), encodeSamples([1, 2, 4096]));

  const iterator = volume.zframe(0)[Symbol.iterator]();
  const first = iterator.next();
  const second = iterator.next();
  assert.equal(first.done, false);
  assert.equal(second.done, false);
  assert.ok(!first.done && first.value.ok && first.value.voxel.value === 1);
  assert.ok(!second.done && second.value.ok && second.value.voxel.value === 2);

  const samples = Array.from(volume.zframe(0));
  assert.equal(samples.length, 3);
  const last = samples[2];
  assert.ok(last && !last.ok);
  assert.ok(last.error instanceof VoxelValueOutOfRangeError);
  assert.equal(last.error.value, 4096);
  assert.deepEqual([last.x, last.y], [2, 0]);
});

test('a partially consumed frame never reports later bad samples', () => {
  const volume = Volume.open(new VolumeMetadata(2, 2, 1), encodeSamples([10, 20, 0xffff, 0xffff]));
  const seen: number[] = [];
  for (const sample of volume.zframe(0)) {
    if (!sample.ok) {
      assert.fail('bad sample reached before iteration stopped');
    }
    seen.push(sample.voxel.value);
    if (seen.length === 2) {
      break;
    }
  }
  assert.deepEqual(seen, [10, 20]);
});

test('frames restart on every iteration and do not affect each other', () => {
  const volume = openSequentialCube();
  const frame = volume.xframe(1);
  const first = toTriples(frame);
  toTriples(volume.yframe(0));
  toTriples(volume.zframe(1));
  assert.deepEqual(toTriples(frame), first);
});

test('frame indices outside the axis throw before any sample is produced', () => {
  const volume = openSequentialCube();
  assert.throws(() => volume.zframe(2), RangeError);
  assert.throws(() => volume.yframe(2), RangeError);
  assert.throws(() => volume.xframe(2), RangeError);
  assert.throws(() => volume.zframe(-1), RangeError);
  assert.throws(() => volume.frame('y', 0.5), RangeError);
  assert.throws(
    () => volume.frame('x', 7),
    (error: unknown) =>
      error instanceof RangeError && error.message === 'Frame index 7 is outside the X axis (expected 0 to 1).'
  );
});

test('empty volumes open but have no frames along their empty axes', () => {
  const volume = Volume.open(new VolumeMetadata(0, 0, 0), new Uint8Array(0));
  assert.equal(volume.byteLength, 0);
  assert.throws(() => volume.zframe(0), RangeError);

  const flat = Volume.open(new VolumeMetadata(2, 3, 0), new Uint8Array(0));
  assert.equal(Array.from(flat.yframe(1)).length, 0);
  assert.equal(Array.from(flat.xframe(0)).length, 0);
});

test('volumes read through views at a byte offset, including node Buffers', () => {
  const backing = new Uint8Array(12);
  backing.set(encodeSamples([9, 8, 7, 6]), 4);
  const view = Volume.open(new VolumeMetadata(2, 2, 1), backing.subarray(4));
  assert.deepEqual(
    toTriples(view.zframe(0)).map(([value]) => value),
    [9, 8, 7, 6]
  );

  const buffer = Buffer.from(encodeSamples([1, 2, 3, 4]));
  const fromBuffer = Volume.open(new VolumeMetadata(1, 2, 2), buffer);
  assert.deepEqual(toTriples(fromBuffer.xframe(0)), [
    [3, 0, 0],
    [4, 1, 0],
    [1, 0, 1],
    [2, 1, 1]
  ]);
});
