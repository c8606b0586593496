import { describe, it, expect } from 'vitest';

import { ChessPosition } from '@chessplanes/board';

import {
  InvalidShapeError,
  createTensor,
  deserializeTensor,
  encodeBasic,
  encodeExtended,
  parseTensorJson,
  serializeTensor,
  stringifyTensor,
} from '../index.js';

describe('serializeTensor', () => {
  it('writes planes in channel, rank, file order', () => {
    const doc = serializeTensor(encodeBasic(ChessPosition.startingPosition()));

    expect(doc.format).toBe('chessplanes/tensor');
    expect(doc.version).toBe(1);
    expect(doc.shape).toEqual([12, 8, 8]);
    expect(doc.planes).toHaveLength(12);
    expect(doc.planes[0]?.[1]).toEqual([1, 1, 1, 1, 1, 1, 1, 1]);
    expect(doc.planes[1]?.[0]).toEqual([0, 1, 0, 0, 0, 0, 1, 0]);
    expect(doc.planes[11]?.[7]).toEqual([0, 0, 0, 0, 1, 0, 0, 0]);
  });

  it('rejects tensors with unsupported shapes', () => {
    const tensor = { data: new Float32Array(14 * 64), shape: [14, 8, 8] as const };
    expect(() => serializeTensor(tensor)).toThrow(InvalidShapeError);
  });
});

describe('deserializeTensor', () => {
  it('rebuilds the tensor', () => {
    const tensor = encodeExtended(ChessPosition.fromFen('4k3/8/8/8/8/8/8/4K3 w - - 50 80'));
    const restored = deserializeTensor(serializeTensor(tensor));

    expect(restored.shape).toEqual([19, 8, 8]);
    expect(restored.data).toEqual(tensor.data);
  });

  it('survives a trip through JSON text', () => {
    const pos = ChessPosition.startingPosition();
    pos.move('d4');
    const tensor = encodeExtended(pos);

    expect(parseTensorJson(stringifyTensor(tensor, true)).data).toEqual(tensor.data);
  });

  it('rejects an unknown format', () => {
    const doc = { ...serializeTensor(createTensor(12)), format: 'other' };
    expect(() => deserializeTensor(doc)).toThrow(InvalidShapeError);
  });

  it('rejects unsupported channel counts', () => {
    const planes = Array.from({ length: 13 }, () =>
      Array.from({ length: 8 }, () => new Array<number>(8).fill(0)),
    );
    const doc = { format: 'chessplanes/tensor', version: 1, shape: [13, 8, 8], planes };

    expect(() => deserializeTensor(doc)).toThrow('Unsupported channel count 13');
  });

  it('rejects a plane count that differs from the shape', () => {
    const doc = serializeTensor(createTensor(12));
    doc.planes.pop();

    expect(() => deserializeTensor(doc)).toThrow(
      'Shape declares 12 channels but 11 planes were given',
    );
  });

  it('rejects planes that are not 8x8', () => {
    const doc = serializeTensor(createTensor(12));
    doc.planes[3]?.[2]?.pop();

    expect(() => deserializeTensor(doc)).toThrow('Plane 3 is not 8x8');
  });

  it('reports the path of invalid cells', () => {
    const doc = serializeTensor(createTensor(12));
    const planes: unknown[][][] = doc.planes.map((plane) => plane.map((row) => [...row]));
    const row = planes[0]?.[0];
    if (row) row[5] = 'x';

    expect(() => deserializeTensor({ ...doc, planes })).toThrow(/planes\.0\.0\.5/);
  });

  it('rejects spatial dimensions other than 8x8', () => {
    const doc = { ...serializeTensor(createTensor(12)), shape: [12, 8, 9] };
    expect(() => deserializeTensor(doc)).toThrow(/shape\.2/);
  });
});

describe('parseTensorJson', () => {
  it('rejects text that is not JSON', () => {
    expect(() => parseTensorJson('{not json')).toThrow(InvalidShapeError);
    expect(() => parseTensorJson('{not json')).toThrow(/not valid JSON/);
  });
});
