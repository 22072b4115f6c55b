import { DecodeParameters, reversePredictor } from '../pdf/predictor';

function params(
  columns: number,
  colors: 1 | 3 = 1,
  bitsPerComponent: 1 | 2 | 4 | 8 = 8
): DecodeParameters {
  return { predictor: 15, colors, bitsPerComponent, columns };
}

describe('Reversing PNG predictors', () => {
  it('should strip the filter byte of unfiltered rows', () => {
    expect(reversePredictor(new Uint8Array([0, 1, 2, 3]), params(3))).toEqual(
      new Uint8Array([1, 2, 3])
    );
  });

  it('should undo the Sub filter', () => {
    expect(reversePredictor(new Uint8Array([1, 10, 5, 5]), params(3))).toEqual(
      new Uint8Array([10, 15, 20])
    );
  });

  it('should undo the Up filter', () => {
    const data = new Uint8Array([0, 1, 2, 3, 2, 1, 1, 1]);
    expect(reversePredictor(data, params(3))).toEqual(
      new Uint8Array([1, 2, 3, 2, 3, 4])
    );
  });

  it('should undo the Average filter', () => {
    const data = new Uint8Array([0, 10, 20, 3, 10, 4]);
    expect(reversePredictor(data, params(2))).toEqual(
      new Uint8Array([10, 20, 15, 21])
    );
  });

  it('should undo the Paeth filter', () => {
    const data = new Uint8Array([4, 10, 5, 4, 1, 1]);
    expect(reversePredictor(data, params(2))).toEqual(
      new Uint8Array([10, 15, 11, 16])
    );
  });

  it('should use the bytes of the previous pixel for multi-channel images', () => {
    const data = new Uint8Array([1, 1, 2, 3, 1, 1, 1]);
    expect(reversePredictor(data, params(2, 3))).toEqual(
      new Uint8Array([1, 2, 3, 2, 3, 4])
    );
  });

  it('should operate on whole bytes for low bit depths', () => {
    const data = new Uint8Array([1, 0x0f, 0x01]);
    expect(reversePredictor(data, params(10, 1, 1))).toEqual(
      new Uint8Array([0x0f, 0x10])
    );
  });

  it('should wrap around on overflow', () => {
    expect(reversePredictor(new Uint8Array([1, 200, 100]), params(2))).toEqual(
      new Uint8Array([200, 44])
    );
  });

  it('should ignore incomplete trailing rows', () => {
    const data = new Uint8Array([0, 1, 2, 3, 0, 4]);
    expect(reversePredictor(data, params(3))).toEqual(new Uint8Array([1, 2, 3]));
  });

  it('should reject unknown filter types', () => {
    expect(() => reversePredictor(new Uint8Array([5, 1]), params(1))).toThrow(
      'Invalid filter algorithm: 5'
    );
  });
});
