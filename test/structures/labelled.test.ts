import { Complex } from '../../src/structures/complex';
import { LabelledArray, makeLabelledArray } from '../../src/structures/labelled';

describe('LabelledArray', () => {
  it('should select entries by label', () => {
    // Arrange
    const array = new LabelledArray('vector', ['x', 'y', 'z'], [1, 0, 0]);
    // Act
    const x = array.sel('x');
    // Assert
    expect(x).toBe(1);
  });

  it('should report every axis of nested slices', () => {
    // Arrange
    const array = makeLabelledArray('vector', ['x', 'y'], [
      new LabelledArray('channel', [0, 1], [1, 0]),
      new LabelledArray('channel', [0, 1], [0, 1]),
    ]);
    // Act
    const dims = array.dims;
    // Assert
    expect(dims).toEqual(['vector', 'channel']);
  });

  it('should reject a coordinate count that differs from the values', () => {
    // Arrange
    // Act
    const act = () => new LabelledArray('vector', ['x', 'y'], [1]);
    // Assert
    expect(act).toThrow("LabelledArray 'vector' has 2 coordinate(s) but 1 value(s).");
  });

  it('should reject duplicate labels', () => {
    // Arrange
    // Act
    const act = () => new LabelledArray('vector', ['x', 'x'], [1, 2]);
    // Assert
    expect(act).toThrow("LabelledArray 'vector' has duplicate coordinate labels.");
  });

  it('should throw for an unknown label', () => {
    // Arrange
    const array = new LabelledArray('vector', ['x'], [1]);
    // Act
    const act = () => array.sel('w');
    // Assert
    expect(act).toThrow("Label 'w' not found on axis 'vector'.");
  });
});

describe('Complex', () => {
  it('should print with an explicit sign', () => {
    // Arrange
    const value = new Complex(1.59, -0.01);
    // Act
    const text = value.toString();
    // Assert
    expect(text).toBe('1.59-0.01j');
  });
});
