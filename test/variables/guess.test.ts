import { Complex } from '../../src/structures/complex';
import { generateGuess } from '../../src/variables/guess';
import { ComplexPrior, Gaussian, Uniform } from '../../src/variables/priors';

describe('generateGuess', () => {
  const priors = () => [new Uniform(0, 1), new Gaussian(5, 2), new ComplexPrior(new Uniform(1, 3), 0.5)];

  it('should return n rows with one value per prior', () => {
    // Arrange
    // Act
    const rows = generateGuess(priors(), 4, 1, 'test-seed');
    // Assert
    expect(rows.map((row) => row.length)).toEqual([3, 3, 3, 3]);
  });

  it('should be reproducible for a fixed seed', () => {
    // Arrange
    const first = generateGuess(priors(), 3, 1, 42);
    // Act
    const second = generateGuess(priors(), 3, 1, 42);
    // Assert
    expect(second).toEqual(first);
  });

  it('should repeat the guesses when scaling is 0', () => {
    // Arrange
    // Act
    const rows = generateGuess(priors(), 2, 0, 7);
    // Assert
    expect(rows).toEqual([
      [0.5, 5, new Complex(2, 0.5)],
      [0.5, 5, new Complex(2, 0.5)],
    ]);
  });

  it('should shrink uniform draws towards the guess', () => {
    // Arrange
    // Act
    const rows = generateGuess([new Uniform(0, 1)], 50, 0.5, 'test-seed');
    // Assert
    expect(rows.every(([value]) => typeof value === 'number' && value >= 0.25 && value < 0.75)).toBe(true);
  });

  it('should keep fixed complex parts', () => {
    // Arrange
    // Act
    const rows = generateGuess([new ComplexPrior(new Uniform(1, 3), 0.5)], 5, 1, 3);
    // Assert
    expect(rows.every(([value]) => value instanceof Complex && value.imag === 0.5)).toBe(true);
  });

  it('should reject a non-positive count', () => {
    // Arrange
    // Act
    const act = () => generateGuess(priors(), 0);
    // Assert
    expect(act).toThrow('Number of guesses must be a positive integer, got 0.');
  });
});
