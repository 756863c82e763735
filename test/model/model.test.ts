import { MissingParameterError, TieError, UnknownParameterError } from '../../src/errors';
import { evaluateBundle } from '../../src/mapping/map.serialize';
import { readSnapshot } from '../../src/model/model.ties';
import { AlphaModel, ExactModel } from '../../src/model/model.variants';
import type { DetectorLike } from '../../src/model/model.types';
import { Gaussian, Uniform } from '../../src/variables/priors';
import { scaledRadius, TestSphere } from '../utils/test-helpers';

const LOG_2PI = Math.log(2 * Math.PI);

function alphaModel(): AlphaModel {
  return new AlphaModel(
    new TestSphere({
      center: [new Uniform(0, 10), new Uniform(0, 10), 5],
      r: new Uniform(0.5, 1.5, undefined, 'r'),
    }),
    scaledRadius,
    {
      alpha: new Uniform(0.5, 1.5),
      noiseSd: 0.1,
      mediumIndex: 1.33,
      illumWavelen: 0.66,
      illumPolarization: [1, 0],
    }
  );
}

const detector: DetectorLike = { values: [1, 1, 1] };

describe('Model', () => {
  describe('parameters', () => {
    it('should name parameters in discovery order across maps', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const names = model.parameterNames;
      // Assert
      expect(names).toEqual(['center.0', 'center.1', 'r', 'alpha']);
    });

    it('should start from the prior guesses', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const guess = model.initialGuess;
      // Assert
      expect(guess).toEqual([5, 5, 1, 1]);
    });

    it('should expose priors by name', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const parameters = model.parameters;
      // Assert
      expect(Object.keys(parameters)).toEqual(['center.0', 'center.1', 'r', 'alpha']);
    });

    it('should reconstruct the scatterer with priors in place', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const r = model.scatterer.parameters.r;
      // Assert
      expect(r).toBe(model.parameterList[2]);
    });

    it('should reconstruct the scatterer for a values vector', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const scatterer = model.scattererFromParameters([1, 2, 0.75, 1]);
      // Assert
      expect(scatterer.parameters).toEqual({ center: [1, 2, 5], r: 0.75 });
    });

    it('should rename a parameter', () => {
      // Arrange
      const model = alphaModel();
      // Act
      model.renameParameter('r', 'radius');
      // Assert
      expect(model.parameterNames).toEqual(['center.0', 'center.1', 'radius', 'alpha']);
    });
  });

  describe('parameter records', () => {
    it('should accept name-keyed records', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const lnprior = model.lnprior({ 'center.0': 5, 'center.1': 5, r: 1, alpha: 1 });
      // Assert
      expect(lnprior).toBeCloseTo(-2 * Math.log(10), 12);
    });

    it('should throw MissingParameterError for a missing name', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const act = () => model.lnprior({ 'center.0': 5, 'center.1': 5, r: 1 });
      // Assert
      expect(act).toThrow('Missing parameter: alpha');
    });
  });

  describe('optics', () => {
    it('should read mapped optics', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const optics = model.findOptics(model.initialGuess);
      // Assert
      expect(optics).toEqual({ mediumIndex: 1.33, illumWavelen: 0.66, illumPolarization: [1, 0] });
    });

    it('should fall back to detector metadata', () => {
      // Arrange
      const model = new ExactModel(new TestSphere({ r: new Uniform(0.5, 1.5) }), scaledRadius);
      const withMetadata: DetectorLike = {
        values: [1],
        mediumIndex: 1.33,
        illumWavelen: 0.66,
        illumPolarization: [0, 1],
      };
      // Act
      const optics = model.findOptics([1], withMetadata);
      // Assert
      expect(optics).toEqual({ mediumIndex: 1.33, illumWavelen: 0.66, illumPolarization: [0, 1] });
    });

    it('should throw MissingParameterError when neither source has a value', () => {
      // Arrange
      const model = new ExactModel(new TestSphere({ r: new Uniform(0.5, 1.5) }), scaledRadius);
      // Act
      const act = () => model.findOptics([1]);
      // Assert
      expect(act).toThrow('Missing parameter: mediumIndex');
    });

    it('should expose mapped optics through getters', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const wavelength = model.illumWavelen;
      // Assert
      expect(wavelength).toBe(0.66);
    });
  });

  describe('noise', () => {
    it('should use the mapped noise level', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const noise = model.findNoise(model.initialGuess, { values: [1], noiseSd: 0.5 });
      // Assert
      expect(noise).toBe(0.1);
    });

    it('should fall back to the detector noise level', () => {
      // Arrange
      const model = new ExactModel(new TestSphere({ r: new Gaussian(1, 0.1) }), scaledRadius);
      // Act
      const noise = model.findNoise([1], { values: [1], noiseSd: 0.2 });
      // Assert
      expect(noise).toBe(0.2);
    });

    it('should assume the configured fallback when every prior is uniform', () => {
      // Arrange
      const model = new ExactModel(new TestSphere({ r: new Uniform(0.5, 1.5) }), scaledRadius);
      // Act
      const noise = model.findNoise([1]);
      // Assert
      expect(noise).toBe(1);
    });

    it('should refuse to guess with non-uniform priors', () => {
      // Arrange
      const model = new ExactModel(new TestSphere({ r: new Gaussian(1, 0.1) }), scaledRadius);
      // Act
      const act = () => model.findNoise([1]);
      // Assert
      expect(act).toThrow('noiseSd is required for non-uniform priors.');
    });

    it('should refuse under the strict policy', () => {
      // Arrange
      const model = new ExactModel(new TestSphere({ r: new Uniform(0.5, 1.5) }), scaledRadius, {
        noisePolicy: 'strict',
      });
      // Act
      const act = () => model.findNoise([1]);
      // Assert
      expect(act).toThrow(MissingParameterError);
    });

    it('should accept a custom policy', () => {
      // Arrange
      const model = new ExactModel(new TestSphere({ r: new Gaussian(1, 0.1) }), scaledRadius, {
        noisePolicy: () => 0.3,
      });
      // Act
      const noise = model.findNoise([1]);
      // Assert
      expect(noise).toBe(0.3);
    });
  });

  describe('probabilities', () => {
    it('should sum prior log densities', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const lnprior = model.lnprior(model.initialGuess);
      // Assert
      expect(lnprior).toBeCloseTo(-2 * Math.log(10), 12);
    });

    it('should be -Infinity for a scatterer the factory rejects', () => {
      // Arrange
      const model = new ExactModel(new TestSphere({ r: new Uniform(-1, 1) }), scaledRadius);
      // Act
      const lnprior = model.lnprior([-0.5]);
      // Assert
      expect(lnprior).toBe(-Infinity);
    });

    it('should compute the Gaussian log-likelihood of a perfect fit', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const lnlike = model.lnlike(model.initialGuess, detector);
      // Assert
      expect(lnlike).toBeCloseTo(-1.5 * LOG_2PI - 3 * Math.log(0.1), 10);
    });

    it('should penalize residuals', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const lnlike = model.lnlike([5, 5, 1.2, 1], detector);
      // Assert
      expect(lnlike).toBeCloseTo(-1.5 * LOG_2PI - 3 * Math.log(0.1) - 6, 10);
    });

    it('should add prior and likelihood into the posterior', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const lnposterior = model.lnposterior(model.initialGuess, detector);
      // Assert
      expect(lnposterior).toBeCloseTo(-2 * Math.log(10) - 1.5 * LOG_2PI - 3 * Math.log(0.1), 10);
    });

    it('should skip the likelihood where the prior forbids the point', () => {
      // Arrange
      const model = alphaModel();
      const lnlike = jest.spyOn(model, 'lnlike');
      // Act
      const lnposterior = model.lnposterior([5, 5, 3, 1], detector);
      // Assert
      expect([lnposterior, lnlike.mock.calls.length]).toEqual([-Infinity, 0]);
    });

    it('should reject per-point noise of the wrong length', () => {
      // Arrange
      const model = new ExactModel(new TestSphere({ r: new Uniform(0.5, 1.5) }), scaledRadius);
      // Act
      const act = () => model.lnlike([1], { values: [1, 1, 1], noiseSd: [0.1, 0.1] });
      // Assert
      expect(act).toThrow('noiseSd has 2 value(s) but the data has 3 point(s).');
    });
  });

  describe('ties', () => {
    it('should collapse tied parameters into one slot', () => {
      // Arrange
      const model = alphaModel();
      // Act
      model.addTie(['center.0', 'center.1'], 'xy');
      // Assert
      expect(model.parameterNames).toEqual(['xy', 'r', 'alpha']);
    });

    it('should read the tied value at every position', () => {
      // Arrange
      const model = alphaModel();
      model.addTie(['center.0', 'center.1'], 'xy');
      // Act
      const scatterer = model.scattererFromParameters([3, 1, 1]);
      // Assert
      expect(scatterer.parameters).toEqual({ center: [3, 3, 5], r: 1 });
    });

    it('should bump the version', () => {
      // Arrange
      const model = alphaModel();
      // Act
      model.addTie(['center.0', 'center.1']);
      // Assert
      expect(model.version).toBe(1);
    });

    it('should shrink generated guesses', () => {
      // Arrange
      const model = alphaModel();
      model.addTie(['center.0', 'center.1']);
      // Act
      const rows = model.generateGuess(2, 0, 'test-seed');
      // Assert
      expect(rows).toEqual([
        [5, 1, 1],
        [5, 1, 1],
      ]);
    });

    it('should throw UnknownParameterError for an unknown name', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const act = () => model.addTie(['center.0', 'nope']);
      // Assert
      expect(act).toThrow(UnknownParameterError);
    });

    it('should throw UnknownParameterError for an empty list', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const act = () => model.addTie([]);
      // Assert
      expect(act).toThrow(UnknownParameterError);
    });

    it('should throw TieError for unequal priors', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const act = () => model.addTie(['center.0', 'r']);
      // Assert
      expect(act).toThrow(TieError);
    });

    describe.each([
      ['an unknown name', ['center.0', 'nope']],
      ['an empty list', []],
      ['unequal priors', ['center.0', 'r']],
    ])('when a tie fails for %s', (_case, names) => {
      const failedTie = () => {
        const model = alphaModel();
        const before = structuredClone(model.maps);
        expect(() => model.addTie(names)).toThrow();
        return { model, before };
      };

      it('should keep the maps', () => {
        // Arrange
        const { model, before } = failedTie();
        // Act
        const after = model.maps;
        // Assert
        expect(after).toEqual(before);
      });

      it('should keep the names and version', () => {
        // Arrange
        const { model } = failedTie();
        // Act
        const state = [model.parameterNames, model.version];
        // Assert
        expect(state).toEqual([['center.0', 'center.1', 'r', 'alpha'], 0]);
      });
    });
  });

  describe('snapshots', () => {
    it('should keep reading the maps of their tie version', () => {
      // Arrange
      const model = alphaModel();
      const snapshot = model.snapshot();
      model.addTie(['center.0', 'center.1'], 'xy');
      // Act
      const scatterer = readSnapshot(snapshot, 'scatterer', [3, 4, 1, 1]);
      // Assert
      expect(scatterer).toEqual({ center: [3, 4, 5], r: 1 });
    });

    it('should keep the names of their tie version', () => {
      // Arrange
      const model = alphaModel();
      const snapshot = model.snapshot();
      // Act
      model.addTie(['center.0', 'center.1'], 'xy');
      // Assert
      expect(snapshot.names).toEqual(['center.0', 'center.1', 'r', 'alpha']);
    });

    it('should be frozen', () => {
      // Arrange
      const model = alphaModel();
      // Act
      const snapshot = model.snapshot();
      // Assert
      expect(Object.isFrozen(snapshot.maps.scatterer)).toBe(true);
    });

    it('should throw MissingParameterError for an unknown map', () => {
      // Arrange
      const snapshot = alphaModel().snapshot();
      // Act
      const act = () => readSnapshot(snapshot, 'theory', []);
      // Assert
      expect(act).toThrow("Snapshot has no map named 'theory'.");
    });
  });

  describe('bundles', () => {
    it('should evaluate model maps with the supplied values', () => {
      // Arrange
      const bundle = alphaModel().toBundle([5, 5, 1, 0.8]);
      // Act
      const section = evaluateBundle(bundle, 'model');
      // Assert
      expect(section).toEqual({ alpha: 0.8 });
    });
  });
});
