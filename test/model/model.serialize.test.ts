import { config } from '../../src/config';
import { importModel } from '../../src/model/model.import';
import type { DetectorLike } from '../../src/model/model.types';
import { AlphaModel, PerfectLensModel } from '../../src/model/model.variants';
import { Uniform } from '../../src/variables/priors';
import { scaledRadius, TestSphere } from '../utils/test-helpers';

function viaText<T>(value: T): unknown {
  return JSON.parse(JSON.stringify(value));
}

function tiedModel(): AlphaModel {
  const model = new AlphaModel(
    new TestSphere({
      center: [new Uniform(0, 10), new Uniform(0, 10), 5],
      r: new Uniform(0.5, 1.5, undefined, 'r'),
    }),
    scaledRadius,
    { alpha: new Uniform(0.5, 1.5), noiseSd: 0.1, mediumIndex: 1.33, illumWavelen: 0.66, illumPolarization: [1, 0] }
  );
  model.addTie(['center.0', 'center.1'], 'xy');
  return model;
}

const context = { scatterer: new TestSphere({}), forward: scaledRadius };
const detector: DetectorLike = { values: [1, 1] };

describe('Model serialization', () => {
  describe('toJSON', () => {
    it('should record the variant and format version', () => {
      // Arrange
      const model = tiedModel();
      // Act
      const json = model.toJSON();
      // Assert
      expect([json.formatVersion, json.kind, json.theory]).toEqual([1, 'AlphaModel', 'auto']);
    });

    it('should store one prior per slot', () => {
      // Arrange
      const model = tiedModel();
      // Act
      const json = model.toJSON();
      // Assert
      expect(json.parameters).toEqual([
        { type: 'Uniform', lower: 0, upper: 10, guess: 5 },
        { type: 'Uniform', lower: 0.5, upper: 1.5, guess: 1, name: 'r' },
        { type: 'Uniform', lower: 0.5, upper: 1.5, guess: 1 },
      ]);
    });
  });

  describe('when the polarization is a typed array', () => {
    const typedModel = () =>
      new AlphaModel(new TestSphere({ r: new Uniform(0.5, 1.5) }), scaledRadius, {
        illumPolarization: new Float64Array([1, 0]),
      });

    it('should store it as a sequence', () => {
      // Arrange
      const model = typedModel();
      // Act
      const json = model.toJSON();
      // Assert
      expect(json.maps.optics).toEqual({
        kind: 'apply',
        ctor: { tag: 'dict', keys: ['illumPolarization'] },
        args: [
          {
            kind: 'sequence',
            items: [
              { kind: 'constant', value: 1 },
              { kind: 'constant', value: 0 },
            ],
          },
        ],
      });
    });

    it('should restore it as a plain array', () => {
      // Arrange
      const json = viaText(typedModel().toJSON());
      // Act
      const restored = importModel(json, context);
      // Assert
      expect(restored.illumPolarization).toEqual([1, 0]);
    });
  });

  describe('importModel', () => {
    it('should restore the variant', () => {
      // Arrange
      const json = viaText(tiedModel().toJSON());
      // Act
      const restored = importModel(json, context);
      // Assert
      expect(restored.kind).toBe('AlphaModel');
    });

    it('should restore parameter names after ties', () => {
      // Arrange
      const json = viaText(tiedModel().toJSON());
      // Act
      const restored = importModel(json, context);
      // Assert
      expect(restored.parameterNames).toEqual(['xy', 'r', 'alpha']);
    });

    it('should restore ties', () => {
      // Arrange
      const restored = importModel(viaText(tiedModel().toJSON()), context);
      // Act
      const scatterer = restored.scattererFromParameters([3, 1, 1]);
      // Assert
      expect(scatterer.parameters).toEqual({ center: [3, 3, 5], r: 1 });
    });

    it('should evaluate the same posterior', () => {
      // Arrange
      const model = tiedModel();
      const restored = importModel(viaText(model.toJSON()), context);
      // Act
      const lnposterior = restored.lnposterior([3, 1.2, 0.9], detector);
      // Assert
      expect(lnposterior).toBeCloseTo(model.lnposterior([3, 1.2, 0.9], detector), 10);
    });

    it('should restore variant-specific parameters', () => {
      // Arrange
      const model = new PerfectLensModel(new TestSphere({ r: 1 }), scaledRadius, {
        lensAngle: new Uniform(0.5, 1),
      });
      const restored = importModel(viaText(model.toJSON()), context);
      // Act
      const lensAngle = restored instanceof PerfectLensModel ? restored.lensAngle : undefined;
      // Assert
      expect(lensAngle).toEqual(new Uniform(0.5, 1));
    });

    it('should reject unknown variants', () => {
      // Arrange
      const json = { formatVersion: 1, kind: 'RayModel', parameters: [], maps: {} };
      // Act
      const act = () => importModel(json, context);
      // Assert
      expect(act).toThrow('Unknown model kind: RayModel');
    });

    it('should require a scatterer map', () => {
      // Arrange
      const json = { formatVersion: 1, kind: 'ExactModel', parameters: [], maps: {} };
      // Act
      const act = () => importModel(json, context);
      // Assert
      expect(act).toThrow("Model state has no 'scatterer' map.");
    });

    it('should reject maps referencing missing priors', () => {
      // Arrange
      const json = {
        formatVersion: 1,
        kind: 'ExactModel',
        parameters: [],
        maps: { scatterer: { kind: 'slot', index: 0 } },
      };
      // Act
      const act = () => importModel(json, context);
      // Assert
      expect(act).toThrow("Map 'scatterer' references a slot beyond the 0 stored parameter(s).");
    });

    it('should warn and keep generated names when stored names do not fit', () => {
      // Arrange
      config.warnings = true;
      const warn = jest.spyOn(console, 'warn');
      const json = { ...tiedModel().toJSON(), parameterNames: ['only'] };
      // Act
      const restored = importModel(json, context);
      // Assert
      expect([restored.parameterNames, warn.mock.calls.length]).toEqual([['center.0', 'r', 'alpha'], 1]);
      warn.mockRestore();
    });
  });
});
