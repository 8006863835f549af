/**
 * Network Configuration Tests
 *
 * Tests cover:
 * - Parsing YAML network configs
 * - Environment variable substitution (${VAR} and ${VAR:-default})
 * - Validation errors naming the failing field
 * - Building a perceptron from a loaded config
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  NetworkConfigLoader,
  loadNetworkConfig,
  createPerceptron,
} from '../src/config/loader.js';
import { ConfigLoadError, ConfigValidationError } from '../src/config/errors.js';
import { Logger } from '../src/utils/logger.js';

const XOR_CONFIG = `
layers:
  - inputs: 2
    outputs: 4
    activation: tanh
  - inputs: 4
    outputs: 1
    activation: sigmoid
    learningRate: 0.05

training:
  threshold: 0.005
  maxEpochs: 20000
  learningRate: 0.3

logging:
  level: warn
`;

function validationError(act: () => unknown): ConfigValidationError {
  try {
    act();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ConfigValidationError');
}

describe('NetworkConfigLoader', () => {
  describe('parsing', () => {
    it('should parse layers and training settings', () => {
      const config = new NetworkConfigLoader().parse(XOR_CONFIG);

      expect(config.layers).toEqual([
        { inputs: 2, outputs: 4, activation: 'tanh' },
        { inputs: 4, outputs: 1, activation: 'sigmoid', learningRate: 0.05 },
      ]);
      expect(config.training).toEqual({ threshold: 0.005, maxEpochs: 20000, learningRate: 0.3 });
      expect(config.logging.level).toBe('warn');
    });

    it('should apply defaults for omitted sections', () => {
      const config = new NetworkConfigLoader().parse('layers:\n  - { inputs: 3, outputs: 1 }\n');

      expect(config.training).toEqual({ threshold: 0.001 });
      expect(config.logging).toEqual({ level: 'info' });
      expect(config.model).toEqual({});
    });

    it('should accept JSON content', () => {
      const config = new NetworkConfigLoader().parse(
        JSON.stringify({ layers: [{ inputs: 1, outputs: 1, activation: 'relu' }] })
      );

      expect(config.layers[0].activation).toBe('relu');
    });

    it('should reject invalid YAML', () => {
      expect(() => new NetworkConfigLoader().parse('layers: [')).toThrow(ConfigLoadError);
    });
  });

  describe('environment substitution', () => {
    it('should substitute and coerce variables', () => {
      const loader = new NetworkConfigLoader({ env: { HIDDEN_UNITS: '8' } });
      const config = loader.parse(`
layers:
  - inputs: 2
    outputs: "\${HIDDEN_UNITS}"
  - inputs: 8
    outputs: 1
training:
  learningRate: "\${LEARNING_RATE:-0.25}"
`);

      expect(config.layers[0].outputs).toBe(8);
      expect(config.training.learningRate).toBe(0.25);
    });

    it('should apply the env prefix', () => {
      const loader = new NetworkConfigLoader({ env: { NN_THRESHOLD: '0.02' }, envPrefix: 'NN_' });
      const config = loader.parse(`
layers: [{ inputs: 1, outputs: 1 }]
training:
  threshold: "\${THRESHOLD}"
`);

      expect(config.training.threshold).toBe(0.02);
    });

    it('should keep numeric-looking strings in string fields', () => {
      const loader = new NetworkConfigLoader({ env: { MODEL_DIR: '2024' } });
      const config = loader.parse(`
layers: [{ inputs: 1, outputs: 1 }]
model:
  directory: "\${MODEL_DIR}"
`);

      expect(config.model.directory).toBe('2024');
    });

    it('should not read true or false as booleans', () => {
      const error = validationError(() =>
        new NetworkConfigLoader({ env: { HIDDEN: 'true' } }).parse(
          'layers: [{ inputs: 1, outputs: "${HIDDEN}" }]'
        )
      );

      expect(error.field).toBe('layers.0.outputs');
      expect(error.value).toBe('true');
    });

    it('should fail when a required variable is missing', () => {
      const loader = new NetworkConfigLoader({ env: {} });

      expect(() => loader.parse('layers: [{ inputs: "${IN}", outputs: 1 }]')).toThrow(
        "Required environment variable 'IN' not set"
      );
    });
  });

  describe('validation', () => {
    it('should name the field holding an unknown activation', () => {
      const error = validationError(() =>
        new NetworkConfigLoader().parse('layers: [{ inputs: 2, outputs: 1, activation: softmax }]')
      );

      expect(error.field).toBe('layers.0.activation');
      expect(error.value).toBe('softmax');
    });

    it('should report the expected type for a wrongly typed value', () => {
      const error = validationError(() =>
        new NetworkConfigLoader().parse('layers: [{ inputs: two, outputs: 1 }]')
      );

      expect(error.field).toBe('layers.0.inputs');
      expect(error.expectedType).toBe('number');
    });

    it('should reject layers whose sizes do not chain', () => {
      const error = validationError(() =>
        new NetworkConfigLoader().parse(`
layers:
  - { inputs: 3, outputs: 4 }
  - { inputs: 5, outputs: 2 }
`)
      );

      expect(error.field).toBe('layers.1.inputs');
      expect(error.value).toBe(5);
    });

    it('should require at least one layer', () => {
      expect(() => new NetworkConfigLoader().parse('layers: []')).toThrow(ConfigValidationError);
    });

    it('should reject unknown sections', () => {
      expect(() =>
        new NetworkConfigLoader().parse('layers: [{ inputs: 1, outputs: 1 }]\noptimizer: adam\n')
      ).toThrow(ConfigValidationError);
    });
  });

  describe('files', () => {
    let directory: string;

    beforeEach(() => {
      directory = fs.mkdtempSync(path.join(os.tmpdir(), 'perceptron-config-'));
    });

    afterEach(() => {
      fs.rmSync(directory, { recursive: true, force: true });
    });

    it('should load an explicit config path', () => {
      const configPath = path.join(directory, 'network.yaml');
      fs.writeFileSync(configPath, XOR_CONFIG);

      expect(loadNetworkConfig({ configPath }).layers).toHaveLength(2);
    });

    it('should use the first existing search path', () => {
      const second = path.join(directory, 'second.yaml');
      fs.writeFileSync(second, 'layers: [{ inputs: 5, outputs: 2 }]');

      const config = loadNetworkConfig({
        searchPaths: [path.join(directory, 'first.yaml'), second],
      });

      expect(config.layers[0].inputs).toBe(5);
    });

    it('should fail for a missing explicit path', () => {
      expect(() => loadNetworkConfig({ configPath: path.join(directory, 'nope.yaml') })).toThrow(
        ConfigLoadError
      );
    });

    it('should fail when no search path exists', () => {
      expect(() => loadNetworkConfig({ searchPaths: [path.join(directory, 'none.yaml')] })).toThrow(
        /No network config file found/
      );
    });
  });
});

describe('createPerceptron', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = Logger.silent();
  });

  it('should fill in the config-wide learning rate', () => {
    const config = new NetworkConfigLoader().parse(XOR_CONFIG);
    const network = createPerceptron(config, { logger });

    expect(network.getLayers().map((layer) => layer.config.learningRate)).toEqual([0.3, 0.05]);
    expect(network.getLayers().map((layer) => layer.config.activation)).toEqual(['tanh', 'sigmoid']);
    expect(network.inputSize).toBe(2);
    expect(network.outputSize).toBe(1);
  });

  it('should fall back to the layer default without a config-wide rate', () => {
    const config = new NetworkConfigLoader().parse('layers: [{ inputs: 2, outputs: 1 }]');

    expect(createPerceptron(config, { logger }).getLayers()[0].config.learningRate).toBe(0.1);
  });
});
