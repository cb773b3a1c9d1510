import { describe, it, expect, beforeEach, afterAll } from '@jest/globals';
import { loadFilterConfig } from '../filter.js';

describe('loadFilterConfig', () => {
  // Capture original env at module load to avoid mutation issues
  const ORIGINAL_ENV = { ...process.env };

  beforeEach(() => {
    process.env = { ...ORIGINAL_ENV };
    delete process.env.ODATA_FILTER_MODEL_PATH;
    delete process.env.ODATA_FILTER_RANGE_VARIABLE;
    delete process.env.ODATA_FILTER_MAX_MODEL_BYTES;
  });

  afterAll(() => {
    process.env = ORIGINAL_ENV;
  });

  it('should throw when no model path is configured', () => {
    expect(() => loadFilterConfig()).toThrow('ODATA_FILTER_MODEL_PATH is required');
  });

  it('should read the model path from the environment with defaults for the rest', () => {
    process.env.ODATA_FILTER_MODEL_PATH = ' models/sample.json ';

    expect(loadFilterConfig()).toEqual({
      modelPath: 'models/sample.json',
      rangeVariable: '$it',
      maxModelBytes: 1024 * 1024,
    });
  });

  it('should prefer an explicit model path over the environment', () => {
    process.env.ODATA_FILTER_MODEL_PATH = 'from-env.json';

    expect(loadFilterConfig({ modelPath: 'from-flag.json' }).modelPath).toBe('from-flag.json');
  });

  it('should accept a custom range variable name', () => {
    process.env.ODATA_FILTER_MODEL_PATH = 'model.json';
    process.env.ODATA_FILTER_RANGE_VARIABLE = '$row';

    expect(loadFilterConfig().rangeVariable).toBe('$row');
  });

  it('should reject a range variable without the $ prefix', () => {
    process.env.ODATA_FILTER_MODEL_PATH = 'model.json';
    process.env.ODATA_FILTER_RANGE_VARIABLE = 'row';

    expect(() => loadFilterConfig()).toThrow(
      'ODATA_FILTER_RANGE_VARIABLE must start with "$" followed by an identifier, got "row"'
    );
  });

  it('should parse the model size limit and ignore invalid values', () => {
    process.env.ODATA_FILTER_MODEL_PATH = 'model.json';
    process.env.ODATA_FILTER_MAX_MODEL_BYTES = '2048';
    expect(loadFilterConfig().maxModelBytes).toBe(2048);

    process.env.ODATA_FILTER_MAX_MODEL_BYTES = 'lots';
    expect(loadFilterConfig().maxModelBytes).toBe(1024 * 1024);
  });
});
