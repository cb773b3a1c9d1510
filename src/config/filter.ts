export interface FilterConfig {
  modelPath: string;
  rangeVariable: string;
  maxModelBytes: number;
}

const DEFAULT_MAX_MODEL_BYTES = 1024 * 1024;

/**
 * Settings for the parse-filter entry point. A `modelPath` passed in
 * (e.g. from `--model`) takes precedence over ODATA_FILTER_MODEL_PATH.
 */
export function loadFilterConfig(overrides: { modelPath?: string } = {}): FilterConfig {
  const modelPath = overrides.modelPath?.trim() || process.env.ODATA_FILTER_MODEL_PATH?.trim();

  if (!modelPath) {
    throw new Error(
      'ODATA_FILTER_MODEL_PATH is required. Point it at a JSON model document like: ' +
        'tests/fixtures/customer-model.json (or pass --model)'
    );
  }

  const rangeVariable = process.env.ODATA_FILTER_RANGE_VARIABLE?.trim() || '$it';
  if (!/^\$[A-Za-z_][A-Za-z0-9_]*$/.test(rangeVariable)) {
    throw new Error(
      `ODATA_FILTER_RANGE_VARIABLE must start with "$" followed by an identifier, got "${rangeVariable}"`
    );
  }

  const rawMax = process.env.ODATA_FILTER_MAX_MODEL_BYTES?.trim();
  const parsedMax = rawMax ? parseInt(rawMax, 10) : NaN;
  const maxModelBytes = isNaN(parsedMax) || parsedMax <= 0 ? DEFAULT_MAX_MODEL_BYTES : parsedMax;

  return {
    modelPath,
    rangeVariable,
    maxModelBytes,
  };
}
