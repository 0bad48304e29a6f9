import type { SchemaObject } from 'ajv';

export type ProfileName = 'testParams' | 'debuggingParams';

export const INTEGRATION_KEY_PATTERN = '^antithesis\\.integrations\\.[A-Za-z0-9_-]+$';

const NON_EMPTY_STRING = {
  type: 'string',
  minLength: 1,
  errorMessage: 'must be a non-empty string',
};

const INTEGRATION_SCHEMA = {
  type: 'object',
  properties: {
    callback_url: {
      type: 'string',
      format: 'uri',
      errorMessage: 'must be an absolute URL',
    },
  },
  additionalProperties: { type: 'string' },
};

// Keys matching these patterns are accepted by every profile
const ALWAYS_ALLOWED = {
  [INTEGRATION_KEY_PATTERN]: INTEGRATION_SCHEMA,
};

const REPORT_RECIPIENTS = {
  ...NON_EMPTY_STRING,
  description: 'Semicolon separated list of email addresses to send the report to',
};

/**
 * Parameters accepted by `/launch/<webhook>`. Keys outside the declared set are
 * passed through as custom metadata.
 */
export const TEST_PARAMS_SCHEMA: SchemaObject = {
  type: 'object',
  required: ['antithesis.duration'],
  properties: {
    'antithesis.duration': {
      type: 'string',
      pattern: '^[0-9]+$',
      description: 'Duration of the test run in minutes',
      errorMessage: 'must be a whole number of minutes',
    },
    'antithesis.description': { type: 'string' },
    'antithesis.test_name': NON_EMPTY_STRING,
    'antithesis.config_image': NON_EMPTY_STRING,
    'antithesis.images': {
      ...NON_EMPTY_STRING,
      description: 'Semicolon separated list of images',
    },
    'antithesis.is_ephemeral': {
      type: 'string',
      enum: ['true', 'false'],
      errorMessage: 'must be "true" or "false"',
    },
    'antithesis.report.recipients': REPORT_RECIPIENTS,
    'antithesis.source': NON_EMPTY_STRING,
  },
  patternProperties: ALWAYS_ALLOWED,
  additionalProperties: true,
};

/**
 * Parameters accepted by `/launch/debugging`. Closed: anything undeclared is rejected.
 */
export const DEBUGGING_PARAMS_SCHEMA: SchemaObject = {
  type: 'object',
  required: [
    'antithesis.debugging.session_id',
    'antithesis.debugging.input_hash',
    'antithesis.debugging.vtime',
  ],
  properties: {
    'antithesis.debugging.session_id': NON_EMPTY_STRING,
    'antithesis.debugging.input_hash': NON_EMPTY_STRING,
    'antithesis.debugging.vtime': {
      type: 'string',
      pattern: '^[0-9]+(\\.[0-9]+)?$',
      description: 'Virtual time of the moment to debug',
      errorMessage: 'must be a non-negative decimal number',
    },
    'antithesis.report.recipients': REPORT_RECIPIENTS,
  },
  patternProperties: ALWAYS_ALLOWED,
  additionalProperties: false,
};

export const PROFILE_SCHEMAS: Record<ProfileName, SchemaObject> = {
  testParams: TEST_PARAMS_SCHEMA,
  debuggingParams: DEBUGGING_PARAMS_SCHEMA,
};

export const declaredKeys = (profile: ProfileName): string[] => {
  return Object.keys(PROFILE_SCHEMAS[profile].properties || {});
};
