export { parseArgs } from './args';
export { parseJSONParams } from './json';
export { isMomentFormat, MOMENT_KEYS, parseMoment } from './moment';
export { default as ParameterSet, isSensitiveKey, REDACTED } from './parameter-set';
export type { IntegrationBlock, ParameterValue } from './parameter-set';
export { DEBUGGING_PARAMS_SCHEMA, declaredKeys, PROFILE_SCHEMAS, TEST_PARAMS_SCHEMA } from './schema/profiles';
export type { ProfileName } from './schema/profiles';
export { mapAjvErrors, validateOrRejectParams, validateParams } from './schema/validator';
