import Ajv from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import ajv_errors from 'ajv-errors';
import addFormats from 'ajv-formats';
import ValidationFailedError from '../../common/errors/validation-failed';
import { findPotentialMatch } from '../../common/utils/match';
import type ParameterSet from '../parameter-set';
import { declaredKeys, PROFILE_SCHEMAS } from './profiles';
import type { ProfileName } from './profiles';

// Near-misses only, e.g. a dropped or swapped letter
const MAX_SUGGESTION_DISTANCE = 3;

// JSON pointer (/a.b/c) -> dotted parameter key (a.b.c)
const pointerToKey = (pointer: string): string => {
  return pointer
    .split('/')
    .slice(1)
    .map((segment) => segment.replace(/~1/g, '/').replace(/~0/g, '~'))
    .join('.');
};

const joinKey = (parent: string, child: unknown): string => {
  return parent ? `${parent}.${String(child)}` : String(child);
};

export const mapAjvErrors = (profile: ProfileName, ajv_errors: ErrorObject[] | null | undefined): string[] => {
  if (!ajv_errors?.length) {
    return [];
  }

  const violations: string[] = [];
  for (const ajv_error of ajv_errors) {
    const key = pointerToKey(ajv_error.instancePath);

    if (ajv_error.keyword === 'required') {
      violations.push(`missing required property '${joinKey(key, ajv_error.params.missingProperty)}'`);
    } else if (ajv_error.keyword === 'additionalProperties') {
      const additional_key = joinKey(key, ajv_error.params.additionalProperty);
      let message = `additional property '${additional_key}' not allowed`;
      const potential_match = findPotentialMatch(additional_key, declaredKeys(profile), MAX_SUGGESTION_DISTANCE);
      if (potential_match) {
        message += ` - did you mean '${potential_match}'?`;
      }
      violations.push(message);
    } else {
      violations.push(`'${key}' ${ajv_error.message || 'is invalid'}`);
    }
  }

  return [...new Set(violations)];
};

let _ajv: Ajv | undefined;
const _cached_validators = new Map<ProfileName, ValidateFunction>();

const getValidator = (profile: ProfileName): ValidateFunction => {
  let validate = _cached_validators.get(profile);
  if (!validate) {
    if (!_ajv) {
      _ajv = new Ajv({ allErrors: true });
      addFormats(_ajv);
      // https://github.com/ajv-validator/ajv-errors
      ajv_errors(_ajv);
    }
    validate = _ajv.compile(PROFILE_SCHEMAS[profile]);
    _cached_validators.set(profile, validate);
  }
  return validate;
};

/**
 * Check parameters against a profile. Returns every violation found, or an empty list.
 */
export const validateParams = (params: ParameterSet, profile: ProfileName): string[] => {
  const validate = getValidator(profile);
  if (validate(params.toWireValue())) {
    return [];
  }
  return mapAjvErrors(profile, validate.errors);
};

export const validateOrRejectParams = (params: ParameterSet, profile: ProfileName): void => {
  const violations = validateParams(params, profile);
  if (violations.length > 0) {
    throw new ValidationFailedError(violations);
  }
};
