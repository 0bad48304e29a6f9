import JSON5 from 'json5';
import InvalidArgumentsError from '../common/errors/invalid-arguments';
import ParameterSet from './parameter-set';

/**
 * Parse a JSON object of parameters. Comments, trailing commas and the other JSON5
 * relaxations are accepted.
 */
export const parseJSONParams = (input: string): ParameterSet => {
  let value: unknown;
  try {
    value = JSON5.parse(input);
  } catch (err) {
    throw new InvalidArgumentsError(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return ParameterSet.fromJSON(value);
};
