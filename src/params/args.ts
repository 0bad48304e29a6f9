import InvalidArgumentsError from '../common/errors/invalid-arguments';
import ParameterSet from './parameter-set';

const KEY_PREFIX = '--';

/**
 * Parse `--key value` pairs. Values are stored verbatim, even when they look like flags.
 */
export const parseArgs = (args: string[]): ParameterSet => {
  const params = new ParameterSet();

  for (let index = 0; index < args.length; index++) {
    const arg = args[index];
    if (!arg.startsWith(KEY_PREFIX)) {
      throw new InvalidArgumentsError(`unexpected argument: ${arg}`);
    }

    const key = arg.slice(KEY_PREFIX.length);
    if (!key) {
      throw new InvalidArgumentsError(`empty key after ${KEY_PREFIX}`);
    }

    if (index + 1 >= args.length) {
      throw new InvalidArgumentsError(`missing value for ${arg}`);
    }

    index += 1;
    params.set(key, args[index]);
  }

  return params;
};
