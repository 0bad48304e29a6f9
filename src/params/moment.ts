import { parse } from 'acorn';
import type { CallExpression, ObjectExpression, Program, Property } from 'acorn';
import InvalidArgumentsError from '../common/errors/invalid-arguments';
import ParameterSet from './parameter-set';

// Moment.from({ session_id: "...", input_hash: "...", vtime: 329.8 }) as copied from a triage report
const MOMENT_REGEX = /^Moment\.from\s*\(\s*\{[\s\S]*\}\s*\)\s*;?$/;

export const MOMENT_KEYS = new Map<string, string>([
  ['session_id', 'antithesis.debugging.session_id'],
  ['input_hash', 'antithesis.debugging.input_hash'],
  ['vtime', 'antithesis.debugging.vtime'],
]);

const invalidMoment = (detail: string): InvalidArgumentsError => {
  return new InvalidArgumentsError(`invalid Moment.from input: ${detail}`);
};

export const isMomentFormat = (input: string): boolean => {
  return MOMENT_REGEX.test(input.trim());
};

const isMomentCallee = (callee: CallExpression['callee']): boolean => {
  return callee.type === 'MemberExpression' &&
    !callee.computed &&
    callee.object.type === 'Identifier' &&
    callee.object.name === 'Moment' &&
    callee.property.type === 'Identifier' &&
    callee.property.name === 'from';
};

const parseObjectLiteral = (input: string): ObjectExpression => {
  let program: Program;
  try {
    program = parse(input, { ecmaVersion: 2020 });
  } catch (err) {
    throw invalidMoment(err instanceof Error ? err.message : String(err));
  }

  const [statement, ...rest] = program.body;
  if (!statement || rest.length > 0 || statement.type !== 'ExpressionStatement') {
    throw invalidMoment('expected a single Moment.from(...) expression');
  }

  const call = statement.expression;
  if (call.type !== 'CallExpression' || !isMomentCallee(call.callee)) {
    throw invalidMoment('expected a single Moment.from(...) expression');
  }

  const [argument] = call.arguments;
  if (call.arguments.length !== 1 || argument.type !== 'ObjectExpression') {
    throw invalidMoment('Moment.from expects exactly one object literal');
  }
  return argument;
};

const propertyKey = (property: Property): string => {
  if (!property.computed && property.key.type === 'Identifier') {
    return property.key.name;
  }
  if (property.key.type === 'Literal' && typeof property.key.value === 'string') {
    return property.key.value;
  }
  throw invalidMoment('object keys must be identifiers or strings');
};

// Plain integers keep their source digits so long hashes survive beyond 2^53
const numberToString = (value: number, raw?: string): string => {
  return raw && /^(0|[1-9]\d*)$/.test(raw) ? raw : String(value);
};

const propertyValue = (key: string, node: Property['value']): string => {
  if (node.type === 'Literal') {
    if (typeof node.value === 'string') {
      return node.value;
    }
    if (typeof node.value === 'number') {
      return numberToString(node.value, node.raw);
    }
    if (typeof node.value === 'bigint') {
      return node.value.toString();
    }
  }
  if (node.type === 'UnaryExpression' && node.operator === '-' && node.argument.type === 'Literal' && typeof node.argument.value === 'number') {
    return `-${numberToString(node.argument.value, node.argument.raw)}`;
  }
  throw invalidMoment(`unsupported value for ${key}; expected a string or number`);
};

/**
 * Parse a `Moment.from({...})` literal into debugging parameters.
 */
export const parseMoment = (input: string): ParameterSet => {
  const object = parseObjectLiteral(input.trim());

  const params = new ParameterSet();
  for (const property of object.properties) {
    if (property.type !== 'Property' || property.kind !== 'init' || property.method || property.shorthand) {
      throw invalidMoment('only `key: value` pairs are supported');
    }

    const key = propertyKey(property);
    const param_key = MOMENT_KEYS.get(key);
    if (!param_key) {
      throw new InvalidArgumentsError(`unrecognized Moment.from key: ${key} (expected one of ${[...MOMENT_KEYS.keys()].join(', ')})`);
    }
    params.set(param_key, propertyValue(key, property.value));
  }
  return params;
};
