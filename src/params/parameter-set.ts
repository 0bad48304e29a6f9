import InvalidArgumentsError from '../common/errors/invalid-arguments';
import type { Dictionary } from '../common/utils/dictionary';

export type IntegrationBlock = Dictionary<string>;
export type ParameterValue = string | IntegrationBlock;

export const REDACTED = '[REDACTED]';

const SENSITIVE_SUFFIXES = ['.token'];
const SENSITIVE_KEYS = ['antithesis.report.recipients'];

// <namespace>.integrations.<provider>.<field>
const INTEGRATION_KEY_REGEX = /^([^.]+\.integrations\.[^.]+)\.([^.]+)$/;

export const isSensitiveKey = (key: string): boolean => {
  return SENSITIVE_SUFFIXES.some((suffix) => key.endsWith(suffix)) || SENSITIVE_KEYS.includes(key);
};

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const toStringValue = (key: string, value: unknown): string => {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' && Number.isInteger(value) && !Number.isSafeInteger(value)) {
    throw new InvalidArgumentsError(`${key} is too large to represent exactly; quote it as a string`);
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  throw new InvalidArgumentsError(`unsupported value for ${key}: expected a string, number or boolean`);
};

const cloneValue = (value: ParameterValue): ParameterValue => {
  return typeof value === 'string' ? value : { ...value };
};

/**
 * Parameters collected for a single launch, keyed by their dotted name.
 *
 * Scalar leaves are always strings; typing is enforced by the schema profiles.
 * Keys of the form `<namespace>.integrations.<provider>.<field>` are grouped into an
 * {@link IntegrationBlock} stored under `<namespace>.integrations.<provider>`.
 */
export default class ParameterSet {
  private readonly values = new Map<string, ParameterValue>();

  /**
   * Build a parameter set from a decoded JSON object. Numbers and booleans are stored as
   * their string form, objects one level deep are kept as blocks.
   */
  static fromJSON(value: unknown): ParameterSet {
    if (!isPlainObject(value)) {
      throw new InvalidArgumentsError('expected JSON object');
    }

    const params = new ParameterSet();
    for (const [key, entry] of Object.entries(value)) {
      if (isPlainObject(entry)) {
        const block: IntegrationBlock = Object.fromEntries(
          Object.entries(entry).map(([field, field_value]): [string, string] => [field, toStringValue(`${key}.${field}`, field_value)]),
        );
        params.setBlock(key, block);
      } else {
        params.set(key, toStringValue(key, entry));
      }
    }
    return params;
  }

  get size(): number {
    return this.values.size;
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get(key: string): ParameterValue | undefined {
    const value = this.values.get(key);
    return value === undefined ? undefined : cloneValue(value);
  }

  set(key: string, value: string): this {
    const match = INTEGRATION_KEY_REGEX.exec(key);
    if (!match) {
      this.values.set(key, value);
      return this;
    }

    const [, block_key, field] = match;
    const existing = this.values.get(block_key);
    if (typeof existing === 'string') {
      throw new InvalidArgumentsError(`conflicting values for ${block_key}: cannot set ${key} on a plain value`);
    }
    this.values.set(block_key, { ...existing, [field]: value });
    return this;
  }

  setBlock(key: string, block: IntegrationBlock): this {
    this.values.set(key, { ...block });
    return this;
  }

  /**
   * Copy every entry of the overlay into this set. Overlay values replace existing ones
   * wholesale, blocks included.
   */
  merge(overlay: ParameterSet): this {
    for (const [key, value] of overlay.values) {
      this.values.set(key, cloneValue(value));
    }
    return this;
  }

  /**
   * Copy of this set with sensitive values masked. For display only.
   */
  redact(): ParameterSet {
    const redacted = new ParameterSet();
    for (const [key, value] of this.values) {
      if (isSensitiveKey(key)) {
        redacted.values.set(key, REDACTED);
      } else if (typeof value === 'string') {
        redacted.values.set(key, value);
      } else {
        const block: IntegrationBlock = Object.fromEntries(
          Object.entries(value).map(([field, field_value]): [string, string] => [field, isSensitiveKey(`${key}.${field}`) ? REDACTED : field_value]),
        );
        redacted.values.set(key, block);
      }
    }
    return redacted;
  }

  toWireValue(): Dictionary<ParameterValue> {
    return Object.fromEntries([...this.values].map(([key, value]): [string, ParameterValue] => [key, cloneValue(value)]));
  }

  toJSON(): Dictionary<ParameterValue> {
    return this.toWireValue();
  }
}
