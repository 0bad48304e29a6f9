import Joi from 'joi';
import MissingConfigError from '../common/errors/missing-config';
import type { Dictionary } from '../common/utils/dictionary';

export const HOST_SUFFIX = 'antithesis.com';
export const DEFAULT_TIMEOUT_MS = 30000;

interface ConfigEnv {
  ANTITHESIS_USERNAME: string;
  ANTITHESIS_PASSWORD: string;
  ANTITHESIS_TENANT: string;
  ANTITHESIS_BASE_URL?: string;
}

const ENV_SCHEMA = Joi.object<ConfigEnv>({
  ANTITHESIS_USERNAME: Joi
    .string()
    .required(),
  ANTITHESIS_PASSWORD: Joi
    .string()
    .required(),
  ANTITHESIS_TENANT: Joi
    .string()
    .pattern(/^[A-Za-z0-9]([A-Za-z0-9-]*[A-Za-z0-9])?$/, 'DNS label')
    .required(),
  ANTITHESIS_BASE_URL: Joi
    .string()
    .uri({ scheme: ['http', 'https'] }),
});

const MISSING_VALUE_ERRORS = ['any.required', 'string.empty'];

export interface AppConfigOptions {
  username: string;
  password: string;
  tenant: string;
  base_url?: string;
  timeout?: number;
}

export default class AppConfig {
  readonly username: string;
  readonly password: string;
  readonly tenant: string;
  readonly base_url: string;
  readonly timeout: number;

  constructor(options: AppConfigOptions) {
    this.username = options.username;
    this.password = options.password;
    this.tenant = options.tenant;
    this.base_url = (options.base_url || `https://${options.tenant}.${HOST_SUFFIX}/api/v1`).replace(/\/+$/, '');
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Read credentials from the environment. Fails on the first variable that is unset,
   * empty or malformed.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = ENV_SCHEMA.validate(env, { stripUnknown: true });
    if (result.error) {
      const [detail] = result.error.details;
      const variable = detail.context?.key || String(detail.path[0]);
      if (MISSING_VALUE_ERRORS.includes(detail.type)) {
        throw new MissingConfigError(variable);
      }
      throw new MissingConfigError(variable, detail.message);
    }

    const value = result.value;
    return new AppConfig({
      username: value.ANTITHESIS_USERNAME,
      password: value.ANTITHESIS_PASSWORD,
      tenant: value.ANTITHESIS_TENANT,
      base_url: value.ANTITHESIS_BASE_URL,
    });
  }

  toJSON(): Dictionary<string | number> {
    return {
      username: this.username,
      password: '[REDACTED]',
      tenant: this.tenant,
      base_url: this.base_url,
      timeout: this.timeout,
    };
  }
}
