import axios from 'axios';
import type { AxiosInstance } from 'axios';
import os from 'os';
import ApiError from '../common/errors/api-error';
import TransportFailureError from '../common/errors/transport-failure';
import AppConfig from './config';

const responseBody = (data: unknown): string => {
  if (typeof data === 'string') {
    return data;
  }
  return data === undefined ? '' : JSON.stringify(data);
};

export default class AppService {
  config: AppConfig;
  version: string;
  api: AxiosInstance;

  static create(config: AppConfig, version: string): AppService {
    return new AppService(config, version);
  }

  constructor(config: AppConfig, version: string) {
    this.config = config;
    this.version = version;

    this.api = axios.create({
      baseURL: this.config.base_url,
      timeout: this.config.timeout,
      auth: {
        username: this.config.username,
        password: this.config.password,
      },
      // Bodies are echoed verbatim, never parsed
      responseType: 'text',
      headers: {
        'User-Agent': `snouty/${this.version} ${os.platform()} ${os.type()}/${os.release()}`,
      },
    });

    this.api.interceptors.response.use(
      res => res,
      (err: unknown) => Promise.reject(AppService.toCliError(err)),
    );
  }

  static toCliError(err: unknown): unknown {
    if (!axios.isAxiosError(err)) {
      return err;
    }
    if (err.response) {
      return new ApiError(err.response.status, responseBody(err.response.data));
    }
    return new TransportFailureError(err.message);
  }
}
