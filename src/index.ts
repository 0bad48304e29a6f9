export { run } from '@oclif/core';
export { default as LaunchUtils, DEBUGGING_ENDPOINT } from './antithesis/launch/launch.utils';
export type { LaunchResult } from './antithesis/launch/launch.utils';
export { default as AppConfig } from './app-config/config';
export type { AppConfigOptions } from './app-config/config';
export { default as AppService } from './app-config/service';
export { default as ApiError } from './common/errors/api-error';
export { default as CliError } from './common/errors/cli-error';
export { default as InvalidArgumentsError } from './common/errors/invalid-arguments';
export { default as MissingConfigError } from './common/errors/missing-config';
export { default as TransportFailureError } from './common/errors/transport-failure';
export { default as ValidationFailedError } from './common/errors/validation-failed';
export type { Dictionary } from './common/utils/dictionary';
export * from './params';
