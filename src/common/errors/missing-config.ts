import CliError from './cli-error';

export default class MissingConfigError extends CliError {
  readonly variable: string;

  constructor(variable: string, reason?: string) {
    super();
    this.name = 'missing_config';
    this.variable = variable;
    this.message = reason ?
      `invalid environment variable ${variable}: ${reason}` :
      `missing environment variable: ${variable}`;
  }
}
