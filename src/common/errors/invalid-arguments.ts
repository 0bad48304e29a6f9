import CliError from './cli-error';

export default class InvalidArgumentsError extends CliError {
  constructor(detail: string) {
    super();
    this.name = 'invalid_arguments';
    this.message = `invalid arguments: ${detail}`;
  }
}
