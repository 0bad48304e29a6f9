import CliError from './cli-error';

export default class ApiError extends CliError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super();
    this.name = 'api_error';
    this.status = status;
    this.body = body;
    this.message = `API error: ${status} - ${body}`;
  }
}
