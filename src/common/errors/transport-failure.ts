import CliError from './cli-error';

export default class TransportFailureError extends CliError {
  constructor(detail: string) {
    super();
    this.name = 'transport_failure';
    this.message = `HTTP request failed: ${detail}`;
  }
}
