import CliError from './cli-error';

export default class ValidationFailedError extends CliError {
  readonly violations: string[];

  constructor(violations: string[]) {
    super();
    this.name = 'validation_failed';
    this.violations = violations;
    const listified_violations = violations.map((violation) => `  - ${violation}`).join('\n');
    this.message = `validation failed:\n${listified_violations}`;
  }
}
