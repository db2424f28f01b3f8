/**
 * Thrown when sink options or environment variables fail validation.
 * `issues` holds one human-readable line per problem.
 */
export class SinkConfigurationError extends Error {
  public readonly issues: string[];

  constructor(issues: string[], message: string = 'Invalid Slack sink configuration') {
    super(`${message}: ${issues.join('; ')}`);
    this.name = 'SinkConfigurationError';
    this.issues = issues;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SinkConfigurationError);
    }
  }
}
