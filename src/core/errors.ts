/**
 * Raised when a rate cannot limit anything: a non-positive interval or size,
 * or rate text that does not parse. Always thrown up front, at construction
 * or rate change, never from inside a transfer.
 */
export class RateConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'RateConfigError';
    this.issues = issues;
  }
}
