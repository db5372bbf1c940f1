import chalk from 'chalk';

import {
  AcmeError,
  AuthenticationError,
  ChallengeValidationFailedError,
  CleanupIncompleteError,
  ConfigError,
  ProviderUnavailableError,
  RateLimitedError,
  RunAbortedError,
  isErrorLike,
} from '../../lib/index.js';

/** Central error handler for CLI commands */
export function handleError(error: unknown): void {
  if (error instanceof ConfigError) {
    console.error('\n' + chalk.yellow('Configuration error'));
    error.issues.forEach((issue) => console.error('  - ' + issue));
  } else if (error instanceof AuthenticationError) {
    console.error('\n' + chalk.yellow('OVH rejected the API credentials'));
    console.error(error.message);
    console.error('Check the application key, secret and consumer key, and the rights on /domain/zone/*');
  } else if (error instanceof ProviderUnavailableError) {
    console.error('\n' + chalk.yellow('OVH API unavailable'));
    console.error(error.message);
    console.error('Try again later.');
  } else if (error instanceof ChallengeValidationFailedError) {
    console.error(chalk.red('Error:'), 'challenge validation failed');
    error.failures.forEach(({ domain, reason }) => console.error(`  - ${domain}: ${reason}`));
  } else if (error instanceof CleanupIncompleteError) {
    console.error(chalk.red('Error:'), error.message);
    error.leftover.forEach((record) =>
      console.error(`  - ${record.recordName} (zone ${record.recordId.zone}, id ${record.recordId.id})`),
    );
    console.error(chalk.gray('Remove them with: acme-dns01-ovh cleanup'));
  } else if (error instanceof RunAbortedError) {
    console.error(chalk.yellow('Aborted:'), error.message);
  } else if (error instanceof RateLimitedError) {
    console.error('\n' + chalk.yellow('ACME rate limit reached'));
    console.error(error.detail);
    if (error.retryAfter) {
      console.error(chalk.gray(`Retry after ${error.retryAfter.toISOString()}`));
    }
  } else if (error instanceof AcmeError) {
    console.error(chalk.red('ACME error:'), error.describe());
  } else if (isErrorLike(error)) {
    console.error(chalk.red('Error:'), error.message);
  } else {
    console.error('Unknown error:', error);
  }
}
