/**
 * Deployment prefix handling.
 *
 * The prefix scopes one declaration to an environment: "DEV_" turns package
 * "Orders" into "DEV_Orders" and artifact "Flow1" into "DEV_Flow1".
 */

import { ValidationError } from './errors.js';

const PREFIX_PATTERN = /^[A-Za-z0-9_]*$/;

/**
 * Throws ValidationError unless the prefix is empty or made of letters,
 * digits and underscores.
 */
export function validateDeploymentPrefix(prefix: string): void {
  if (!PREFIX_PATTERN.test(prefix)) {
    throw new ValidationError(
      `Invalid deployment prefix '${prefix}': only letters, digits and underscores are allowed`
    );
  }
}

/**
 * Id used for every remote call. Identity when the prefix is empty.
 */
export function applyPrefix(prefix: string, id: string): string {
  return prefix ? `${prefix}${id}` : id;
}
