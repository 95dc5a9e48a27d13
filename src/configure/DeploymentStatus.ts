/**
 * Mapping of remote runtime status strings to the states the poll loop acts on.
 */

import type { RuntimeStatus } from './capabilities.js';

/** Version reported for an artifact that has no runtime yet */
export const NOT_DEPLOYED_VERSION = 'NOT_DEPLOYED';

export type PolledState =
  | { kind: 'not-yet-visible' }
  | { kind: 'starting' }
  | { kind: 'started' }
  | { kind: 'failed'; status: string };

export function classifyRuntimeStatus(runtime: RuntimeStatus): PolledState {
  if (runtime.version === NOT_DEPLOYED_VERSION) {
    return { kind: 'not-yet-visible' };
  }
  switch (runtime.status) {
    case 'STARTED':
      return { kind: 'started' };
    case 'STARTING':
      return { kind: 'starting' };
    default:
      return { kind: 'failed', status: runtime.status };
  }
}
