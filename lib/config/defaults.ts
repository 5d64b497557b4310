/**
 * @format
 * Default Configuration Values
 *
 * Centralized defaults for the instance lookup pipeline and CLI.
 * Uses UPPER_CASE for global constants.
 */

import type { InstanceStateName } from '@aws-sdk/client-ec2';

// =============================================================================
// Global Constants - Immutable compile-time values
// =============================================================================

/** Region queried when no region is given */
export const DEFAULT_REGION = 'ap-southeast-2';

/** Tag holding the human-assigned instance name */
export const NAME_TAG_KEY = 'Name';

/**
 * Lifecycle states considered actionable.
 * Terminated instances are never returned.
 */
export const ACTIVE_INSTANCE_STATES: readonly InstanceStateName[] = [
    'running',
    'stopped',
    'stopping',
    'pending',
    'shutting-down',
];

/** Marker for volume fields that do not apply to a volume type */
export const NOT_APPLICABLE = 'N/A';

/** Directory for JSON reports when no output path is given */
export const DEFAULT_OUTPUT_DIR = 'output';

/** Platform shown when the provider reports none */
export const DEFAULT_PLATFORM = 'Linux/Unix';
