/**
 * ID Generation Utilities
 *
 * Event ids are UUID v4 with a nanosecond suffix, fresh on every call. They
 * identify log records only; no protocol state is keyed by them.
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * @example
 * ```typescript
 * const id = generateEventId();
 * // "550e8400-e29b-41d4-a716-446655440000-1234567890123456789"
 * ```
 */
export function generateEventId(): string {
    return `${uuidv4()}-${process.hrtime.bigint()}`;
}
