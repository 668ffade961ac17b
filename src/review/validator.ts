/**
 * Response Validator
 *
 * Checks the shape of a review API reply before any field is trusted.
 * Individual homework entries are left to the formatter.
 */

import { describeType, fail, isRecord, ok, type Result } from './types.js';

const REQUIRED_KEYS = ['homeworks', 'current_date'] as const;

export function validateResponse(response: unknown): Result<unknown[]> {
  if (!isRecord(response)) {
    const observedType = describeType(response);
    return fail({
      kind: 'InvalidResponse',
      message: `API response is not an object: got ${observedType}`,
      observedType,
    });
  }

  const missingKeys = REQUIRED_KEYS.filter((key) => !(key in response));
  if (missingKeys.length > 0) {
    return fail({
      kind: 'InvalidResponse',
      message: `API response is missing keys: ${missingKeys.join(', ')}`,
      missingKeys,
    });
  }

  const homeworks = response.homeworks;
  if (!Array.isArray(homeworks)) {
    const observedType = describeType(homeworks);
    return fail({
      kind: 'InvalidResponse',
      message: `API response field "homeworks" is not a list: got ${observedType}`,
      observedType,
    });
  }

  return ok(homeworks);
}
