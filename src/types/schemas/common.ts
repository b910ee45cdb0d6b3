/**
 * Common Zod schema primitives
 */

import { z } from 'zod';

/**
 * Non-empty string validator
 */
export const NonEmptyString = z.string().min(1, 'Cannot be empty');

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Non-negative integer validator
 */
export const NonNegativeInteger = z
  .number()
  .int('Must be an integer')
  .min(0, 'Must be non-negative');

/**
 * Non-negative finite number validator
 */
export const NonNegativeNumber = z.number().finite('Must be finite').min(0, 'Must be non-negative');

/**
 * Fraction in [0, 1]
 */
export const Fraction = z
  .number()
  .min(0, 'Must be at least 0')
  .max(1, 'Cannot exceed 1');

/**
 * Traffic weight / percentage (0-100)
 */
export const Percentage = z
  .number()
  .finite('Must be finite')
  .min(0, 'Must be at least 0')
  .max(100, 'Cannot exceed 100');

/**
 * Endpoint lifecycle state enum
 */
export const EndpointStateSchema = z.enum(['draft', 'canary', 'active', 'retiring'], {
  errorMap: () => ({ message: 'State must be one of: draft, canary, active, retiring' }),
});
