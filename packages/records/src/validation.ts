import type { z } from 'zod';
import { DenominationsSchema, MoneyValueError } from '@wizmoney/core';

/**
 * Zod schema for a plain money record
 * Unknown keys are stripped so a record never carries more than its three counts
 */
export const MoneyRecordSchema = DenominationsSchema;

export type MoneyRecord = z.infer<typeof MoneyRecordSchema>;

/**
 * Validate a money record
 * Throws MoneyValueError listing each zod issue when validation fails
 */
export function validateMoneyRecord(input: unknown): MoneyRecord {
  const result = MoneyRecordSchema.safeParse(input);
  if (!result.success) {
    throw new MoneyValueError('Invalid money record', {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return result.data;
}

/**
 * Safe validation of a money record
 * Returns a zod result instead of throwing
 */
export function safeValidateMoneyRecord(input: unknown): ReturnType<typeof MoneyRecordSchema.safeParse> {
  return MoneyRecordSchema.safeParse(input);
}
