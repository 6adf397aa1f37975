import { z } from 'zod';
import { MAX_CHAT_MESSAGE_LENGTH } from '../../config/constants';
import { parseAmountCents } from '../expense/materializer';

/**
 * Amount typed by the user, converted to integer cents
 */
export const AmountSchema = z
  .string()
  .trim()
  .regex(/^\d+(?:\.\d{1,2})?$/, 'Must be a valid amount (e.g., 100 or 99.99)')
  .refine((val) => /[1-9]/.test(val), 'Amount must be greater than 0')
  .transform((val) => parseAmountCents(val))
  .refine((val) => val <= 99999999n, 'Amount too large (max 999999.99)');

/**
 * Expense description typed by the user
 */
export const ExpenseDescriptionSchema = z
  .string()
  .trim()
  .min(1, 'Description required')
  .max(200, 'Description too long');

/**
 * Calendar date, e.g. "2026-10-18"
 */
export const DateSchema = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Dates look like 2026-10-18')
  .refine((val) => {
    const parsed = new Date(`${val}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(val);
  }, 'Not a real date');

/**
 * Category name validation
 */
export const CategoryNameSchema = z
  .string()
  .trim()
  .min(1, 'Category name required')
  .max(100, 'Category name too long');

/**
 * Material Symbol icon name, e.g. "local_gas_station"
 */
export const IconSchema = z
  .string()
  .trim()
  .regex(/^[a-z0-9_]+$/, 'Icon must be a Material Symbol name like "shopping_cart"')
  .max(100, 'Icon name too long');

/**
 * Group name validation
 */
export const GroupNameSchema = z
  .string()
  .trim()
  .min(1, 'Group name required')
  .max(200, 'Group name too long');

export const GroupDescriptionSchema = z
  .string()
  .trim()
  .max(500, 'Group description too long');

/**
 * Free-text chat message sent to the AI parser
 */
export const ChatMessageSchema = z
  .string()
  .trim()
  .min(1, 'Message is empty')
  .max(MAX_CHAT_MESSAGE_LENGTH, `Message too long (max ${MAX_CHAT_MESSAGE_LENGTH} characters)`);

/**
 * Manual entry: "<amount> <description>"
 */
export const ManualEntrySchema = z
  .string()
  .trim()
  .regex(/^\d+(?:\.\d{1,2})?\s+\S.*$/, 'Format: "20 coffee" or "15.50 gas"')
  .transform((val) => {
    const [amount, ...rest] = val.split(/\s+/);
    return { amount, description: rest.join(' ') };
  });

/**
 * Validate and parse user input safely
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: string): { valid: true; data: T } | { valid: false; error: string } {
  const result = schema.safeParse(input);
  if (result.success) {
    return { valid: true, data: result.data };
  }
  return { valid: false, error: result.error.errors[0]?.message || 'Invalid input' };
}
