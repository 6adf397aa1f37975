import { z } from 'zod';
import { MAX_STORED_AMOUNT_CENTS } from '../../config/constants';
import type { ParsedExpenseItem } from '../../types/expense';
import { ParseError } from '../expense/errors';
import { parseAmountCents } from '../expense/materializer';

const AMOUNT_PATTERN = /^\d+(?:\.\d{1,2})?$/;

const optionalName = z
  .string()
  .nullish()
  .transform((val) => {
    const trimmed = val?.trim();
    return trimmed ? trimmed : undefined;
  });

const amountSchema = z
  .union([z.string(), z.number()])
  .transform((val) => String(val).replace(/,/g, '').trim())
  .refine((val) => AMOUNT_PATTERN.test(val), 'amount must be a number with at most two decimals')
  .refine((val) => /[1-9]/.test(val), 'amount must be greater than 0')
  // zod keeps running refinements after a failed one, so only convert values that passed
  .refine(
    (val) => !AMOUNT_PATTERN.test(val) || !/[1-9]/.test(val) || parseAmountCents(val) <= MAX_STORED_AMOUNT_CENTS,
    'amount is too large to store',
  );

const flagSchema = z
  .union([z.boolean(), z.enum(['true', 'false'])])
  .nullish()
  .transform((val) => val === true || val === 'true');

const expenseItemSchema = z
  .object({
    amount: amountSchema,
    description: z.string().nullish().transform((val) => val?.trim() ?? ''),
    category_name: optionalName,
    group_name: optionalName,
    is_new_category: flagSchema,
    suggested_icon: optionalName,
  })
  .transform((raw): ParsedExpenseItem => ({
    amount: raw.amount,
    description: raw.description,
    categoryName: raw.category_name,
    groupName: raw.group_name,
    isNewCategory: raw.is_new_category,
    suggestedIcon: raw.suggested_icon,
  }));

const expenseResponseSchema = z.object({
  expenses: z.array(expenseItemSchema),
});

/**
 * Remove a markdown code fence around the model output, if present.
 */
export function stripCodeFence(text: string): string {
  return text
    .trim()
    .replace(/^```(?:json)?/i, '')
    .replace(/```$/, '')
    .trim();
}

/**
 * Parse raw model output into expense items. Throws ParseError (with the raw
 * text attached) on non-JSON output or on any item that does not fit the
 * expected shape; an empty `expenses` list is returned as-is.
 */
export function parseExpenseResponse(rawText: string): ParsedExpenseItem[] {
  const cleaned = stripCodeFence(rawText);

  let document: unknown;
  try {
    document = JSON.parse(cleaned);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Failed to parse AI response as JSON: ${reason}`, rawText, { cause: error });
  }

  const result = expenseResponseSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.errors[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ParseError(
      `Invalid response format from AI (${where}${issue?.message ?? 'unexpected shape'})`,
      rawText,
      { cause: result.error },
    );
  }

  return result.data.expenses;
}
