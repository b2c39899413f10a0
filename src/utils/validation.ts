import { z } from 'zod';

// Shared schemas reused by the module validators

const DATE_TIME_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

/**
 * Wall-clock date parsing: "YYYY-MM-DD", "YYYY-M-D", optionally followed by
 * "HH:mm" or "HH:mm:ss". Returns null when the text is not a real date.
 */
export const parseWallClock = (text: string): Date | null => {
  const match = DATE_TIME_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }
  const [year, month, day, hour, minute, second] = match.slice(1).map(part => (part ? parseInt(part, 10) : 0));
  const date = new Date(year, month - 1, day, hour, minute, second);

  // Reject rollovers such as 2025-02-30
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
};

export const idParamSchema = z.object({
  id: z.coerce.number().int().positive('id must be a positive integer'),
});

export const paginationQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

/**
 * Calendar day, no time part
 */
export const dateOnlySchema = z
  .string()
  .regex(/^\d{4}-\d{1,2}-\d{1,2}$/, 'must be in YYYY-MM-DD format')
  .transform((value, ctx) => {
    const date = parseWallClock(value);
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'is not a valid date' });
      return z.NEVER;
    }
    return date;
  });

/**
 * Optional timestamp; blank or missing means "not set"
 */
export const optionalDateTimeSchema = z
  .string()
  .nullish()
  .transform((value, ctx) => {
    if (!value || value.trim() === '') {
      return null;
    }
    const date = parseWallClock(value);
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be in YYYY-MM-DD HH:mm format' });
      return z.NEVER;
    }
    return date;
  });
