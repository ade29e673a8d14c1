import { z } from 'zod';
import { MAX_AMOUNT_CENTS, formatAmount, parseAmount } from '../lib/money.js';
import { REQUIRED_MESSAGE, primaryKey } from '../lib/validation.js';

const text = (max: number) =>
  z
    .string({ required_error: REQUIRED_MESSAGE, invalid_type_error: 'Not a valid string.' })
    .trim()
    .min(1, 'This field may not be blank.')
    .max(max, `Ensure this field has no more than ${max} characters.`);

const slug = text(50).regex(
  /^[-a-zA-Z0-9_]+$/,
  'Enter a valid "slug" consisting of letters, numbers, underscores or hyphens.'
);

export const createCategoryBody = z.object({ slug, title: text(255) });
export const updateCategoryBody = createCategoryBody.partial();

/** Decimal with at most two places in 0.00..9999.99, as a number or a string. */
export const price = z.unknown().transform((value, ctx): number => {
  if (value === undefined || value === null || value === '') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: REQUIRED_MESSAGE });
    return z.NEVER;
  }
  const cents = parseAmount(value);
  if (cents === null) {
    const looksNumeric = (typeof value === 'number' && Number.isFinite(value)) ||
      (typeof value === 'string' && /^\s*-?\d+(\.\d+)?\s*$/.test(value));
    let message = 'A valid number is required.';
    if (looksNumeric && Number(value) < 0) message = 'Ensure this value is greater than or equal to 0.';
    else if (looksNumeric) message = 'Ensure that there are no more than 2 decimal places.';
    ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    return z.NEVER;
  }
  if (cents > MAX_AMOUNT_CENTS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Ensure this value is less than or equal to ${formatAmount(MAX_AMOUNT_CENTS)}.`,
    });
    return z.NEVER;
  }
  return cents;
});

const featured = z.boolean({ invalid_type_error: 'Must be a valid boolean.' });

const menuItemFields = {
  title: text(255),
  price,
  featured,
  category_id: primaryKey,
};

export const createMenuItemBody = z.object({ ...menuItemFields, featured: featured.default(false) });
export const updateMenuItemBody = z.object(menuItemFields).partial();

export type CreateMenuItemBody = z.output<typeof createMenuItemBody>;
export type UpdateMenuItemBody = z.output<typeof updateMenuItemBody>;
