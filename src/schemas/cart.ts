import { z } from 'zod';
import { MAX_QUANTITY } from '../lib/money.js';
import { primaryKey, wholeNumber } from '../lib/validation.js';

// Client-supplied price, unit_price and user are stripped along with any other extra keys
export const addToCartBody = z.object({
  menuitem: primaryKey,
  quantity: wholeNumber.pipe(
    z
      .number()
      .min(1, 'Ensure this value is greater than or equal to 1.')
      .max(MAX_QUANTITY, 'Quantity cannot exceed 32,767.')
  ),
});

export type AddToCartBody = z.output<typeof addToCartBody>;
