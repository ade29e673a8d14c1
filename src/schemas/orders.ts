import { z } from 'zod';
import { ORDER_STATUS } from '../types/domain.js';
import { primaryKey, wholeNumber } from '../lib/validation.js';

export const updateOrderBody = z
  .object({
    delivery_crew: primaryKey.optional(),
    status: wholeNumber
      .refine((value) => value === ORDER_STATUS.delivered, {
        message: 'Only status 1 (delivered) can be set.',
      })
      .transform(() => ORDER_STATUS.delivered)
      .optional(),
  })
  .strict()
  .refine((body) => body.delivery_crew !== undefined || body.status !== undefined, {
    message: 'Provide delivery_crew and/or status.',
  });

export type UpdateOrderBody = z.output<typeof updateOrderBody>;
