import { z } from 'zod';
import { REQUIRED_MESSAGE } from '../lib/validation.js';

export const registerBody = z.object({
  username: z
    .string({ required_error: REQUIRED_MESSAGE, invalid_type_error: 'Not a valid string.' })
    .trim()
    .min(1, 'This field may not be blank.')
    .max(150, 'Ensure this field has no more than 150 characters.')
    .regex(/^[\w.@+-]+$/, 'Enter a valid username. This value may contain only letters, numbers, and @/./+/-/_ characters.'),
});

export const groupMemberBody = z.object({
  username: z
    .string({ required_error: REQUIRED_MESSAGE, invalid_type_error: 'Not a valid string.' })
    .trim()
    .min(1, 'This field may not be blank.'),
});
