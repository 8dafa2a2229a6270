/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Users module.
 * - Prevents invalid payloads from reaching the service.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Query values arrive as strings: coerce, then require integers.
 */

import { z } from 'zod';

export const createUserSchema = z.object({
  email: z.string({ required_error: 'Email is required' }).email('Invalid email format'),
  password: z
    .string({ required_error: 'Password is required' })
    .min(6, 'Password must be at least 6 characters'),
});

export const listUsersQuerySchema = z.object({
  page: z.coerce.number().int('Page must be an integer').optional(),
  limit: z.coerce.number().int('Limit must be an integer').optional(),
});

export const userIdParamsSchema = z.object({
  id: z.string().uuid('Invalid user id'),
});
