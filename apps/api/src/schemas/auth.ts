/**
 * Auth request schemas
 */

import { z } from 'zod';

const email = z.string().trim().toLowerCase().email().max(254);

export const signupSchema = z.object({
  username: z.string().trim().min(2).max(50),
  email,
  // bcrypt only reads the first 72 bytes
  password: z.string().min(6).max(72),
});

export const loginSchema = z.object({
  email,
  password: z.string().min(1),
});

export const refreshSchema = z.object({
  refreshToken: z.string().min(1),
});
