/**
 * Contact request schemas
 */

import { z } from 'zod';
import { parseIsoDate } from '@contacts-hub/utils';

const name = z.string().trim().min(1).max(50);

const birthday = z
  .string()
  .trim()
  .refine((value) => {
    const date = parseIsoDate(value);
    return date !== null && date.getTime() <= Date.now();
  }, 'Birthday must be a valid past date in YYYY-MM-DD format');

/** Body of create and full update */
export const contactBodySchema = z.object({
  firstName: name,
  lastName: name,
  email: z.string().trim().toLowerCase().email().max(254),
  phone: z.string().trim().max(30).nullish(),
  birthday,
  notes: z.string().max(250).nullish(),
});

export const contactIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const listContactsQuerySchema = z.object({
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

const term = z.string().trim().min(1).max(254);

export const firstNameParamsSchema = z.object({ first_name: term });
export const lastNameParamsSchema = z.object({ last_name: term });
export const emailParamsSchema = z.object({ email: term });
