import { z } from 'zod';
import { Ulid } from './ulid.js';

export const UlidStringSchema = z
  .string()
  .length(26)
  .regex(/^[0-7][0-9A-HJKMNP-TV-Z]{25}$/i, 'Invalid ULID');

export const UlidSchema = UlidStringSchema.transform((s) => Ulid.parse(s));

export type UlidString = z.infer<typeof UlidStringSchema>;
