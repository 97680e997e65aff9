import { z } from 'zod';

// Shared request schemas. Dates and odometer readings are passed through as
// given; the domain parses them and answers with its own validation errors.

export const idSchema = z.coerce.number().int().positive();

export const odometerSchema = z.union([z.number(), z.string()]);

export const monthQuerySchema = z.object({
  year: z.coerce.number().int(),
  month: z.coerce.number().int(),
  vehicleId: idSchema.optional(),
});
