import { z } from 'zod';

/**
 * Values left out fall back to HOST and PORT from the environment
 */
export const serveSchema = z.object({
  port: z.coerce.number().int().positive().max(65535).optional(),
  host: z.string().min(1).optional(),
});
