/**
 * Artifact integrity Command Definitions
 */

import { z } from 'zod';
import { outputFormatSchema } from './models.js';

export const artifactsVerifySchema = z.object({
  format: outputFormatSchema,
});
