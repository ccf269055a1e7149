import { z } from 'zod';
import { AliasNameSchema } from '@modelvault/core';
import { outputFormatSchema } from './models.js';

export const aliasesResolveSchema = z.object({
  name: AliasNameSchema,
  format: outputFormatSchema,
});
