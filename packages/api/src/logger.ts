/**
 * API Package Logger
 */

import { createPackageLogger } from '@modelvault/utils';

export const logger = createPackageLogger('@modelvault/api');
