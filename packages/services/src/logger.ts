/**
 * Services Package Logger
 * =======================
 * Namespaced logger for the registry engine
 */

import { createPackageLogger } from '@modelvault/utils';

export const logger = createPackageLogger('@modelvault/services');
