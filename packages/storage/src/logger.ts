/**
 * Storage Package Logger
 * ======================
 * Namespaced logger for the storage package
 */

import { createPackageLogger } from '@modelvault/utils';

export const logger = createPackageLogger('@modelvault/storage');
