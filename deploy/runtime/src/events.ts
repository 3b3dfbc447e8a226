/**
 * Runtime event sink: every license event becomes one structured log line
 * and one counter increment.
 */

import type { AdminEvent, LicenseEventSink, ValidationEvent } from '../../../api/src/index.js';
import { logger } from './logger.js';
import { incAdminAction, incValidation } from './metrics.js';

export function createEventSink(): LicenseEventSink {
  return {
    validation(event: ValidationEvent): void {
      incValidation(event.decision);
      const level = event.decision === 'storage_unavailable' ? 'warn' : 'info';
      logger.event(level, 'license.validation', { ...event });
    },
    admin(event: AdminEvent): void {
      incAdminAction(event.action);
      logger.event('info', 'license.admin', { ...event });
    },
  };
}
