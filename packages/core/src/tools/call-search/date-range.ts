import { createChildLogger } from '@findr/shared/src/logger.js';
import type { GongDateRange } from './types.js';

const log = createChildLogger('call-search:date-range');

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;
const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Gong filters take full ISO-8601 timestamps. Timestamps pass through,
 * bare dates become midnight UTC, anything else is dropped.
 */
export function normalizeDate(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  if (ISO_TIMESTAMP.test(value)) {
    return value;
  }
  if (CALENDAR_DATE.test(value)) {
    return `${value}T00:00:00Z`;
  }

  log.warn({ value }, 'Ignoring unrecognized date');
  return undefined;
}

export function buildDateRange(
  fromDate: string | undefined,
  toDate: string | undefined,
): GongDateRange | undefined {
  const from = normalizeDate(fromDate);
  const to = normalizeDate(toDate);

  if (from === undefined && to === undefined) {
    return undefined;
  }
  return {
    ...(from !== undefined ? { from } : {}),
    ...(to !== undefined ? { to } : {}),
  };
}
