/**
 * Date formatting utilities for Signature V4
 */

import { ClockSourceError } from '../errors/index.js';

/**
 * Throws unless the value is a Date holding a real instant
 */
export function assertValidTimestamp(date: unknown): asserts date is Date {
  if (!(date instanceof Date) || Number.isNaN(date.getTime())) {
    throw ClockSourceError.invalidTimestamp(date);
  }
}

/**
 * Format date as YYYYMMDD
 */
export function formatDateStamp(date: Date): string {
  return formatAmzDate(date).substring(0, 8);
}

/**
 * Format date as YYYYMMDDTHHmmssZ (ISO 8601 basic format)
 */
export function formatAmzDate(date: Date): string {
  assertValidTimestamp(date);
  const year = String(date.getUTCFullYear()).padStart(4, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  const hours = String(date.getUTCHours()).padStart(2, '0');
  const minutes = String(date.getUTCMinutes()).padStart(2, '0');
  const seconds = String(date.getUTCSeconds()).padStart(2, '0');
  return `${year}${month}${day}T${hours}${minutes}${seconds}Z`;
}
