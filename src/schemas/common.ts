/**
 * Common Zod Schemas - Shared types used across the scan
 */

import { z } from 'zod';

// ============================================
// Coordinates Schema
// ============================================

/**
 * Geographic coordinates (latitude/longitude).
 */
export const CoordinatesSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

export type Coordinates = z.infer<typeof CoordinatesSchema>;

// ============================================
// Calendar Date Schema
// ============================================

/**
 * UTC calendar date string (YYYY-MM-DD)
 */
export const CalendarDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format');

export type CalendarDate = z.infer<typeof CalendarDateSchema>;

/**
 * Format a Date as a UTC calendar date (YYYY-MM-DD).
 */
export function toUtcCalendarDate(date: Date): CalendarDate {
  return date.toISOString().slice(0, 10);
}
