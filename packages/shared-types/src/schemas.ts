import { z } from 'zod';
import { isValid, parseISO } from 'date-fns';

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const periodicitySchema = z.enum(['daily', 'weekly']);

// The patterns accept impossible dates such as 2026-02-30; parsing rejects them.
const isCalendarValid = (value: string) => isValid(parseISO(value));

export const isoTimestampSchema = z.string()
  .regex(ISO_TIMESTAMP, 'Timestamp must be in ISO-8601 format')
  .refine(isCalendarValid, 'Timestamp is not a valid date and time');

export const isoDateSchema = z.string()
  .regex(ISO_DATE, 'Date must be in ISO format (YYYY-MM-DD)')
  .refine(isCalendarValid, 'Date is not a valid calendar date');

const habitNameSchema = z.string()
  .trim()
  .min(1, 'Habit name cannot be empty')
  .max(100, 'Habit name must be at most 100 characters long');

export const createHabitSchema = z.object({
  name: habitNameSchema,
  periodicity: periodicitySchema,
});

export const renameHabitSchema = z.object({
  name: habitNameSchema,
});

export const checkOffSchema = z.object({
  timestamp: isoTimestampSchema.optional(),
});

export const listHabitsQuerySchema = z.object({
  periodicity: periodicitySchema.optional(),
});

export const staleHabitsQuerySchema = z.object({
  days: z.coerce.number().int().min(0).optional(),
});

export const mostActiveQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export const streakThresholdQuerySchema = z.object({
  min: z.coerce.number().int().min(0).optional(),
});

export const createdRangeQuerySchema = z.object({
  from: isoDateSchema,
  to: isoDateSchema,
}).refine(({ from, to }) => from <= to, {
  message: '"from" must not be after "to"',
  path: ['from'],
});

/**
 * Storage and interchange shape of a habit.
 * Keys are snake_case so files written by other tools load unchanged.
 */
export const habitRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  periodicity: periodicitySchema,
  created_at: isoTimestampSchema,
  check_offs: z.array(isoTimestampSchema),
});

/**
 * Record as read back from storage: periodicity is checked by the domain
 * loader so an unknown value surfaces as an invalid-periodicity error.
 */
export const storedHabitRecordSchema = habitRecordSchema.extend({
  periodicity: z.string(),
});

export const habitStoreSchema = z.object({
  habits: z.array(storedHabitRecordSchema),
});

export type Periodicity = z.infer<typeof periodicitySchema>;
export type HabitRecord = z.infer<typeof habitRecordSchema>;
export type StoredHabitRecord = z.infer<typeof storedHabitRecordSchema>;
export type HabitStore = z.infer<typeof habitStoreSchema>;
export type CreateHabitRequest = z.infer<typeof createHabitSchema>;
export type RenameHabitRequest = z.infer<typeof renameHabitSchema>;
export type CheckOffRequest = z.infer<typeof checkOffSchema>;
