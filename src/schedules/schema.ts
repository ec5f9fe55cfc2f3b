/**
 * Schedules Module - Schemas and Types
 *
 * Week plans name a day type per weekday; day types expand to the
 * thermostat wire format (six HH:MM/temperature pairs from 00:00).
 */
import { z } from "zod";

export const WEEKDAYS = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/**
 * Weekday -> day type id.
 */
export type WeekPlan = Readonly<Record<Weekday, string>>;

/**
 * Weekday -> expanded schedule string, e.g. "00:00/17 06:30/19 ...".
 */
export type WeekSchedule = Readonly<Record<Weekday, string>>;

export type DayType = Readonly<{
  id: string;
  schedule: string;
  description: string | null;
}>;

// =============================================================================
// File Schemas
// =============================================================================

const dayTypeId = z.string().min(1);

export const WeekPlanSchema = z.object({
  monday: dayTypeId,
  tuesday: dayTypeId,
  wednesday: dayTypeId,
  thursday: dayTypeId,
  friday: dayTypeId,
  saturday: dayTypeId,
  sunday: dayTypeId,
});

/**
 * One file under schedules/.
 */
export const ScheduleSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().nullable().optional(),
  enabled: z.boolean().default(true),
  week: WeekPlanSchema,
});

export type Schedule = z.infer<typeof ScheduleSchema>;

const DayTypeEntrySchema = z.object({
  schedule: z.string().min(1),
  description: z.string().nullable().optional(),
});

type DayTypeEntry = z.infer<typeof DayTypeEntrySchema>;

const DayTypeMapSchema = z.record(DayTypeEntrySchema);

function toDayType(id: string, entry: DayTypeEntry): DayType {
  return {
    id,
    schedule: entry.schedule,
    description: entry.description ?? null,
  };
}

function fromMap(map: Readonly<Record<string, DayTypeEntry>>): DayType[] {
  return Object.entries(map).map(([id, entry]) => toDayType(id, entry));
}

/**
 * day_types.json accepts three layouts, all normalised to a list:
 * - { "day_types": { id: { schedule } } }
 * - { "day_types": [ { id, schedule } ] }
 * - { id: { schedule } }
 */
export const DayTypesFileSchema = z.union([
  z
    .object({ day_types: DayTypeMapSchema })
    .transform((file) => fromMap(file.day_types)),
  z
    .object({
      day_types: z.array(DayTypeEntrySchema.extend({ id: z.string().min(1) })),
    })
    .transform((file) =>
      file.day_types.map((entry) => toDayType(entry.id, entry)),
    ),
  DayTypeMapSchema.transform(fromMap),
]);
