/**
 * Modes Module - Schemas and Types
 *
 * One global system mode is active at any instant. Deferred restores
 * (midnight, ventilation, timer) share one PendingRestore shape.
 */
import { z } from "zod";

import { SYSTEM_MODE_VALUES } from "../config.js";

export type SystemMode = (typeof SYSTEM_MODE_VALUES)[number];

export function isSystemMode(value: string): value is SystemMode {
  return SYSTEM_MODE_VALUES.some((mode) => mode === value);
}

/**
 * Older persisted selector values and the mode they map to.
 */
export const LEGACY_MODE_ALIASES: ReadonlyMap<string, SystemMode> = new Map<
  string,
  SystemMode
>([["holiday", "eco"]]);

export const MODE_DESCRIPTIONS: Readonly<
  Record<SystemMode, Readonly<{ label: string; description: string }>>
> = {
  default: {
    label: "Default",
    description: "Normal week schedule for every zone",
  },
  stay_home: {
    label: "Stay home",
    description:
      "Today follows the weekend pattern; back to default at midnight",
  },
  eco: {
    label: "Eco",
    description: "Economy schedule while away",
  },
  timer: {
    label: "Timer",
    description: "Heating off until a set time, then default",
  },
  ventilation: {
    label: "Ventilation",
    description: "Heating off for a few minutes, then the previous mode",
  },
  manual: {
    label: "Manual",
    description: "Thermostats heat without a schedule",
  },
  off: {
    label: "Off",
    description: "All thermostats off",
  },
};

// =============================================================================
// Transitions
// =============================================================================

export type ModeOptions = Readonly<{
  /** stay_home: zones that get today's weekend pattern (all when absent) */
  activeZones?: readonly string[];
  /** timer: absolute restore instant */
  restoreTime?: Date;
  /** ventilation: minutes before restoring */
  durationMinutes?: number;
}>;

export type RestoreReason = "midnight" | "ventilation" | "timer";

/**
 * The single deferred transition. Fires only while `armedByMode` is
 * still current.
 */
export type PendingRestore = Readonly<{
  targetMode: SystemMode;
  /** Epoch ms */
  fireAt: number;
  armedByMode: SystemMode;
  reason: RestoreReason;
}>;

export type PendingRestoreInfo = Readonly<{
  targetMode: SystemMode;
  reason: RestoreReason;
  fireAt: string;
  remainingSeconds: number;
}>;

export type ModeInfo = Readonly<{
  current: SystemMode;
  previous: SystemMode | null;
  description: string;
  pendingRestore: PendingRestoreInfo | null;
}>;

export type ModeChangeListener = (info: ModeInfo) => void;

// =============================================================================
// HTTP Request Bodies
// =============================================================================

export const SetModeRequestSchema = z.object({
  mode: z.enum(SYSTEM_MODE_VALUES),
  activeZones: z.array(z.string().min(1)).optional(),
  restoreTime: z
    .string()
    .refine((value) => !Number.isNaN(Date.parse(value)), "Invalid date")
    .transform((value) => new Date(value))
    .optional(),
  durationMinutes: z.number().positive().max(24 * 60).optional(),
  force: z.boolean().default(false),
});

export type SetModeRequest = z.infer<typeof SetModeRequestSchema>;
