/**
 * Modes Module - Pure Transformations
 *
 * Restore-target and arming rules plus persisted-value normalisation.
 */
import {
  LEGACY_MODE_ALIASES,
  MODE_DESCRIPTIONS,
  type ModeInfo,
  type PendingRestore,
  type PendingRestoreInfo,
  type RestoreReason,
  type SystemMode,
  isSystemMode,
} from "./schema.js";

/**
 * Start of the next local calendar day.
 */
export function nextLocalMidnight(now: Date): Date {
  return new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1);
}

/**
 * Mode to return to after ventilation.
 *
 * Ventilation returns to whatever it interrupted. When it interrupted
 * another timed mode, that mode's own restore target is inherited.
 */
export function ventilationRestoreTarget(
  previous: SystemMode,
  pending: PendingRestore | null,
): SystemMode {
  if (previous === "ventilation" || previous === "timer") {
    return pending?.targetMode ?? "default";
  }
  return previous;
}

/**
 * A pending ventilation restore outranks a stay-home midnight arm.
 */
export function shouldSkipArm(
  existing: PendingRestore | null,
  incoming: RestoreReason,
): boolean {
  return existing?.reason === "ventilation" && incoming === "midnight";
}

export function isTimedMode(mode: SystemMode): boolean {
  return mode === "timer" || mode === "ventilation";
}

/**
 * Map a persisted selector value to a restorable mode, or null when it
 * cannot be restored (unknown or missing).
 */
export function normalizePersistedMode(
  value: string | null | undefined,
): SystemMode | null {
  if (value === null || value === undefined) {
    return null;
  }

  return (
    LEGACY_MODE_ALIASES.get(value) ?? (isSystemMode(value) ? value : null)
  );
}

export function describePendingRestore(
  pending: PendingRestore,
  now: number,
): PendingRestoreInfo {
  return {
    targetMode: pending.targetMode,
    reason: pending.reason,
    fireAt: new Date(pending.fireAt).toISOString(),
    remainingSeconds: Math.max(0, Math.round((pending.fireAt - now) / 1000)),
  };
}

export function buildModeInfo(
  current: SystemMode,
  previous: SystemMode | null,
  pending: PendingRestore | null,
  now: number,
): ModeInfo {
  return {
    current,
    previous,
    description: MODE_DESCRIPTIONS[current].description,
    pendingRestore: pending ? describePendingRestore(pending, now) : null,
  };
}
