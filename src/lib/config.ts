import { z } from "zod";
import { DEFAULT_KEEP_AWAKE } from "./process";

export const DetachScheduleSchema = z.object({
  delayMs: z.number().int().nonnegative(),
  intervalMs: z.number().int().nonnegative(),
  maxAttempts: z.number().int().positive(),
});

export type DetachSchedule = z.infer<typeof DetachScheduleSchema>;

export const AcquisitionSettingsSchema = z.object({
  keepAwake: z.array(z.string()).default(DEFAULT_KEEP_AWAKE),
  mountRoot: z.string().min(1).default("/Volumes"),
  detach: DetachScheduleSchema.default({ delayMs: 30_000, intervalMs: 10_000, maxAttempts: 3 }),
  snapshotDetach: DetachScheduleSchema.default({ delayMs: 0, intervalMs: 5_000, maxAttempts: 3 }),
});

export type AcquisitionSettings = z.infer<typeof AcquisitionSettingsSchema>;

const env = (source: Record<string, string | undefined>, k: string) => {
  const v = source[k]?.trim();
  return v ? v : undefined;
};

const intFromEnv = (source: Record<string, string | undefined>, k: string): number | undefined => {
  const v = env(source, k);
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!Number.isInteger(n)) throw new Error(`${k} must be an integer, got "${v}"`);
  return n;
};

/**
 * Default settings with overrides from FUJI_* environment variables.
 * The detach overrides apply to the temporary image schedule only.
 */
export function loadSettings(source: Record<string, string | undefined> = process.env): AcquisitionSettings {
  const base = AcquisitionSettingsSchema.parse({});
  const detach = {
    delayMs: intFromEnv(source, "FUJI_DETACH_DELAY_MS") ?? base.detach.delayMs,
    intervalMs: intFromEnv(source, "FUJI_DETACH_INTERVAL_MS") ?? base.detach.intervalMs,
    maxAttempts: intFromEnv(source, "FUJI_DETACH_ATTEMPTS") ?? base.detach.maxAttempts,
  };
  return AcquisitionSettingsSchema.parse({
    keepAwake: env(source, "FUJI_NO_CAFFEINATE") === "1" ? [] : base.keepAwake,
    mountRoot: env(source, "FUJI_MOUNT_ROOT") ?? base.mountRoot,
    detach,
    snapshotDetach: base.snapshotDetach,
  });
}
