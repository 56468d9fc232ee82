import { setTimeout as delay } from "node:timers/promises";
import type { DetachSchedule } from "./config";
import { buildDetachCommand } from "./hdiutil";
import type { ProcessRunner } from "./process";

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Detaches a volume with a fixed backoff. Detach is the one step that fails
 * transiently (open handles, in-flight I/O), so it is the only one retried.
 */
export class DetachSupervisor {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly sleep: Sleep = realSleep,
  ) {}

  async detach(volume: string, schedule: DetachSchedule): Promise<boolean> {
    const { delayMs, intervalMs, maxAttempts } = schedule;
    if (delayMs > 0) await this.sleep(delayMs);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const { code } = await this.runner.runStreamed(buildDetachCommand(volume));
      if (code === 0) return true;
      if (attempt < maxAttempts) await this.sleep(intervalMs);
    }
    return false;
  }
}
