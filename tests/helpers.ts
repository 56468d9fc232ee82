/**
 * Shared fixtures for strategy tests: a scripted chooser, a fake filesystem
 * probe and a toolkit wired to a RecordingExecutor.
 */

import { createToolkit, type AcquisitionToolkit } from "../src/acquisition";
import type { Chooser } from "../src/lib/chooser";
import { loadSettings } from "../src/lib/config";
import type { FileSystemProbe, VolumeGeometry } from "../src/lib/disk";
import { RecordingExecutor, type ExecResult } from "../src/lib/executor";
import { silentProgress } from "../src/lib/hash";
import { memoryLogger } from "../src/lib/log";

export class ScriptedChooser implements Chooser {
  public prompts: string[] = [];
  constructor(private readonly file?: string, private readonly folder?: string) {}
  async chooseFile(prompt: string, extensions: readonly string[]) {
    this.prompts.push(`file:${extensions.join(",")}`);
    return this.file;
  }
  async chooseFolder(prompt: string) {
    this.prompts.push("folder");
    return this.folder;
  }
}

export type FakeVolume = { mount?: boolean; geometry?: VolumeGeometry; dev: number };

export function fakeProbe(entries: Record<string, FakeVolume>): FileSystemProbe {
  return {
    realpath: async (path) => path,
    isMountPoint: async (path) => entries[path]?.mount === true,
    async statfs(path) {
      const geometry = entries[path]?.geometry;
      if (!geometry) throw new Error(`ENOENT: ${path}`);
      return geometry;
    },
    deviceId: async (path) => entries[path]?.dev ?? 0,
  };
}

export const ok = (stdout = ""): ExecResult => ({ code: 0, stdout, stderr: "" });
export const fail = (code = 1, stderr = "failed"): ExecResult => ({ code, stdout: "", stderr });

export const HARDWARE = "Hardware:\n\n    Hardware Overview:\n      Model Name: Mac";
export const SOURCE_INFO = "\n   Device Identifier:         disk2s1\n   Device Node:               /dev/disk2s1\n";

/** Clock that hands out the given instants in order, repeating the last. */
export function steppingClock(...instants: Date[]): () => Date {
  let i = 0;
  return () => instants[Math.min(i++, instants.length - 1)];
}

export function buildKit(params: {
  responder: (cmd: string[]) => ExecResult | Promise<ExecResult>;
  chooser: Chooser;
  probe: FileSystemProbe;
  now: () => Date;
}): { kit: AcquisitionToolkit; rec: RecordingExecutor; logger: ReturnType<typeof memoryLogger> } {
  const rec = new RecordingExecutor(params.responder);
  const logger = memoryLogger();
  const kit = createToolkit(loadSettings({ FUJI_NO_CAFFEINATE: "1" }), {
    executor: rec,
    probe: params.probe,
    chooser: params.chooser,
    logger,
    sleep: async () => {},
    echo: () => {},
    progress: silentProgress,
    now: params.now,
  });
  return { kit, rec, logger };
}
