import { lstat, realpath, stat, statfs } from "node:fs/promises";
import { dirname } from "node:path";
import { errorMessage } from "./errors";
import type { Logger } from "./log";
import type { ProcessRunner } from "./process";
import type { PathDetails } from "./types";

export type VolumeGeometry = { blocks: number; blockSize: number };

export interface FileSystemProbe {
  realpath(path: string): Promise<string>;
  isMountPoint(path: string): Promise<boolean>;
  statfs(path: string): Promise<VolumeGeometry>;
  deviceId(path: string): Promise<number>;
}

export const nodeFileSystemProbe: FileSystemProbe = {
  realpath: (path) => realpath(path),
  async isMountPoint(path) {
    const self = await lstat(path);
    if (self.isSymbolicLink()) return false;
    const parent = await stat(dirname(path));
    return self.dev !== parent.dev || self.ino === parent.ino;
  },
  async statfs(path) {
    const s = await statfs(path);
    return { blocks: s.blocks, blockSize: s.bsize };
  },
  async deviceId(path) {
    return (await stat(path)).dev;
  },
};

export function sectorsFromGeometry({ blocks, blockSize }: VolumeGeometry): number {
  return Math.floor((blocks * blockSize) / 512);
}

/** `diskutil info` prints the device identifier on its second line. */
export function parseVolumeInfoDevice(text: string): string | undefined {
  const line = text.split(/\r?\n/)[1];
  if (line === undefined) return undefined;
  const idx = line.indexOf(":");
  if (idx < 0) return undefined;
  return line.slice(idx + 1).trim();
}

/** Device column of `df <path>`: first token of the first data row. */
export function parseDfDevice(text: string): string | undefined {
  const line = text.trim().split(/\r?\n/)[1];
  if (!line) return undefined;
  const token = line.trim().split(/\s+/)[0];
  return token ? token : undefined;
}

export async function findMountPoint(probe: FileSystemProbe, path: string): Promise<string> {
  let current = await probe.realpath(path);
  while (!(await probe.isMountPoint(current))) {
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return current;
}

export class DiskInspector {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly logger: Logger,
    private readonly probe: FileSystemProbe = nodeFileSystemProbe,
  ) {}

  async describe(path: string): Promise<PathDetails> {
    const resolved = await this.probe.realpath(path);
    let isDisk = await this.probe.isMountPoint(resolved);

    let diskSectors = 0;
    try {
      diskSectors = sectorsFromGeometry(await this.probe.statfs(path));
    } catch (e) {
      this.logger.warn(`Unable to read volume geometry for ${path}: ${errorMessage(e)}`);
      return {
        path,
        isDisk: false,
        diskSectors: 0,
        diskDevice: "",
        diskIdentifier: await this.probe.deviceId(path).catch((err: unknown) => {
          this.logger.warn(`Unable to stat ${path}: ${errorMessage(err)}`);
          return 0;
        }),
        diskInfo: "",
      };
    }

    let diskDevice = "";
    let diskInfo = "";
    let ancestorFrom: string | undefined = isDisk ? undefined : resolved;

    if (isDisk) {
      const { code, output } = await this.runner.runCaptured(["diskutil", "info", resolved]);
      if (code === 0) {
        diskInfo = output;
        const device = parseVolumeInfoDevice(output);
        if (device === undefined) this.logger.warn(`Unexpected diskutil info output for ${resolved}`);
        diskDevice = device ?? "";
      } else {
        isDisk = false;
        // the boundary itself is a mount point; look above it
        const parent = dirname(resolved);
        ancestorFrom = parent === resolved ? undefined : parent;
      }
    }

    if (ancestorFrom !== undefined) {
      const mountPoint = await findMountPoint(this.probe, ancestorFrom);
      if (mountPoint !== resolved) {
        const mountDetails = await this.describe(mountPoint);
        diskDevice = mountDetails.diskDevice;
        diskInfo = mountDetails.diskInfo;
      }
    }

    return {
      path,
      isDisk,
      diskSectors,
      diskDevice,
      diskIdentifier: await this.probe.deviceId(path),
      diskInfo,
    };
  }
}

export async function gatherHardwareInfo(runner: ProcessRunner, logger: Logger): Promise<string> {
  try {
    const { code, output } = await runner.runCaptured(["system_profiler", "SPHardwareDataType"]);
    if (code !== 0) logger.warn(`system_profiler exited with code ${code}`);
    return output;
  } catch (e) {
    logger.warn(`Unable to gather hardware information: ${errorMessage(e)}`);
    return "";
  }
}
