import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { ParseFailure, ProcessExitFailure } from "./errors";
import {
  buildAttachCommand,
  buildConvertCommand,
  buildCreateCommand,
  parseAttachedVolume,
  parseMountPoint,
} from "./hdiutil";
import type { Logger } from "./log";
import type { ProcessRunner } from "./process";

export type TemporaryImageRequest = {
  sectors: number;
  imageName: string;
  workingDir: string;
};

export type TemporaryImage = {
  imagePath: string;
  /** attached device, e.g. /dev/disk4 */
  volume: string;
  mountPoint?: string;
};

export class TemporaryImageManager {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly logger: Logger,
    private readonly mountRoot = "/Volumes",
  ) {}

  /**
   * Creates a sparse image sized to `sectors` and attaches it. The image path
   * is appended to `artifacts` as soon as it is attached, before anything is
   * copied into it.
   */
  async createAndAttach(request: TemporaryImageRequest, artifacts: string[]): Promise<TemporaryImage> {
    const { sectors, imageName, workingDir } = request;
    const directory = join(workingDir, imageName);
    await mkdir(directory, { recursive: true });
    const imagePath = join(directory, `${imageName}.sparseimage`);

    this.logger.info(`Creating temporary image ${imagePath} (${sectors} sectors)`);
    const create = buildCreateCommand({ sectors, volumeName: imageName, imagePath });
    const created = await this.runner.runStreamed(create);
    if (created.code !== 0) throw new ProcessExitFailure(create, created.code);

    const attach = buildAttachCommand(imagePath);
    const attached = await this.runner.runStreamed(attach);
    if (attached.code !== 0) throw new ProcessExitFailure(attach, attached.code);
    const volume = parseAttachedVolume(attached.output);
    if (!volume) throw new ParseFailure("hdiutil attach printed no device identifier", attached.output);

    artifacts.push(imagePath);
    return { imagePath, volume, mountPoint: parseMountPoint(attached.output, this.mountRoot) };
  }

  async convert(imagePath: string, imageName: string, destinationDir: string, artifacts: string[]): Promise<string> {
    const directory = join(destinationDir, imageName);
    await mkdir(directory, { recursive: true });
    const output = join(directory, `${imageName}.dmg`);

    this.logger.info(`Converting ${imagePath} -> ${output}`);
    const cmd = buildConvertCommand({ source: imagePath, output });
    const { code } = await this.runner.runStreamed(cmd);
    if (code !== 0) throw new ProcessExitFailure(cmd, code);

    artifacts.push(output);
    return output;
  }
}
