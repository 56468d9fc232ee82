import { join } from "node:path";
import { gatherHardwareInfo } from "../lib/disk";
import { errorMessage, ParseFailure, ProcessExitFailure } from "../lib/errors";
import { hashFile } from "../lib/hash";
import { buildDetachCommand, buildRsyncCommand } from "../lib/hdiutil";
import type { TemporaryImage } from "../lib/images";
import type { Parameters } from "../lib/params";
import { writeReport } from "../lib/report";
import { createReport, type Report } from "../lib/types";
import type { AcquisitionStrategy, AcquisitionToolkit } from "./strategy";

export const COPY_LOG_NAME = "rsync_copy.log";

/**
 * Copies the source into a sparse image sized like the source volume, then
 * converts it to a compressed read-only DMG and hashes the DMG.
 */
export class SparseImageStrategy implements AcquisitionStrategy {
  readonly name = "Sparse Image";
  readonly description =
    "Copy the source into a temporary sparse image with rsync, then convert it to a compressed DMG and hash it";

  constructor(private readonly kit: AcquisitionToolkit) {}

  async execute(params: Parameters): Promise<Report> {
    const { runner, inspector, images, detacher, settings, logger, progress, now } = this.kit;
    const report = createReport(params, this, now());
    let attached: TemporaryImage | undefined;

    try {
      report.hardwareInfo = await gatherHardwareInfo(runner, logger);
      const details = await inspector.describe(params.source);
      report.pathDetails = details;
      if (details.diskSectors <= 0) {
        logger.error(`Unable to determine the size of ${params.source}. Aborting.`);
        return report;
      }

      attached = await images.createAndAttach(
        { sectors: details.diskSectors, imageName: params.imageName, workingDir: params.tmp },
        report.outputFiles,
      );
      const image = attached;
      if (!image.mountPoint) {
        throw new ParseFailure(`Temporary image ${image.imagePath} has no mount point`, image.volume);
      }

      const copy = buildRsyncCommand({ source: params.source, destination: image.mountPoint });
      logger.info(`Copying ${params.source} -> ${image.mountPoint}`);
      const copied = await runner.runStreamed(copy, true, join(params.tmp, params.imageName, COPY_LOG_NAME));

      logger.info(`Detaching temporary image ${image.volume}`);
      attached = undefined;
      if (!(await detacher.detach(image.volume, settings.detach))) {
        throw new ProcessExitFailure(buildDetachCommand(image.volume), 1);
      }
      if (copied.code !== 0) throw new ProcessExitFailure(copy, copied.code);

      const dmg = await images.convert(image.imagePath, params.imageName, params.destination, report.outputFiles);

      logger.info(`Hashing ${dmg}`);
      report.result = await hashFile(dmg, progress);

      report.endTime = now();
      report.success = true;
      const path = await writeReport(report);
      logger.info(`Report written to ${path}`);
      logger.info("Acquisition completed!");
    } catch (e) {
      report.success = false;
      logger.error(`${this.name} acquisition failed: ${errorMessage(e)}`);
      if (attached) await this.releaseAfterFailure(attached.volume);
    }

    return report;
  }

  private async releaseAfterFailure(volume: string): Promise<void> {
    const { detacher, settings, logger } = this.kit;
    try {
      if (!(await detacher.detach(volume, settings.detach))) {
        logger.warn(`Failed to detach ${volume}. You may need to detach it manually.`);
      }
    } catch (e) {
      logger.warn(`Failed to detach ${volume}: ${errorMessage(e)}`);
    }
  }
}
