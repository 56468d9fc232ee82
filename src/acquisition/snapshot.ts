import { join } from "node:path";
import { gatherHardwareInfo, parseDfDevice } from "../lib/disk";
import { errorMessage, ParseFailure, ProcessExitFailure, UserCancelled } from "../lib/errors";
import {
  buildAttachCommand,
  buildDfCommand,
  buildDittoCommand,
  parseMountPoint,
  SNAPSHOT_EXTENSIONS,
} from "../lib/hdiutil";
import { hashFile } from "../lib/hash";
import type { Parameters } from "../lib/params";
import { writeReport } from "../lib/report";
import { createReport, type Report } from "../lib/types";
import type { AcquisitionStrategy, AcquisitionToolkit } from "./strategy";

export const COPY_LOG_NAME = "ditto_copy.log";

/**
 * Mounts a snapshot image chosen by the operator and clones its contents
 * into a chosen folder with ditto. The mount is always released before
 * `execute` returns. After a successful copy the snapshot image itself is
 * hashed for the report.
 */
export class SnapshotMountStrategy implements AcquisitionStrategy {
  readonly name = "Snapshot Mount";
  readonly description =
    "Mount an image containing a snapshot and copy its contents to a destination using ditto with clone flag";

  constructor(private readonly kit: AcquisitionToolkit) {}

  async execute(params: Parameters): Promise<Report> {
    const { runner, inspector, chooser, logger, now, progress } = this.kit;
    const report = createReport(params, this, now());
    let mounted: string | undefined;

    try {
      report.hardwareInfo = await gatherHardwareInfo(runner, logger);
      report.pathDetails = await inspector.describe(params.source);

      logger.info("Preparing to mount a snapshot image...");
      const image = await chooser.chooseFile("Select a snapshot image to mount:", SNAPSHOT_EXTENSIONS);
      if (!image) throw new UserCancelled("snapshot image");

      mounted = await this.mount(image);

      logger.info("Please select a destination for the copied files...");
      const destination = await chooser.chooseFolder("Select a destination folder for the copied files:");
      if (!destination) throw new UserCancelled("destination");

      const copied = await this.copy(mounted, destination);

      const mountPoint = mounted;
      mounted = undefined;
      await this.releaseWithWarning(mountPoint);

      report.endTime = now();
      if (!copied) return report;

      report.outputFiles.push(destination);
      logger.info(`Hashing ${image}`);
      report.result = await hashFile(image, progress);
      report.success = true;
      const path = await writeReport(report);
      logger.info(`Report written to ${path}`);
      logger.info("Acquisition completed!");
    } catch (e) {
      report.success = false;
      if (e instanceof UserCancelled) {
        logger.info(`${e.message}. Aborting.`);
      } else {
        logger.error(`${this.name} acquisition failed: ${errorMessage(e)}`);
      }
      if (mounted) await this.releaseWithWarning(mounted);
    }

    return report;
  }

  private async mount(image: string): Promise<string> {
    const { runner, settings, logger } = this.kit;
    logger.info(`Mounting image: ${image}`);
    const cmd = buildAttachCommand(image);
    const { code, output } = await runner.runStreamed(cmd);
    if (code !== 0) throw new ProcessExitFailure(cmd, code);

    const mountPoint = parseMountPoint(output, settings.mountRoot);
    if (!mountPoint) throw new ParseFailure(`No mounted volume under ${settings.mountRoot} in hdiutil output`, output);
    logger.info(`Image mounted at: ${mountPoint}`);
    return mountPoint;
  }

  private async copy(source: string, destination: string): Promise<boolean> {
    const { runner, logger } = this.kit;
    const logFile = join(destination, COPY_LOG_NAME);
    logger.info(`Copying files from ${source} to ${destination} using ditto with clone flag...`);

    const { code } = await runner.runStreamed(buildDittoCommand({ source, destination }), true, logFile);
    if (code !== 0) {
      logger.error(`Failed to copy files with error code ${code}`);
      return false;
    }
    logger.info(`Successfully copied files to ${destination}`);
    logger.info(`Log file created at ${logFile}`);
    return true;
  }

  /** Detaches the device backing `mountPoint`, or the mount point itself when df cannot tell. */
  private async release(mountPoint: string): Promise<boolean> {
    const { runner, detacher, settings, logger } = this.kit;
    logger.info(`Detaching image mounted at: ${mountPoint}`);
    const df = await runner.runCaptured(buildDfCommand(mountPoint));
    const device = (df.code === 0 ? parseDfDevice(df.output) : undefined) ?? mountPoint;
    return detacher.detach(device, settings.snapshotDetach);
  }

  /** Never throws: a leftover mount only earns a warning. */
  private async releaseWithWarning(mountPoint: string): Promise<void> {
    const { logger } = this.kit;
    try {
      if (!(await this.release(mountPoint))) {
        logger.warn(`Failed to detach ${mountPoint}. You may need to detach it manually.`);
      }
    } catch (e) {
      logger.warn(`Failed to detach ${mountPoint}: ${errorMessage(e)}`);
    }
  }
}
