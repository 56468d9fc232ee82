import { DetachSupervisor, realSleep, type Sleep } from "../lib/detach";
import { DiskInspector, nodeFileSystemProbe, type FileSystemProbe } from "../lib/disk";
import { NodeExecutor, type Executor } from "../lib/executor";
import { OsascriptChooser, type Chooser } from "../lib/chooser";
import type { AcquisitionSettings } from "../lib/config";
import { consoleProgress, type HashProgress } from "../lib/hash";
import { TemporaryImageManager } from "../lib/images";
import { createLogger, type Logger } from "../lib/log";
import type { Parameters } from "../lib/params";
import { ProcessRunner } from "../lib/process";
import type { AcquisitionMethod, Report } from "../lib/types";

/**
 * One way of acquiring a source. `execute` always resolves with a report;
 * failures show up as `success === false`.
 */
export interface AcquisitionStrategy extends AcquisitionMethod {
  execute(params: Parameters): Promise<Report>;
}

/** Everything a strategy touches outside its own process. */
export type AcquisitionToolkit = {
  runner: ProcessRunner;
  inspector: DiskInspector;
  images: TemporaryImageManager;
  detacher: DetachSupervisor;
  chooser: Chooser;
  settings: AcquisitionSettings;
  logger: Logger;
  progress: HashProgress;
  now: () => Date;
};

export type ToolkitOverrides = {
  executor?: Executor;
  probe?: FileSystemProbe;
  chooser?: Chooser;
  logger?: Logger;
  sleep?: Sleep;
  echo?: (chunk: string) => void;
  progress?: HashProgress;
  now?: () => Date;
};

export function createToolkit(settings: AcquisitionSettings, overrides: ToolkitOverrides = {}): AcquisitionToolkit {
  const logger = overrides.logger ?? createLogger();
  const runner = new ProcessRunner(overrides.executor ?? new NodeExecutor(), settings.keepAwake, overrides.echo);
  return {
    runner,
    inspector: new DiskInspector(runner, logger, overrides.probe ?? nodeFileSystemProbe),
    images: new TemporaryImageManager(runner, logger, settings.mountRoot),
    detacher: new DetachSupervisor(runner, overrides.sleep ?? realSleep),
    chooser: overrides.chooser ?? new OsascriptChooser(runner),
    settings,
    logger,
    progress: overrides.progress ?? consoleProgress(),
    now: overrides.now ?? (() => new Date()),
  };
}
