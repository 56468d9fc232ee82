import type { Parameters } from "./params";

export interface PathDetails {
  path: string;
  isDisk: boolean;
  /** blocks * blockSize / 512, rounded down */
  diskSectors: number;
  diskDevice: string;
  /** st_dev of the inspected path */
  diskIdentifier: number;
  diskInfo: string;
}

export interface HashedFile {
  path: string;
  md5: string;
  sha1: string;
  sha256: string;
}

export interface AcquisitionMethod {
  readonly name: string;
  readonly description: string;
}

export interface Report {
  readonly parameters: Parameters;
  readonly method: AcquisitionMethod;
  readonly startTime: Date;
  endTime?: Date;
  pathDetails?: PathDetails;
  hardwareInfo: string;
  success: boolean;
  /** Append-only, in creation order. */
  readonly outputFiles: string[];
  result?: HashedFile;
}

export function createReport(parameters: Parameters, method: AcquisitionMethod, startTime: Date): Report {
  return {
    parameters,
    method,
    startTime,
    hardwareInfo: "",
    success: false,
    outputFiles: [],
  };
}
