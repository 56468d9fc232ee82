import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Report } from "./types";

export const REPORT_TITLE = "Fuji - Forensic Unattended Juicy Imaging";
export const SEPARATOR = "-".repeat(80);

const pad = (n: number) => String(n).padStart(2, "0");

/** Local time as YYYY-MM-DD HH:MM:SS. */
export function formatTimestamp(date?: Date): string {
  if (!date) return "";
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function reportPath(report: Report): string {
  const { destination, imageName } = report.parameters;
  return join(destination, imageName, `${imageName}.txt`);
}

/** Renders a finished report. Only hashed acquisitions are reported. */
export function renderReport(report: Report): string[] {
  const { parameters: params, result } = report;
  if (!result) throw new Error("Report has no computed hashes");
  return [
    REPORT_TITLE,
    "Acquisition log",
    SEPARATOR,
    `Case name: ${params.caseName}`,
    `Examiner: ${params.examiner}`,
    `Notes: ${params.notes}`,
    SEPARATOR,
    `Start time: ${formatTimestamp(report.startTime)}`,
    `End time: ${formatTimestamp(report.endTime)}`,
    `Source: ${params.source}`,
    `Acquisition method: ${report.method.name}`,
    SEPARATOR,
    report.hardwareInfo,
    SEPARATOR,
    report.pathDetails?.diskInfo ?? "",
    SEPARATOR,
    "Generated files:",
    ...report.outputFiles.map((file) => `    - ${file}`),
    SEPARATOR,
    `Computed hashes (${result.path}):`,
    `    - MD5: ${result.md5}`,
    `    - SHA1: ${result.sha1}`,
    `    - SHA256: ${result.sha256}`,
  ];
}

/** Writes (or overwrites) the plain-text audit log and returns its path. */
export async function writeReport(report: Report): Promise<string> {
  const path = reportPath(report);
  const { destination, imageName } = report.parameters;
  await mkdir(join(destination, imageName), { recursive: true });
  await writeFile(path, renderReport(report).map((line) => `${line}\n`).join(""));
  return path;
}
