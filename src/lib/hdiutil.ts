// Command builders and output parsers for the macOS disk image tools.
// Each tool's output contract is parsed in exactly one function here.

export const SNAPSHOT_EXTENSIONS = ["dmg", "sparseimage", "sparsebundle"] as const;

export function buildCreateCommand(params: { sectors: number; volumeName: string; imagePath: string }): string[] {
  const { sectors, volumeName, imagePath } = params;
  if (!Number.isInteger(sectors) || sectors <= 0) {
    throw new Error(`Invalid sector count: ${sectors}`);
  }
  return ["hdiutil", "create", "-sectors", String(sectors), "-volname", volumeName, imagePath];
}

export function buildAttachCommand(imagePath: string): string[] {
  return ["hdiutil", "attach", imagePath];
}

/** Converts to a compressed read-only UDZO image. */
export function buildConvertCommand(params: { source: string; output: string }): string[] {
  return ["hdiutil", "convert", params.source, "-format", "UDZO", "-o", params.output];
}

export function buildDetachCommand(volume: string): string[] {
  return ["hdiutil", "detach", volume];
}

export function buildDittoCommand(params: { source: string; destination: string; keepParent?: boolean; clone?: boolean }): string[] {
  const { source, destination, keepParent = true, clone = true } = params;
  const cmd = ["ditto"];
  if (clone) cmd.push("--clone");
  if (keepParent) cmd.push("--keepParent");
  cmd.push(source, destination);
  return cmd;
}

export function buildRsyncCommand(params: { source: string; destination: string }): string[] {
  // trailing slash: copy the contents, not the directory itself
  const source = params.source.endsWith("/") ? params.source : `${params.source}/`;
  return ["rsync", "-xrlptgoEv", "--progress", source, params.destination];
}

export function buildDfCommand(path: string): string[] {
  return ["df", path];
}

/** First whitespace-delimited token of `hdiutil attach` output. */
export function parseAttachedVolume(output: string): string | undefined {
  const token = output.trim().split(/\s+/)[0];
  return token ? token : undefined;
}

/**
 * Splits on runs of whitespace into at most `maxFields` fields; the last
 * field keeps the rest of the line (mount points may contain spaces).
 */
export function splitFields(line: string, maxFields: number): string[] {
  const fields: string[] = [];
  let rest = line;
  while (fields.length < maxFields - 1) {
    const m = /\s+/.exec(rest);
    if (!m) break;
    fields.push(rest.slice(0, m.index));
    rest = rest.slice(m.index + m[0].length);
  }
  fields.push(rest);
  return fields;
}

/** Mount point from `hdiutil attach` output: third field of the first line under `mountRoot`. */
export function parseMountPoint(output: string, mountRoot = "/Volumes"): string | undefined {
  const line = output
    .trim()
    .split(/\r?\n/)
    .find((l) => l.includes(mountRoot));
  if (!line) return undefined;
  const parts = splitFields(line.trimEnd(), 3);
  if (parts.length < 3 || !parts[2]) return undefined;
  return parts[2];
}
