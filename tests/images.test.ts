import { mkdtemp, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ParseFailure, ProcessExitFailure } from "../src/lib/errors";
import { RecordingExecutor, type ExecResult } from "../src/lib/executor";
import { TemporaryImageManager } from "../src/lib/images";
import { memoryLogger } from "../src/lib/log";
import { ProcessRunner } from "../src/lib/process";

const attachOutput = [
  "/dev/disk4          \tGUID_partition_scheme          \t",
  "/dev/disk4s1        \tEFI                            \t",
  "/dev/disk4s2        \tApple_HFS                      \t/Volumes/Evidence",
  "",
].join("\n");

const ok = (stdout = ""): ExecResult => ({ code: 0, stdout, stderr: "" });

function manager(responses: Partial<Record<string, ExecResult>>) {
  const rec = new RecordingExecutor((cmd) => responses[cmd[1]] ?? ok());
  return { rec, images: new TemporaryImageManager(new ProcessRunner(rec, [], () => {}), memoryLogger()) };
}

describe("TemporaryImageManager", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "fuji-images-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("creates, attaches and records the sparse image", async () => {
    const { rec, images } = manager({ attach: ok(attachOutput) });
    const artifacts: string[] = [];
    const imagePath = join(testDir, "Evidence", "Evidence.sparseimage");

    const image = await images.createAndAttach({ sectors: 4096, imageName: "Evidence", workingDir: testDir }, artifacts);

    expect(image).toEqual({ imagePath, volume: "/dev/disk4", mountPoint: "/Volumes/Evidence" });
    expect(artifacts).toEqual([imagePath]);
    expect(rec.calls.map((c) => c.cmd)).toEqual([
      ["hdiutil", "create", "-sectors", "4096", "-volname", "Evidence", imagePath],
      ["hdiutil", "attach", imagePath],
    ]);
    expect((await stat(join(testDir, "Evidence"))).isDirectory()).toBe(true);
  });

  it("stops before attaching when creation fails", async () => {
    const { rec, images } = manager({ create: { code: 1, stdout: "", stderr: "hdiutil: create failed" } });
    const artifacts: string[] = [];
    await expect(
      images.createAndAttach({ sectors: 4096, imageName: "Evidence", workingDir: testDir }, artifacts),
    ).rejects.toBeInstanceOf(ProcessExitFailure);
    expect(rec.calls).toHaveLength(1);
    expect(artifacts).toEqual([]);
  });

  it("fails to parse an attach with no output", async () => {
    const { images } = manager({ attach: ok("") });
    const artifacts: string[] = [];
    await expect(
      images.createAndAttach({ sectors: 4096, imageName: "Evidence", workingDir: testDir }, artifacts),
    ).rejects.toBeInstanceOf(ParseFailure);
    expect(artifacts).toEqual([]);
  });

  it("appends the converted image after the sparse image", async () => {
    const { rec, images } = manager({ attach: ok(attachOutput) });
    const artifacts: string[] = [];
    const out = join(testDir, "out");

    const image = await images.createAndAttach({ sectors: 4096, imageName: "Evidence", workingDir: testDir }, artifacts);
    const dmg = await images.convert(image.imagePath, "Evidence", out, artifacts);

    expect(dmg).toBe(join(out, "Evidence", "Evidence.dmg"));
    expect(artifacts).toEqual([image.imagePath, dmg]);
    expect(rec.calls[2].cmd).toEqual(["hdiutil", "convert", image.imagePath, "-format", "UDZO", "-o", dmg]);
  });

  it("records nothing when conversion fails", async () => {
    const { images } = manager({ convert: { code: 1, stdout: "", stderr: "hdiutil: convert failed" } });
    const artifacts = ["/tmp/Evidence.sparseimage"];
    await expect(images.convert("/tmp/Evidence.sparseimage", "Evidence", testDir, artifacts)).rejects.toBeInstanceOf(
      ProcessExitFailure,
    );
    expect(artifacts).toEqual(["/tmp/Evidence.sparseimage"]);
  });
});
