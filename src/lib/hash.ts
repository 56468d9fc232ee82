import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import type { HashedFile } from "./types";

export const HASH_CHUNK_SIZE = 16 * 1024;

export interface HashProgress {
  /** Called once per newly reached whole percent, increasing. */
  percent(value: number): void;
  done(): void;
}

export const silentProgress: HashProgress = { percent: () => {}, done: () => {} };

/** "5% 10% ... 20% \n" style progress, with a break after every multiple of 20. */
export function consoleProgress(write: (s: string) => void = (s) => process.stdout.write(s)): HashProgress {
  return {
    percent(value) {
      write(`${value}% `);
      if (value % 20 === 0) write("\n");
    },
    done() {
      write("\n");
    },
  };
}

/** MD5, SHA-1 and SHA-256 of a file in a single read pass. */
export async function hashFile(path: string, progress: HashProgress = silentProgress): Promise<HashedFile> {
  const { size } = await stat(path);
  const md5 = createHash("md5");
  const sha1 = createHash("sha1");
  const sha256 = createHash("sha256");

  let amount = 0;
  let lastPercent = 0;
  const stream = createReadStream(path, { highWaterMark: HASH_CHUNK_SIZE });
  for await (const chunk of stream) {
    if (!Buffer.isBuffer(chunk)) continue;
    md5.update(chunk);
    sha1.update(chunk);
    sha256.update(chunk);

    amount += chunk.length;
    const percent = size > 0 ? Math.min(100, Math.floor((100 * amount) / size)) : 100;
    if (percent > lastPercent) {
      progress.percent(percent);
      lastPercent = percent;
    }
  }
  if (lastPercent < 100) progress.percent(100);
  progress.done();

  return {
    path,
    md5: md5.digest("hex"),
    sha1: sha1.digest("hex"),
    sha256: sha256.digest("hex"),
  };
}
