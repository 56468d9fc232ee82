import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Executor } from "./executor";

export type RunOutput = { code: number; output: string };

export type Echo = (chunk: string) => void;

export const DEFAULT_KEEP_AWAKE = ["caffeinate", "-dimsu"];

/**
 * Runs external tools for the acquisition steps. Nonzero exits come back in
 * `code`; only a failure to start the process is thrown.
 */
export class ProcessRunner {
  constructor(
    private readonly exec: Executor,
    private readonly keepAwakeWrapper: string[] = DEFAULT_KEEP_AWAKE,
    private readonly echo: Echo = (s) => process.stdout.write(s),
  ) {}

  private wrap(args: string[], keepAwake: boolean): string[] {
    return keepAwake && this.keepAwakeWrapper.length ? [...this.keepAwakeWrapper, ...args] : [...args];
  }

  async runCaptured(args: string[], keepAwake = false): Promise<RunOutput> {
    const res = await this.exec.run(this.wrap(args, keepAwake));
    return { code: res.code, output: res.stdout };
  }

  async runStreamed(args: string[], keepAwake = true, teeFile?: string): Promise<RunOutput> {
    // stdout and stderr share one buffer in arrival order, like 2>&1
    const chunks: string[] = [];
    const onChunk = (s: string) => {
      chunks.push(s);
      this.echo(s);
    };
    const res = await this.exec.run(this.wrap(args, keepAwake), {
      onStdoutChunk: onChunk,
      onStderrChunk: onChunk,
    });
    const output = chunks.join("");
    if (teeFile) {
      await mkdir(dirname(teeFile), { recursive: true });
      await writeFile(teeFile, output);
    }
    return { code: res.code, output };
  }
}
