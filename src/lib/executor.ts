import { spawn } from "node:child_process";
import { StringDecoder } from "node:string_decoder";
import type { Readable } from "node:stream";
import { ProcessSpawnFailure } from "./errors";

export type ExecOptions = {
  onStdoutChunk?: (chunk: string) => void;
  onStderrChunk?: (chunk: string) => void;
};

export type ExecResult = {
  code: number;
  stdout: string;
  stderr: string;
};

/** Runs a command to completion. Nonzero exits are returned in `code`, not thrown. */
export interface Executor {
  run(cmd: string[], options?: ExecOptions): Promise<ExecResult>;
}

export class NodeExecutor implements Executor {
  async run(cmd: string[], options: ExecOptions = {}): Promise<ExecResult> {
    const { onStdoutChunk, onStderrChunk } = options;
    const [file, ...args] = cmd;
    if (!file) throw new ProcessSpawnFailure(cmd, new Error("empty command"));

    const stdoutChunks: string[] = [];
    const stderrChunks: string[] = [];

    const code = await new Promise<number>((resolve, reject) => {
      const proc = spawn(file, args, { stdio: ["ignore", "pipe", "pipe"] });

      // Stream stdout/stderr
      const readStream = (stream: Readable | null, sink: string[], onChunk?: (s: string) => void) => {
        if (!stream) return;
        const decoder = new StringDecoder("utf8");
        stream.on("data", (data: Buffer) => {
          const text = decoder.write(data);
          if (!text) return;
          sink.push(text);
          if (onChunk) onChunk(text);
        });
        stream.on("end", () => {
          const rest = decoder.end();
          if (!rest) return;
          sink.push(rest);
          if (onChunk) onChunk(rest);
        });
      };
      readStream(proc.stdout, stdoutChunks, onStdoutChunk);
      readStream(proc.stderr, stderrChunks, onStderrChunk);

      proc.on("error", (err) => reject(new ProcessSpawnFailure(cmd, err)));

      // "close" fires after the stdio streams are drained
      proc.on("close", (exitCode) => resolve(exitCode ?? 1));
    });

    return {
      code,
      stdout: stdoutChunks.join(""),
      stderr: stderrChunks.join(""),
    };
  }
}

export type RecordedCall = { cmd: string[]; options?: ExecOptions; result?: ExecResult };

export type Responder = (cmd: string[]) => ExecResult | Promise<ExecResult>;

export class RecordingExecutor implements Executor {
  public calls: RecordedCall[] = [];
  constructor(private responses: Responder | ExecResult = { code: 0, stdout: "", stderr: "" }) {}
  async run(cmd: string[], options?: ExecOptions): Promise<ExecResult> {
    const res = typeof this.responses === "function" ? await this.responses(cmd) : this.responses;
    const copy: ExecResult = { code: res.code, stdout: res.stdout, stderr: res.stderr };
    this.calls.push({ cmd: [...cmd], options, result: copy });
    if (copy.stdout && options?.onStdoutChunk) options.onStdoutChunk(copy.stdout);
    if (copy.stderr && options?.onStderrChunk) options.onStderrChunk(copy.stderr);
    return copy;
  }
}
