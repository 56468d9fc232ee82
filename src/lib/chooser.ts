import type { ProcessRunner } from "./process";

export interface Chooser {
  /** Absolute path of the chosen file, or undefined when cancelled. */
  chooseFile(prompt: string, extensions: readonly string[]): Promise<string | undefined>;
  chooseFolder(prompt: string): Promise<string | undefined>;
}

const quote = (s: string) => `"${s.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;

export function buildChooseFileScript(prompt: string, extensions: readonly string[]): string {
  const types = extensions.map(quote).join(", ");
  return [
    'tell application "System Events"',
    "activate",
    `set theFile to choose file with prompt ${quote(prompt)} of type {${types}}`,
    "return POSIX path of theFile",
    "end tell",
  ].join("\n");
}

export function buildChooseFolderScript(prompt: string): string {
  return [
    'tell application "System Events"',
    "activate",
    `set theFolder to choose folder with prompt ${quote(prompt)}`,
    "return POSIX path of theFolder",
    "end tell",
  ].join("\n");
}

/** Native macOS dialogs through osascript. Pressing Cancel exits nonzero. */
export class OsascriptChooser implements Chooser {
  constructor(private readonly runner: ProcessRunner) {}

  private async ask(script: string): Promise<string | undefined> {
    const { code, output } = await this.runner.runCaptured(["osascript", "-e", script]);
    if (code !== 0) return undefined;
    const path = output.trim();
    return path ? path : undefined;
  }

  chooseFile(prompt: string, extensions: readonly string[]) {
    return this.ask(buildChooseFileScript(prompt, extensions));
  }

  async chooseFolder(prompt: string) {
    const path = await this.ask(buildChooseFolderScript(prompt));
    if (path && path.length > 1 && path.endsWith("/")) return path.slice(0, -1);
    return path;
  }
}
