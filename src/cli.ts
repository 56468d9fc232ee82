#!/usr/bin/env tsx
import { createStrategy, createToolkit, isMethodKey, METHOD_KEYS } from "./acquisition";
import { parseArgs, stringArg } from "./lib/args";
import { loadSettings } from "./lib/config";
import { errorMessage } from "./lib/errors";
import { ACQUIRE_ARGS, parametersFromArgs } from "./lib/params";
import pkg from "../package.json";

const VERSION: string = pkg.version;

function usage() {
  console.log(`fuji-acquire v${VERSION}\n\n` +
`Usage:\n  fuji <command> [options]\n\n` +
`Commands:\n  acquire                    Run an acquisition and write the audit log\n  methods                    List acquisition methods\n  version                    Print version\n\n` +
`Global Options:\n  -h, --help                 Show help\n  -v, --version              Show version\n\n` +
`Acquire Options:\n  -m, --method <key>         ${METHOD_KEYS.join("|")} (default snapshot)\n  --case <name>              Case name\n  --examiner <name>          Examiner name\n  --notes <text>             Free-text notes\n  --name <image-name>        Image name (default FujiAcquisition)\n  --source <path>            Source path (default /)\n  --tmp <dir>                Temporary working directory (default /Volumes/Fuji)\n  --destination <dir>        Destination directory (default /Volumes/Fuji)\n\n` +
`Environment:\n  FUJI_DETACH_DELAY_MS, FUJI_DETACH_INTERVAL_MS, FUJI_DETACH_ATTEMPTS,\n  FUJI_MOUNT_ROOT, FUJI_NO_CAFFEINATE=1\n`);
}

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  if (argv.includes("-h") || argv.includes("--help")) { usage(); return 0; }
  if (argv.includes("-v") || argv.includes("--version")) { console.log(VERSION); return 0; }
  const [command, ...rest] = argv;
  if (!command) { usage(); return 0; }

  if (command === "version") { console.log(VERSION); return 0; }

  const kit = createToolkit(loadSettings());

  if (command === "methods") {
    for (const key of METHOD_KEYS) {
      const s = createStrategy(key, kit);
      console.log(`${key.padEnd(10)} ${s.name}: ${s.description}`);
    }
    return 0;
  }

  if (command === "acquire") {
    const { args } = parseArgs(rest, ACQUIRE_ARGS);
    const method = stringArg(args, "method") ?? "snapshot";
    if (!isMethodKey(method)) throw new Error(`Unknown method: ${method} (expected ${METHOD_KEYS.join(", ")})`);
    const params = parametersFromArgs(args);

    const strategy = createStrategy(method, kit);
    console.log(`Acquisition method: ${strategy.name}`);
    const report = await strategy.execute(params);
    console.log(report.success ? "✓ Acquisition succeeded" : "✗ Acquisition did not complete");
    return report.success ? 0 : 1;
  }

  usage();
  return 1;
}

await main()
  .then((code) => { process.exitCode = code; })
  .catch((e) => {
    console.error(`Error: ${errorMessage(e)}`);
    process.exitCode = 1;
  });
