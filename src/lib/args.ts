export type ArgType = "string" | "boolean" | "number";
export type ArgValue = string | boolean | number;
export type ArgSpec = { name: string; type: ArgType; alias?: string; default?: ArgValue };

export function parseArgs(argv: string[], specs: ArgSpec[]) {
  const map = new Map<string, ArgSpec>();
  for (const s of specs) {
    map.set(`--${s.name}`, s);
    if (s.alias) map.set(`-${s.alias}`, s);
  }
  const result: Record<string, ArgValue> = {};
  for (const s of specs) {
    if (s.default !== undefined) result[s.name] = s.default;
  }
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const tok = argv[i];
    if (!tok.startsWith('-')) { positional.push(tok); continue; }
    const spec = map.get(tok);
    if (!spec) throw new Error(`Unknown argument: ${tok}`);
    if (spec.type === 'boolean') {
      result[spec.name] = true;
    } else {
      const val = argv[++i];
      if (val === undefined) throw new Error(`Missing value for ${tok}`);
      if (spec.type === 'number') {
        const n = Number(val);
        if (!Number.isFinite(n)) throw new Error(`Invalid number for ${tok}: ${val}`);
        result[spec.name] = n;
      } else {
        result[spec.name] = val;
      }
    }
  }
  return { args: result, positional };
}

export function stringArg(args: Record<string, ArgValue>, name: string): string | undefined {
  const v = args[name];
  return typeof v === "string" ? v : undefined;
}
