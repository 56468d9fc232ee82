import { describe, it, expect } from "vitest";
import { parseArgs } from "../src/lib/args";
import { ACQUIRE_ARGS, createParameters, parametersFromArgs } from "../src/lib/params";

describe("args parser", () => {
  it("parses flags and positionals", () => {
    const { args, positional } = parseArgs(["--foo", "bar", "-n", "3", "pos1", "pos2"], [
      { name: "foo", type: "string" },
      { name: "n", type: "number", alias: "n" },
    ]);
    expect(args.foo).toBe("bar");
    expect(args.n).toBe(3);
    expect(positional).toEqual(["pos1", "pos2"]);
  });

  it("rejects unknown flags and missing values", () => {
    expect(() => parseArgs(["--nope"], ACQUIRE_ARGS)).toThrow("Unknown argument: --nope");
    expect(() => parseArgs(["--case"], ACQUIRE_ARGS)).toThrow("Missing value for --case");
  });

  it("rejects non-numeric values for number flags", () => {
    expect(() => parseArgs(["-n", "three"], [{ name: "n", type: "number", alias: "n" }])).toThrow(
      "Invalid number for -n: three",
    );
  });
});

describe("acquisition parameters", () => {
  it("builds parameters from acquire flags", () => {
    const { args } = parseArgs(
      ["--case", "CASE1", "--examiner", "Examiner", "--name", "Evidence", "--source", "/Volumes/Src", "--destination", "/Volumes/Out"],
      ACQUIRE_ARGS,
    );
    expect(args.method).toBe("snapshot");
    expect(parametersFromArgs(args)).toEqual({
      caseName: "CASE1",
      examiner: "Examiner",
      notes: "",
      imageName: "Evidence",
      source: "/Volumes/Src",
      tmp: "/Volumes/Fuji",
      destination: "/Volumes/Out",
    });
  });

  it("fills defaults and freezes the result", () => {
    const params = createParameters();
    expect(params.imageName).toBe("FujiAcquisition");
    expect(params.source).toBe("/");
    expect(Object.isFrozen(params)).toBe(true);
  });

  it("rejects image names that are paths", () => {
    expect(() => createParameters({ imageName: "../escape" })).toThrow("image name must be a plain file name");
    expect(() => createParameters({ imageName: "" })).toThrow("image name must not be empty");
  });
});
