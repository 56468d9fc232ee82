import { z } from "zod";
import { stringArg, type ArgSpec, type ArgValue } from "./args";

const plainName = z
  .string()
  .min(1, "image name must not be empty")
  .refine((v) => !v.includes("/") && v !== "." && v !== "..", "image name must be a plain file name");

export const ParametersSchema = z.object({
  caseName: z.string().default(""),
  examiner: z.string().default(""),
  notes: z.string().default(""),
  imageName: plainName.default("FujiAcquisition"),
  source: z.string().min(1).default("/"),
  tmp: z.string().min(1).default("/Volumes/Fuji"),
  destination: z.string().min(1).default("/Volumes/Fuji"),
});

export type ParametersInput = z.input<typeof ParametersSchema>;
export type Parameters = Readonly<z.output<typeof ParametersSchema>>;

export function createParameters(input: ParametersInput = {}): Parameters {
  return Object.freeze(ParametersSchema.parse(input));
}

export const ACQUIRE_ARGS: ArgSpec[] = [
  { name: "method", type: "string", alias: "m", default: "snapshot" },
  { name: "case", type: "string" },
  { name: "examiner", type: "string" },
  { name: "notes", type: "string" },
  { name: "name", type: "string" },
  { name: "source", type: "string" },
  { name: "tmp", type: "string" },
  { name: "destination", type: "string" },
];

export function parametersFromArgs(args: Record<string, ArgValue>): Parameters {
  return createParameters({
    caseName: stringArg(args, "case"),
    examiner: stringArg(args, "examiner"),
    notes: stringArg(args, "notes"),
    imageName: stringArg(args, "name"),
    source: stringArg(args, "source"),
    tmp: stringArg(args, "tmp"),
    destination: stringArg(args, "destination"),
  });
}
