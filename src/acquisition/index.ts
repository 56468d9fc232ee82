import { SnapshotMountStrategy } from "./snapshot";
import { SparseImageStrategy } from "./sparse";
import type { AcquisitionStrategy, AcquisitionToolkit } from "./strategy";

export { SnapshotMountStrategy } from "./snapshot";
export { SparseImageStrategy } from "./sparse";
export { createToolkit, type AcquisitionStrategy, type AcquisitionToolkit, type ToolkitOverrides } from "./strategy";

export const METHOD_KEYS = ["snapshot", "sparse"] as const;
export type MethodKey = (typeof METHOD_KEYS)[number];

export function isMethodKey(value: string): value is MethodKey {
  return (METHOD_KEYS as readonly string[]).includes(value);
}

export function createStrategy(key: MethodKey, kit: AcquisitionToolkit): AcquisitionStrategy {
  switch (key) {
    case "snapshot": return new SnapshotMountStrategy(kit);
    case "sparse":   return new SparseImageStrategy(kit);
  }
}
