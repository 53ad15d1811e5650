import path from "path";

export const DATA_ROOT = process.env.DATA_ROOT || path.join(process.cwd(), "data");

// Bundled monthly series
export const DEFAULT_DATASET_PATH = path.join(DATA_ROOT, "co2.json");

export const DEFAULT_OUT_DIR = path.join(process.cwd(), "out");

export function artifactPath(outDir: string, name: string) {
  return path.join(outDir, name);
}
