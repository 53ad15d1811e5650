import fs from "fs";
import path from "path";
import dotenv from "dotenv";

// Imported first by the report script so DATA_ROOT and friends are set before
// lib/paths reads them. Earlier files win; dotenv never overrides a set key.
const ENV_FILES = [".env.local", ".env"];

export const loadedEnvFiles: string[] = [];

for (const file of ENV_FILES) {
  const full = path.join(process.cwd(), file);
  if (!fs.existsSync(full)) continue;
  const result = dotenv.config({ path: full });
  if (result.error) {
    throw result.error;
  }
  loadedEnvFiles.push(file);
}
