import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Absolute path of a file kept at the project root (migrations/, sql/).
 * Sources run from server/, compiled output from dist/server/.
 */
export function resolveProjectPath(...segments: string[]): string {
  const candidates = [
    path.join(__dirname, "..", ...segments),
    path.join(__dirname, "..", "..", ...segments),
  ];
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`Project file not found: ${segments.join("/")}`);
  }
  return found;
}
