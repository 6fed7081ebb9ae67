// ── File utilities ───────────────────────────────────────────────────────────

import * as fs from "node:fs";

/**
 * Write a file by writing a sibling temp file and renaming it over the target.
 * Readers see either the previous content or the complete new content.
 * The temp file is removed when any step fails; the error is rethrown.
 */
export function writeFileAtomic(target: string, data: string): void {
  const temp = `${target}.${process.pid}.tmp`;
  try {
    fs.writeFileSync(temp, data, "utf8");
    fs.renameSync(temp, target);
  } catch (err) {
    fs.rmSync(temp, { force: true });
    throw err;
  }
}
