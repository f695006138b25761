import { constants as fsConstants, promises as fs } from "fs";
import * as path from "path";

export type JsonReadResult =
  | { status: "missing" }
  | { status: "ok"; value: unknown }
  | { status: "invalid"; reason: string; cause: unknown };

export async function readJsonFile(file: string): Promise<JsonReadResult> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      return { status: "missing" };
    }
    throw err;
  }

  try {
    return { status: "ok", value: JSON.parse(text) };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { status: "invalid", reason: `invalid JSON (${reason})`, cause: err };
  }
}

export async function writeJsonFile(file: string, value: unknown): Promise<void> {
  const bytes = Buffer.from(`${JSON.stringify(value, null, 2)}\n`, "utf8");
  await atomicWrite(file, bytes);
}

/**
 * Writes through a sibling `.tmp` file and renames it over the target.
 * The previous content is kept as `<file>.bak`.
 */
export async function atomicWrite(file: string, bytes: Uint8Array): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const tempFile = `${file}.tmp`;
  const backupFile = `${file}.bak`;
  try {
    await fs.writeFile(tempFile, bytes);
    if (await pathExists(file)) {
      await fs.copyFile(file, backupFile);
    }
    await fs.rename(tempFile, file);
  } catch (err) {
    await fs.rm(tempFile, { force: true });
    throw err;
  }
}

/**
 * Copies `file` to `<file>.corrupt-<stamp>`, adding a counter when that name
 * is taken, so no later write can overwrite the copy. Resolves to the copy's
 * path, or undefined when `file` no longer exists.
 */
export async function preserveCopy(file: string, stamp: string): Promise<string | undefined> {
  for (let attempt = 0; ; attempt++) {
    const target = attempt === 0 ? `${file}.corrupt-${stamp}` : `${file}.corrupt-${stamp}-${attempt}`;
    try {
      await fs.copyFile(file, target, fsConstants.COPYFILE_EXCL);
      return target;
    } catch (err) {
      if (hasErrorCode(err, "ENOENT")) {
        return undefined;
      }
      if (!hasErrorCode(err, "EEXIST")) {
        throw err;
      }
    }
  }
}

export async function pathExists(candidate: string): Promise<boolean> {
  try {
    await fs.stat(candidate);
    return true;
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      return false;
    }
    throw err;
  }
}

function hasErrorCode(err: unknown, code: string): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === code
  );
}
