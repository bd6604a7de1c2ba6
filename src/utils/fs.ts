import {
  access,
  chmod,
  lstat,
  mkdir,
  readFile,
  readlink,
  realpath,
  rename,
  rm,
  stat,
  writeFile,
} from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { ConfigIoError } from "../core/errors.js";

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read a text file, resolving to `undefined` when it does not exist.
 * Any other failure (permissions, a directory in the way) is a ConfigIoError.
 */
export async function readTextIfExists(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) return undefined;
    throw new ConfigIoError(`Failed to read ${path}`, path, err);
  }
}

/**
 * Write through a sibling temp file and rename it over the target, creating
 * the parent directory tree first. A symlinked path is written through to the
 * file it points at, and an existing file keeps its permission bits.
 */
export async function writeTextAtomic(path: string, content: string): Promise<void> {
  const target = await resolveWriteTarget(path);
  const dir = dirname(target);
  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    throw new ConfigIoError(`Failed to create directory ${dir}`, path, err);
  }

  const mode = await existingMode(target, path);
  const tmp = `${target}.${process.pid}.tmp`;
  try {
    await writeFile(tmp, content, "utf-8");
    if (mode !== undefined) await chmod(tmp, mode);
    await rename(tmp, target);
  } catch (err) {
    await rm(tmp, { force: true });
    throw new ConfigIoError(`Failed to write ${path}`, path, err);
  }
}

async function resolveWriteTarget(path: string): Promise<string> {
  try {
    return await realpath(path);
  } catch (err) {
    if (!isErrnoCode(err, "ENOENT")) {
      throw new ConfigIoError(`Failed to resolve ${path}`, path, err);
    }
  }

  // Missing file, or a symlink whose target doesn't exist yet
  try {
    const link = await lstat(path);
    if (link.isSymbolicLink()) return resolve(dirname(path), await readlink(path));
  } catch (err) {
    if (!isErrnoCode(err, "ENOENT")) {
      throw new ConfigIoError(`Failed to resolve ${path}`, path, err);
    }
  }
  return path;
}

async function existingMode(target: string, path: string): Promise<number | undefined> {
  try {
    return (await stat(target)).mode & 0o7777;
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) return undefined;
    throw new ConfigIoError(`Failed to read ${path}`, path, err);
  }
}

export function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
