import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

/** Answers whether an executable can be found on the search path. */
export type BinaryLocator = (binary: string) => Promise<boolean>;

/**
 * Look a binary up with `which` (`where` on Windows). A missing lookup tool
 * and a non-zero exit both read as "not found".
 */
export const findOnPath: BinaryLocator = async (binary) => {
  const lookup = process.platform === "win32" ? "where" : "which";
  try {
    await execFileAsync(lookup, [binary], { windowsHide: true });
    return true;
  } catch {
    return false;
  }
};

/**
 * Run `<binary> <args>` and return trimmed stdout, or null when the command
 * can't be run or fails.
 */
export async function commandOutput(
  binary: string,
  args: string[],
  timeoutMs: number
): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync(binary, args, {
      timeout: timeoutMs,
      windowsHide: true,
    });
    const text = stdout.toString().trim();
    return text.length > 0 ? text : null;
  } catch {
    return null;
  }
}
