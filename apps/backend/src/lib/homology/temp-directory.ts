import { mkdtemp, rm } from "node:fs/promises";
import path from "node:path";

/**
 * Run `fn` with a fresh directory under `root`. The directory and everything
 * in it is removed when `fn` settles, whether it resolved or threw.
 */
export async function withTempDirectory<T>(
  root: string,
  prefix: string,
  fn: (directory: string) => Promise<T>,
): Promise<T> {
  const directory = await mkdtemp(path.join(root, prefix));
  try {
    return await fn(directory);
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
}
