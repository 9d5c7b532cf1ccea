import glob from "fast-glob";

/**
 * List files directly inside `directory` whose name ends with `extension`
 * Sorted by UTF-16 code unit, independent of locale, so the stage 1
 * argument order is the same on every host
 */
export async function listFastaFiles(
  directory: string,
  extension: string,
): Promise<string[]> {
  const files = await glob("*", {
    cwd: directory,
    onlyFiles: true,
    deep: 1,
    dot: true,
  });

  return files
    .filter((name) => name.endsWith(extension))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
