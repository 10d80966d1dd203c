/**
 * @bank-import/cli — Input expansion.
 *
 * Turns the command-line patterns into the ordered list of statement
 * paths. Patterns expand one at a time, in the order given, each sorted;
 * a pattern that matches nothing is kept as written so the engine
 * reports it as a missing file.
 */

import fg from "fast-glob";

export interface ExpandOptions {
  /** Base directory for relative patterns (default: process.cwd()) */
  readonly cwd?: string | undefined;
}

export async function expandInputs(
  patterns: readonly string[],
  options: ExpandOptions = {},
): Promise<string[]> {
  const paths: string[] = [];

  for (const pattern of patterns) {
    if (!fg.isDynamicPattern(pattern)) {
      paths.push(pattern);
      continue;
    }

    const matches = await fg(pattern, {
      cwd: options.cwd ?? process.cwd(),
      onlyFiles: true,
      dot: false,
    });
    if (matches.length === 0) {
      paths.push(pattern);
    } else {
      paths.push(...matches.sort());
    }
  }

  return paths;
}
