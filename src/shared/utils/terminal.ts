/**
 * Terminal geometry
 */

export const DEFAULT_OUTPUT_WIDTH = 80;

/**
 * Resolve the report width: $COLUMNS, then the attached TTY, then 80.
 */
export function getOutputWidth(
  env: NodeJS.ProcessEnv = process.env,
  stdoutColumns: number | undefined = process.stdout.columns,
): number {
  const columns = env.COLUMNS?.trim() ?? '';
  if (/^\d+$/.test(columns)) {
    const fromEnv = Number.parseInt(columns, 10);
    if (fromEnv > 0) {
      return fromEnv;
    }
  }
  if (stdoutColumns && stdoutColumns > 0) {
    return stdoutColumns;
  }
  return DEFAULT_OUTPUT_WIDTH;
}
