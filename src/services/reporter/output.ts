/**
 * Sink for operator-facing lines (check results, status tables).
 * Kept apart from the logger, which writes diagnostics to stderr.
 */
export type OutputWriter = (line: string) => void;

export const consoleOutput: OutputWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

/**
 * Collects lines in memory
 */
export function bufferedOutput(): { write: OutputWriter; lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    write: (line) => {
      lines.push(line);
    },
  };
}
