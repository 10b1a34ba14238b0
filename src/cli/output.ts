/**
 * CLI output helpers.
 *
 * Everything goes through process.stdout/stderr.write so tests can spy on
 * it. Results on stdout, diagnostics on stderr. No colors.
 */
export const output = {
  info(message: string): void {
    process.stdout.write(message + '\n')
  },

  /** Prefixed with "OK:" */
  success(message: string): void {
    process.stdout.write('OK: ' + message + '\n')
  },

  /** Prefixed with "Error:", on stderr */
  error(message: string): void {
    process.stderr.write('Error: ' + message + '\n')
  },

  /** Prefixed with "Warning:", on stderr */
  warn(message: string): void {
    process.stderr.write('Warning: ' + message + '\n')
  },

  /** Pretty-printed JSON document on stdout */
  json(value: unknown): void {
    process.stdout.write(JSON.stringify(value, null, 2) + '\n')
  },

  /** Simple aligned table on stdout; columns come from the first row */
  table(rows: Record<string, string>[]): void {
    if (rows.length === 0) return
    const keys = Object.keys(rows[0])
    const widths = keys.map((k) => Math.max(k.length, ...rows.map((row) => (row[k] ?? '').length)))
    const render = (cells: string[]): string =>
      cells.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd()

    process.stdout.write(render(keys) + '\n')
    process.stdout.write(widths.map((w) => '-'.repeat(w)).join('  ') + '\n')
    for (const row of rows) {
      process.stdout.write(render(keys.map((k) => row[k] ?? '')) + '\n')
    }
  },
}
