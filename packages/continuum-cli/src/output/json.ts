/**
 * JSON output format: machine-readable, one document per command.
 */

export function formatJson(data: unknown): string {
  return JSON.stringify(data ?? null, null, 2) + '\n';
}
