/** Timestamped progress line, e.g. `14:02:11 [move ] reveal (3,4)`. */
export function formatLine(tag: string, message: string, at: Date = new Date()): string {
  const ts = at.toISOString().slice(11, 19);
  return `${ts} [${tag.padEnd(5)}] ${message}`;
}

export function log(tag: string, message: string): void {
  console.log(formatLine(tag, message));
}
