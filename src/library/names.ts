/** Line ending for files read by the Windows front-end. */
export const EOL = "\r\n";

/** Case-insensitive ordering, matching how Explorer lists a folder. */
export function compareNames(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Names that resolve to the same entry on a case-insensitive filesystem. */
export function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/** Split a file into trimmed, non-empty lines, skipping `#` comments. */
export function parseNameList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}
