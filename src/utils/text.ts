/**
 * 拆行，容許 CRLF；結尾換行不會產生多餘的空行
 */
export function splitLines(text: string): string[] {
  if (!text) return [];

  const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}
