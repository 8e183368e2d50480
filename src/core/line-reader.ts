import { createInterface } from 'node:readline';

/**
 * 逐行讀取 stream（例如 stdin），直到輸入結束
 */
export async function readLines(
  input: NodeJS.ReadableStream,
  onLine: (line: string) => void
): Promise<void> {
  const rl = createInterface({ input, crlfDelay: Infinity });

  for await (const line of rl) {
    onLine(line);
  }
}
