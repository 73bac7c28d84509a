import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

export const hashBuffer = (data: Buffer) => createHash('sha256').update(data).digest('hex');

/** Streamed: sleep renders run to several GB. */
export async function hashFile(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}
