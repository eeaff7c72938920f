import fs from 'fs';
import { safeRm } from 'fs-remove-compat';
import mkdirp from 'mkdirp-classic';
import type { Readable } from 'stream';
import { TEMP_PREFIX } from '../../src/extract/extractEntry.ts';

export class MemoryOutput {
  text = '';

  write(text: string): boolean {
    this.text += text;
    return true;
  }
}

export function readAll(stream: Readable): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const parts: Buffer[] = [];
    stream.on('data', (chunk: Buffer) => parts.push(chunk));
    stream.on('error', reject);
    stream.on('end', () => resolve(Buffer.concat(parts)));
  });
}

export function tempFiles(dest: string): string[] {
  return fs.readdirSync(dest).filter((name) => name.indexOf(TEMP_PREFIX) === 0);
}

export function resetDir(dir: string, callback: (err?: Error | null) => void): void {
  safeRm(dir, () => {
    mkdirp(dir, callback);
  });
}
