import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { pino } from 'pino';
import * as tar from 'tar-stream';
import { gzipSync } from 'zlib';

export const silentLogger = pino({ level: 'silent' });

export interface TarEntry {
  name: string;
  content?: string;
  type?: 'file' | 'directory' | 'symlink' | 'link';
  mode?: number;
  linkname?: string;
}

/** Build a tar in memory, gzipped when requested */
export async function createTar(entries: TarEntry[], gzip = false): Promise<Buffer> {
  const pack = tar.pack();
  for (const entry of entries) {
    if (entry.type === 'directory') pack.entry({ name: entry.name, type: 'directory', mode: entry.mode ?? 0o755 });
    else if (entry.type === 'symlink' || entry.type === 'link') {
      pack.entry({ name: entry.name, type: entry.type, linkname: entry.linkname });
    }
    else pack.entry({ name: entry.name, mode: entry.mode ?? 0o644 }, entry.content ?? '');
  }
  pack.finalize();

  const chunks: Buffer[] = [];
  for await (const chunk of pack) chunks.push(chunk);
  const buf = Buffer.concat(chunks);
  return gzip ? gzipSync(buf) : buf;
}

export function tempDir(prefix = 'provision-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** List every path below `dir` relative to it, sorted */
export async function listTree(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { recursive: true });
  return entries.sort();
}

/** Await a promise that must reject with an error of `type` */
export async function rejects<T extends Error>(p: Promise<unknown>, type: new (...args: never[]) => T): Promise<T> {
  try {
    await p;
  } catch (e) {
    if (e instanceof type) return e;
    throw e;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}
