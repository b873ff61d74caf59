import { once } from 'events';
import { createReadStream, promises as fs } from 'fs';
import * as path from 'path';
import { performance } from 'perf_hooks';
import { Readable } from 'stream';
import * as tar from 'tar-stream';
import { createGunzip } from 'zlib';
import { msSince } from './commands/common.js';
import { ExtractError } from './errors.js';
import type { LogType } from './log.js';

export type ArchiveFormat = 'tar' | 'tar+gzip';

export interface ExtractOptions {
  dependency: string;
  logger: LogType;
}

export interface ExtractStats {
  files: number;
  directories: number;
  links: number;
  /** Entries removed by strip components, hard links and other unsupported types */
  skipped: number;
}

/** Tar headers carry "ustar" at this offset */
const TarMagicOffset = 257;

/** Detect the archive format from its leading bytes */
export async function detectFormat(archive: string): Promise<ArchiveFormat | null> {
  const fd = await fs.open(archive, 'r');
  try {
    const buf = Buffer.alloc(512);
    const { bytesRead } = await fd.read(buf, 0, buf.length, 0);
    if (bytesRead >= 2 && buf[0] === 0x1f && buf[1] === 0x8b) return 'tar+gzip';
    if (bytesRead >= TarMagicOffset + 5 && buf.toString('ascii', TarMagicOffset, TarMagicOffset + 5) === 'ustar') {
      return 'tar';
    }
    return null;
  } finally {
    await fd.close();
  }
}

/**
 * Remove the first `strip` segments from an archive entry name
 *
 * @returns the remaining relative path, or null when nothing remains
 */
export function stripPath(name: string, strip: number): string | null {
  const parts = name.split('/').filter((p) => p !== '');
  if (parts.length <= strip) return null;
  return parts.slice(strip).join('/');
}

/** Resolve `rel` inside `root`, refusing anything that escapes it */
function resolveInside(root: string, rel: string): string {
  const dest = path.resolve(root, rel);
  if (dest !== root && !dest.startsWith(root + path.sep)) throw new Error(`Entry escapes target: ${rel}`);
  return dest;
}

function isMissing(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

/**
 * Refuse to write below a symlink already on disk.
 *
 * Links recreated from earlier entries could otherwise redirect later entries outside `root`.
 */
async function assertNoLinkedParent(root: string, rel: string): Promise<void> {
  let current = root;
  for (const part of path.dirname(rel).split('/')) {
    if (part === '.' || part === '') continue;
    current = path.join(current, part);
    const stat = await fs.lstat(current).catch((e: unknown) => {
      if (isMissing(e)) return null;
      throw e;
    });
    if (stat == null) return;
    if (stat.isSymbolicLink()) throw new Error(`Entry is below a symlink: ${rel}`);
  }
}

async function drain(stream: Readable): Promise<void> {
  stream.resume();
  await once(stream, 'end');
}

async function writeEntry(
  header: tar.Headers,
  stream: Readable,
  root: string,
  strip: number,
  stats: ExtractStats,
): Promise<void> {
  const rel = stripPath(header.name, strip);
  if (rel == null) {
    stats.skipped++;
    return drain(stream);
  }
  const dest = resolveInside(root, rel);
  await assertNoLinkedParent(root, rel);

  switch (header.type) {
    case 'directory':
      await fs.mkdir(dest, { recursive: true });
      stats.directories++;
      return drain(stream);

    case 'symlink': {
      const linkName = header.linkname ?? '';
      if (linkName === '' || path.isAbsolute(linkName)) throw new Error(`Invalid symlink ${rel} -> ${linkName}`);
      resolveInside(root, path.join(path.dirname(rel), linkName));
      await fs.mkdir(path.dirname(dest), { recursive: true });
      await fs.rm(dest, { force: true });
      await fs.symlink(linkName, dest);
      stats.links++;
      return drain(stream);
    }

    case 'file':
    case 'contiguous-file':
      return writeFile(header, stream, dest, stats);

    default:
      // Old style archives omit the type for regular files
      if (header.type == null) return writeFile(header, stream, dest, stats);
      // Hard links, devices and fifos
      stats.skipped++;
      return drain(stream);
  }
}

async function writeFile(header: tar.Headers, stream: Readable, dest: string, stats: ExtractStats): Promise<void> {
  const mode = (header.mode ?? 0o644) & 0o777;
  await fs.mkdir(path.dirname(dest), { recursive: true });
  // Replace rather than write through any existing file or link
  await fs.rm(dest, { force: true });
  const fh = await fs.open(dest, 'wx', mode);
  try {
    for await (const chunk of stream) await fh.write(chunk);
  } finally {
    await fh.close();
  }
  // open() applies the umask
  await fs.chmod(dest, mode);
  stats.files++;
}

function unpack(input: Readable, root: string, strip: number): Promise<ExtractStats> {
  return new Promise((resolve, reject) => {
    const stats: ExtractStats = { files: 0, directories: 0, links: 0, skipped: 0 };
    const extract = tar.extract();

    extract.on('entry', (header, stream, next) => {
      // Truncated archives fail the entry stream before the archive
      stream.on('error', (err) => extract.destroy(err));
      writeEntry(header, stream, root, strip, stats).then(
        () => next(),
        (err) => {
          stream.resume();
          extract.destroy(err);
        },
      );
    });
    extract.on('finish', () => resolve(stats));
    extract.on('error', reject);
    input.on('error', (err) => extract.destroy(err));

    input.pipe(extract);
  });
}

/**
 * Unpack a tar or gzipped tar into `target`, dropping the first `stripComponents` segments of every entry.
 *
 * `target` is created if missing.
 */
export async function extractArchive(
  archive: string,
  target: string,
  stripComponents: number,
  opts: ExtractOptions,
): Promise<ExtractStats> {
  const startTime = performance.now();
  const root = path.resolve(target);

  let format: ArchiveFormat | null;
  try {
    format = await detectFormat(archive);
  } catch (e) {
    throw new ExtractError(opts.dependency, `Unable to read ${archive}`, e);
  }
  if (format == null) throw new ExtractError(opts.dependency, `Unsupported archive format: ${archive}`);

  opts.logger.info({ archive, target: root, format, stripComponents }, 'Extract:Start');

  const source = createReadStream(archive);
  const input = format === 'tar+gzip' ? source.pipe(createGunzip()) : source;
  if (format === 'tar+gzip') source.on('error', (err) => input.destroy(err));

  try {
    await fs.mkdir(root, { recursive: true });
    const stats = await unpack(input, root, stripComponents);
    opts.logger.info({ archive, ...stats, duration: msSince(startTime) }, 'Extract:Done');
    return stats;
  } catch (e) {
    source.destroy();
    throw new ExtractError(opts.dependency, `Failed to extract ${archive}`, e);
  }
}
