import { fsa } from '@linzjs/s3fs';
import { createWriteStream, promises as fs } from 'fs';
import { performance } from 'perf_hooks';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { msSince } from './commands/common.js';
import { ErrorList, toError } from './error.list.js';
import { FetchError } from './errors.js';
import type { LogType } from './log.js';

export interface RetryOptions {
  /** Number of download attempts */
  count: number;
  /** Back off time in ms, multiplied by the number of failed attempts */
  time: number;
}

export const BackOff: RetryOptions = {
  count: 3,
  time: 500,
};

/** Subset of the global fetch used to download archives */
export type FetchFn = (url: string) => Promise<Response>;

export interface FetchOptions {
  /** Dependency name reported on failure */
  dependency: string;
  logger: LogType;
  fetch?: FetchFn;
  /** Defaults to {@link BackOff} */
  retry?: RetryOptions;
}

function isHttp(source: string): boolean {
  return source.startsWith('https://') || source.startsWith('http://');
}

async function download(source: string, target: string, opts: FetchOptions): Promise<void> {
  if (!isHttp(source)) {
    // s3:// and local paths
    await pipeline(fsa.readStream(source), createWriteStream(target));
    return;
  }

  const fetchFn = opts.fetch ?? fetch;
  const res = await fetchFn(source);
  if (!res.ok) {
    await res.body?.cancel();
    throw new FetchError(opts.dependency, `HTTP ${res.status} from ${source}`, undefined, res.status);
  }
  if (res.body == null) throw new Error(`Empty response from ${source}`);
  await pipeline(Readable.fromWeb(res.body), createWriteStream(target));
}

/**
 * Download an archive to a local file, overwriting the file if it exists.
 *
 * Connection failures are retried `retry.count` times with a linear back off,
 * a server responding with a non 2xx status is not retried.
 */
export async function fetchArchive(source: string, target: string, opts: FetchOptions): Promise<void> {
  const retry = opts.retry ?? BackOff;
  const fetchErrors: Error[] = [];
  const startTime = performance.now();
  opts.logger.info({ source, target }, 'Fetch:Start');

  while (fetchErrors.length < retry.count) {
    try {
      await download(source, target, opts);
      const stat = await fs.stat(target);
      opts.logger.info({ source, size: stat.size, duration: msSince(startTime) }, 'Fetch:Done');
      return;
    } catch (e) {
      if (e instanceof FetchError) throw e;
      fetchErrors.push(toError(e));
      if (fetchErrors.length === retry.count) break;

      opts.logger.warn({ source, attempt: fetchErrors.length, err: e }, 'Fetch:Retry');
      // Sleep for back off
      await new Promise((resolve) => setTimeout(resolve, retry.time * fetchErrors.length));
    }
  }
  throw new FetchError(
    opts.dependency,
    `Failed to fetch ${source} after ${fetchErrors.length} attempts`,
    new ErrorList('FetchRetriesFailed', fetchErrors),
  );
}
