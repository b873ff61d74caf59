import { boolean, flag, option, optional, string } from 'cmd-ts';
import { performance } from 'perf_hooks';
import { DefaultConfigPath } from '../dependency.loader.js';

export const verbose = flag({
  long: 'verbose',
  type: boolean,
  defaultValue: () => false,
  description: 'Verbose logging',
});
export const endpoint = option({
  long: 'endpoint',
  type: optional(string),
  description: 'S3 endpoint to use for s3:// sources',
});
export const config = option({
  long: 'config',
  type: string,
  defaultValue: () => DefaultConfigPath,
  defaultValueIsSerializable: true,
  description: 'Dependency declarations (JSON)',
});
export const root = option({
  long: 'root',
  type: string,
  defaultValue: () => '/',
  defaultValueIsSerializable: true,
  description: 'Root directory destinations are installed under',
});

/** Track ms since a performance.now() call limited to 4dp */
export function msSince(lastTick: number): number {
  return Number((performance.now() - lastTick).toFixed(4));
}
