import { fsa, FsS3 } from '@linzjs/s3fs';
import S3 from 'aws-sdk/clients/s3.js';
import type { LogType } from './log.js';

/**
 * Register s3:// sources with fsa
 *
 * @param flags.endpoint optional S3 compatible endpoint, "host" is expanded to "http://host:8080"
 */
export function registerS3(flags: { endpoint?: string; verbose?: boolean }, log: LogType): S3 {
  if (flags.verbose) log.level = 'trace';

  let endpoint = flags.endpoint;
  if (endpoint != null && !endpoint.startsWith('http')) endpoint = 'http://' + endpoint + ':8080';

  const client = endpoint ? new S3({ endpoint, s3ForcePathStyle: true }) : new S3();
  fsa.register('s3://', new FsS3(client));
  log.debug({ endpoint }, 'RegisterS3');
  return client;
}
