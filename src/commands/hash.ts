import { fsa } from '@linzjs/s3fs';
import { command, oneOf, option, restPositionals, string } from 'cmd-ts';
import { hashFile, HashAlgorithms } from '../hash.js';
import { logger } from '../log.js';
import { registerS3 } from '../s3.js';
import { Tracer } from '../tracer.js';
import { endpoint, verbose } from './common.js';

export const commandHash = command({
  name: 'hash',
  description: 'Hash archives, for use as an expectedHash',
  args: {
    verbose,
    endpoint,
    algorithm: option({
      long: 'algorithm',
      type: oneOf(HashAlgorithms),
      defaultValue: () => 'sha256' as const,
      defaultValueIsSerializable: true,
      description: 'Hash algorithm',
    }),
    files: restPositionals({ type: string, displayName: 'FILE' }),
  },
  handler: (args) => {
    return Tracer.startRootSpan('command:hash', async () => {
      registerS3(args, logger);
      if (args.files.length === 0) throw new Error('No files to hash');
      for (const file of args.files) {
        const hash = await hashFile(fsa.readStream(file), args.algorithm);
        logger.info({ path: file, hash }, 'Hash:Done');
      }
    });
  },
});
