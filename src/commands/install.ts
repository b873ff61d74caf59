import { boolean, command, flag, number, option, optional, string } from 'cmd-ts';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { performance } from 'perf_hooks';
import { DependencyLoader } from '../dependency.loader.js';
import { BackOff } from '../fetch.js';
import { logger } from '../log.js';
import { ProvisionPipeline } from '../pipeline.js';
import { registerS3 } from '../s3.js';
import { Tracer } from '../tracer.js';
import { getVersion } from '../version.js';
import { config, endpoint, msSince, root, verbose } from './common.js';

export const commandInstall = command({
  name: 'install',
  description: 'Fetch, verify and install the declared dependencies',
  args: {
    verbose,
    endpoint,
    config,
    root,
    staging: option({
      long: 'staging',
      type: optional(string),
      description: 'Staging directory for downloads, defaults to a temporary directory',
    }),
    requireHash: flag({
      long: 'require-hash',
      type: boolean,
      description: 'Fail any dependency without an expected hash',
    }),
    retries: option({
      long: 'retries',
      type: number,
      description: 'Download attempts per dependency',
      defaultValue: () => BackOff.count,
      defaultValueIsSerializable: true,
    }),
  },
  handler: (args) => {
    return Tracer.startRootSpan('command:install', async (span) => {
      const startTime = performance.now();
      if (args.verbose) logger.level = 'trace';
      registerS3(args, logger);
      logger.info({ ...getVersion(), config: args.config, root: args.root }, 'Install:Start');

      if (!Number.isInteger(args.retries) || args.retries < 1) throw new Error('--retries must be a positive integer');

      const loader = await DependencyLoader.load(args.config, logger);
      span.setAttribute('dependencies', loader.dependencies.length);

      const staging = args.staging ?? (await fs.mkdtemp(path.join(os.tmpdir(), 'provision-')));
      try {
        const pipeline = new ProvisionPipeline({
          root: args.root,
          staging,
          logger,
          requireHash: args.requireHash,
          retry: { ...BackOff, count: args.retries },
        });
        const reports = await pipeline.run(loader.dependencies);
        const unverified = reports.filter((r) => r.hash == null).map((r) => r.name);
        if (unverified.length > 0) logger.warn({ dependencies: unverified }, 'Install:Unverified');
      } finally {
        // Only remove directories this command created
        if (args.staging == null) await fs.rm(staging, { recursive: true, force: true });
      }

      logger.info({ root: args.root, duration: msSince(startTime) }, 'Install:Done');
    });
  },
});
