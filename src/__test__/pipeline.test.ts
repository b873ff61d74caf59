import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import o from 'ospec';
import * as path from 'path';
import sinon from 'sinon';
import type { DependencySpec } from '../dependency.js';
import { ExtractError, FetchError, InstallError, IntegrityError } from '../errors.js';
import { BackOff } from '../fetch.js';
import { DependencyRun, ProvisionPipeline } from '../pipeline.js';
import { createTar, listTree, rejects, silentLogger, tempDir } from './util.js';

const SparkUrl = 'https://archive.example.com/spark-3.0.1-bin-hadoop2.7.tgz';
const HadoopUrl = 'https://archive.example.com/hadoop-2.10.1.tar.gz';

const spark: DependencySpec = {
  name: 'spark',
  version: '3.0.1',
  sourceUrl: SparkUrl,
  stripComponents: 1,
  directories: ['/opt/spark', '/opt/spark/work-dir'],
  markers: ['/opt/spark/RELEASE'],
  copyRules: [
    { source: 'jars', target: '/opt/spark/jars' },
    { source: 'bin', target: '/opt/spark/bin' },
    { source: 'kubernetes/dockerfiles/spark/entrypoint.sh', target: '/opt/entrypoint.sh', executable: true },
  ],
};

const hadoop: DependencySpec = {
  name: 'hadoop-aws',
  version: '2.10.1',
  sourceUrl: HadoopUrl,
  stripComponents: 1,
  directories: [],
  markers: [],
  copyRules: [
    {
      source: 'share/hadoop/tools/lib/hadoop-aws-2.10.1.jar',
      target: '/opt/spark/jars/hadoop-aws-2.10.1.jar',
    },
  ],
};

function sparkArchive(): Promise<Buffer> {
  return createTar(
    [
      { name: 'spark-3.0.1-bin-hadoop2.7/', type: 'directory' },
      { name: 'spark-3.0.1-bin-hadoop2.7/jars/spark-core_2.12-3.0.1.jar', content: 'core' },
      { name: 'spark-3.0.1-bin-hadoop2.7/bin/spark-submit', content: '#!/usr/bin/env bash', mode: 0o755 },
      { name: 'spark-3.0.1-bin-hadoop2.7/kubernetes/dockerfiles/spark/entrypoint.sh', content: '#!/bin/bash' },
    ],
    true,
  );
}

function hadoopArchive(): Promise<Buffer> {
  return createTar(
    [
      { name: 'hadoop-2.10.1/share/hadoop/tools/lib/hadoop-aws-2.10.1.jar', content: 'aws' },
      { name: 'hadoop-2.10.1/share/hadoop/tools/lib/aws-java-sdk-bundle-1.11.271.jar', content: 'sdk' },
    ],
    true,
  );
}

o.spec('ProvisionPipeline', () => {
  o.specTimeout(5000);
  const sandbox: sinon.SinonSandbox = sinon.createSandbox();
  const backOff = { ...BackOff };
  let root: string;
  let staging: string;
  let archives: Map<string, Buffer>;

  /** Serve the in memory archives by url */
  function fakeFetch(): sinon.SinonStub {
    return sandbox.stub().callsFake(async (url: string) => {
      const buf = archives.get(url);
      if (buf == null) return new Response('Not Found', { status: 404 });
      return new Response(buf);
    });
  }

  o.before(() => {
    BackOff.count = 3;
    BackOff.time = 1;
  });

  o.after(() => {
    Object.assign(BackOff, backOff);
  });

  o.beforeEach(async () => {
    root = await tempDir('provision-root-');
    staging = await tempDir('provision-staging-');
    archives = new Map([
      [SparkUrl, await sparkArchive()],
      [HadoopUrl, await hadoopArchive()],
    ]);
  });

  o.afterEach(async () => {
    sandbox.restore();
    await fs.rm(root, { recursive: true, force: true });
    await fs.rm(staging, { recursive: true, force: true });
  });

  o('should provision a spark archive end to end', async () => {
    const fetch = fakeFetch();
    const pipeline = new ProvisionPipeline({ root, staging, logger: silentLogger, fetch });

    const reports = await pipeline.run([spark, hadoop]);
    o(reports.map((r) => r.name)).deepEquals(['spark', 'hadoop-aws']);
    o(reports[0].states).deepEquals(['Pending', 'Fetched', 'Verified', 'Extracted', 'Installed', 'Cleaned']);
    o(reports[0].hash).equals(undefined);

    const release = await fs.stat(path.join(root, 'opt/spark/RELEASE'));
    o(release.isFile()).equals(true);
    o(release.size).equals(0);
    const entrypoint = await fs.stat(path.join(root, 'opt/entrypoint.sh'));
    o(entrypoint.mode & 0o777).equals(0o755);

    o((await fs.readdir(path.join(root, 'opt/spark/jars'))).sort()).deepEquals([
      'hadoop-aws-2.10.1.jar',
      'spark-core_2.12-3.0.1.jar',
    ]);
    o(await fs.readdir(staging)).deepEquals([]);
  });

  o('should verify archives with an expected hash', async () => {
    const buf = archives.get(SparkUrl) ?? Buffer.alloc(0);
    const expectedHash = 'sha256-' + createHash('sha256').update(buf).digest('base64');
    const pipeline = new ProvisionPipeline({ root, staging, logger: silentLogger, fetch: fakeFetch() });

    const reports = await pipeline.run([{ ...spark, expectedHash }]);
    o(reports[0].hash).equals(expectedHash);
  });

  o('should fail an unreachable url without touching the destination', async () => {
    const fetch = sandbox.stub().rejects(new TypeError('fetch failed'));
    const pipeline = new ProvisionPipeline({ root, staging, logger: silentLogger, fetch });

    const err = await rejects(pipeline.run([spark]), FetchError);
    o(err.dependency).equals('spark');
    o(fetch.callCount).equals(3);
    o(await fs.readdir(root)).deepEquals([]);
    o(await fs.readdir(staging)).deepEquals([]);
  });

  o('should clean up after a hash mismatch', async () => {
    const pipeline = new ProvisionPipeline({ root, staging, logger: silentLogger, fetch: fakeFetch() });

    const err = await rejects(pipeline.run([{ ...spark, expectedHash: 'sha256:' + '0'.repeat(64) }]), IntegrityError);
    o(err.dependency).equals('spark');
    o(await fs.readdir(root)).deepEquals([]);
    o(await fs.readdir(staging)).deepEquals([]);
  });

  o('should require hashes when asked', async () => {
    const pipeline = new ProvisionPipeline({
      root,
      staging,
      logger: silentLogger,
      fetch: fakeFetch(),
      requireHash: true,
    });

    await rejects(pipeline.run([spark]), IntegrityError);
    o(await fs.readdir(root)).deepEquals([]);
  });

  o('should clean up after a corrupt archive', async () => {
    archives.set(SparkUrl, Buffer.from('<html>mirror error page</html>'));
    const pipeline = new ProvisionPipeline({ root, staging, logger: silentLogger, fetch: fakeFetch() });

    const err = await rejects(pipeline.run([spark]), ExtractError);
    o(err.step).equals('extract');
    o(await fs.readdir(root)).deepEquals([]);
    o(await fs.readdir(staging)).deepEquals([]);
  });

  o('should clean up after a truncated download', async () => {
    const full = await createTar([
      { name: 'spark-3.0.1-bin-hadoop2.7/jars/spark-core_2.12-3.0.1.jar', content: 'x'.repeat(4096) },
    ]);
    archives.set(SparkUrl, full.subarray(0, 1024));
    const pipeline = new ProvisionPipeline({ root, staging, logger: silentLogger, fetch: fakeFetch() });

    const err = await rejects(pipeline.run([spark]), ExtractError);
    o(err.dependency).equals('spark');
    o(await fs.readdir(root)).deepEquals([]);
    o(await fs.readdir(staging)).deepEquals([]);
  });

  o('should pass retry options to the fetcher', async () => {
    const fetch = sandbox.stub().rejects(new TypeError('fetch failed'));
    const pipeline = new ProvisionPipeline({ root, staging, logger: silentLogger, fetch, retry: { count: 1, time: 1 } });

    await rejects(pipeline.run([spark]), FetchError);
    o(fetch.callCount).equals(1);
  });

  o('should clean up after a failed install', async () => {
    const broken: DependencySpec = { ...spark, copyRules: [{ source: 'examples', target: '/opt/spark/examples' }] };
    const pipeline = new ProvisionPipeline({ root, staging, logger: silentLogger, fetch: fakeFetch() });

    const err = await rejects(pipeline.run([broken]), InstallError);
    o(err.index).equals(0);
    o(await fs.readdir(staging)).deepEquals([]);
  });

  o('should stop at the first failed dependency', async () => {
    const fetch = fakeFetch();
    const pipeline = new ProvisionPipeline({ root, staging, logger: silentLogger, fetch });

    const err = await rejects(pipeline.run([{ ...spark, sourceUrl: SparkUrl + '.missing' }, hadoop]), FetchError);
    o(err.status).equals(404);
    o(fetch.callCount).equals(1);
    o(fetch.firstCall.args[0]).equals(SparkUrl + '.missing');
    o(await listTree(root)).deepEquals([]);
    o(await fs.readdir(staging)).deepEquals([]);
  });
});

o.spec('DependencyRun', () => {
  o('should follow the provisioning states', () => {
    const run = new DependencyRun('spark');
    run.transition('Fetched');
    run.transition('Failed');
    run.transition('Cleaned');
    o(run.state).equals('Cleaned');
    o(run.history).deepEquals(['Pending', 'Fetched', 'Failed', 'Cleaned']);
  });

  o('should refuse skipping a state', () => {
    const run = new DependencyRun('spark');
    let error: unknown = null;
    try {
      run.transition('Extracted');
    } catch (e) {
      error = e;
    }
    o(error instanceof Error).equals(true);
    o(run.state).equals('Pending');
  });
});
