import { promises as fs } from 'fs';
import * as path from 'path';
import { performance } from 'perf_hooks';
import { ulid } from 'ulid';
import { msSince } from './commands/common.js';
import type { DependencySpec } from './dependency.js';
import { toError } from './error.list.js';
import {
  CleanError,
  ExtractError,
  FetchError,
  InstallError,
  IntegrityError,
  ProvisionError,
  type ProvisionStep,
} from './errors.js';
import { extractArchive } from './extract.js';
import { fetchArchive, type FetchFn, type RetryOptions } from './fetch.js';
import { installLayout } from './install.js';
import type { LogType } from './log.js';
import { Tracer } from './tracer.js';
import { verifyArchive } from './verify.js';

export type DependencyState = 'Pending' | 'Fetched' | 'Verified' | 'Extracted' | 'Installed' | 'Cleaned' | 'Failed';

const ValidTransitions: Record<DependencyState, DependencyState[]> = {
  Pending: ['Fetched', 'Failed'],
  Fetched: ['Verified', 'Failed'],
  Verified: ['Extracted', 'Failed'],
  Extracted: ['Installed', 'Failed'],
  Installed: ['Cleaned', 'Failed'],
  Failed: ['Cleaned'],
  Cleaned: [],
};

/** Tracks the state of one dependency as it moves through the pipeline */
export class DependencyRun {
  name: string;
  state: DependencyState = 'Pending';
  history: DependencyState[] = ['Pending'];

  constructor(name: string) {
    this.name = name;
  }

  transition(target: DependencyState): void {
    if (!ValidTransitions[this.state].includes(target)) {
      throw new Error(`Invalid state transition for ${this.name}: ${this.state} -> ${target}`);
    }
    this.state = target;
    this.history.push(target);
  }
}

export interface PipelineOptions {
  /** Install root, "/" for a container image */
  root: string;
  /** Directory used for downloads and extracted trees, emptied as each dependency completes */
  staging: string;
  logger: LogType;
  /** Fail dependencies that have no expected hash */
  requireHash?: boolean;
  fetch?: FetchFn;
  retry?: RetryOptions;
}

export interface DependencyReport {
  name: string;
  states: DependencyState[];
  /** Hash of the verified archive, undefined when verification was skipped */
  hash?: string;
  duration: number;
}

function wrapError(step: ProvisionStep, dependency: string, e: unknown): ProvisionError {
  if (e instanceof ProvisionError) return e;
  const msg = toError(e).message;
  switch (step) {
    case 'fetch':
      return new FetchError(dependency, msg, e);
    case 'verify':
      return new IntegrityError(dependency, msg);
    case 'extract':
      return new ExtractError(dependency, msg, e);
    case 'install':
      return new InstallError(dependency, msg, -1, undefined, e);
    case 'clean':
      return new CleanError(dependency, msg, e);
  }
}

async function step<T>(name: ProvisionStep, dependency: string, cb: () => Promise<T>): Promise<T> {
  try {
    return await cb();
  } catch (e) {
    throw wrapError(name, dependency, e);
  }
}

/**
 * Fetch, verify, extract and install dependencies one after another.
 *
 * The first dependency to fail stops the pipeline, later dependencies are never started.
 * Each dependency gets its own staging directory which is removed however the dependency finishes.
 */
export class ProvisionPipeline {
  opts: PipelineOptions;
  logger: LogType;

  constructor(opts: PipelineOptions) {
    this.opts = opts;
    this.logger = opts.logger;
  }

  async run(dependencies: readonly DependencySpec[]): Promise<DependencyReport[]> {
    const startTime = performance.now();
    const reports: DependencyReport[] = [];
    this.logger.info(
      { dependencies: dependencies.map((d) => d.name), root: this.opts.root, staging: this.opts.staging },
      'Pipeline:Start',
    );

    for (const dep of dependencies) reports.push(await this.provision(dep));

    this.logger.info({ count: reports.length, duration: msSince(startTime) }, 'Pipeline:Done');
    return reports;
  }

  async provision(dep: DependencySpec): Promise<DependencyReport> {
    const startTime = performance.now();
    const run = new DependencyRun(dep.name);
    const log = this.logger.child({ dependency: dep.name });
    const span = Tracer.startSpan('provision:' + dep.name);
    span.setAttribute('source', dep.sourceUrl);

    const workDir = path.join(this.opts.staging, `${dep.name}-${ulid()}`);
    const archive = path.join(workDir, 'archive');
    const tree = path.join(workDir, 'tree');

    let hash: string | undefined;
    let failure: { err: unknown } | null = null;
    try {
      await step('fetch', dep.name, async () => {
        await fs.mkdir(workDir, { recursive: true });
        await fetchArchive(dep.sourceUrl, archive, {
          dependency: dep.name,
          logger: log,
          fetch: this.opts.fetch,
          retry: this.opts.retry,
        });
      });
      run.transition('Fetched');

      const verified = await step('verify', dep.name, () =>
        verifyArchive(archive, dep.expectedHash, {
          dependency: dep.name,
          logger: log,
          requireHash: this.opts.requireHash,
        }),
      );
      if (verified.verified) hash = verified.hash;
      run.transition('Verified');

      await step('extract', dep.name, () =>
        extractArchive(archive, tree, dep.stripComponents, { dependency: dep.name, logger: log }),
      );
      run.transition('Extracted');

      await step('install', dep.name, () => installLayout(tree, dep, { root: this.opts.root, logger: log }));
      run.transition('Installed');
    } catch (err) {
      failure = { err };
      run.transition('Failed');
      const failedStep = err instanceof ProvisionError ? err.step : undefined;
      log.error({ err, step: failedStep, states: run.history }, 'Provision:Failed');
    }

    try {
      await fs.rm(workDir, { recursive: true, force: true });
      run.transition('Cleaned');
    } catch (e) {
      log.error({ err: e, path: workDir }, 'Clean:Failed');
      if (failure == null) {
        failure = { err: new CleanError(dep.name, `Failed to remove ${workDir}`, e) };
        run.transition('Failed');
      }
    }

    const duration = msSince(startTime);
    span.setAttribute('states', run.history.join(','));
    if (failure != null) {
      span.recordException(toError(failure.err));
      span.end();
      throw failure.err;
    }
    span.end();

    log.info({ states: run.history, hash, duration }, 'Provision:Done');
    return { name: dep.name, states: run.history, hash, duration };
  }
}
