import type { CopyRule } from './dependency.js';

export type ProvisionStep = 'fetch' | 'verify' | 'extract' | 'install' | 'clean';

/**
 * Failure while provisioning a single dependency.
 *
 * Every error raised by the pipeline carries the dependency name and the step that failed,
 * so the command line can report `spark failed at extract` without parsing messages.
 */
export class ProvisionError extends Error {
  dependency: string;
  step: ProvisionStep;

  constructor(step: ProvisionStep, dependency: string, msg: string, cause?: unknown) {
    super(`${dependency}:${step} ${msg}`, { cause });
    this.name = this.constructor.name;
    this.dependency = dependency;
    this.step = step;
  }
}

export class FetchError extends ProvisionError {
  /** HTTP status when the server answered */
  status?: number;

  constructor(dependency: string, msg: string, cause?: unknown, status?: number) {
    super('fetch', dependency, msg, cause);
    this.status = status;
  }
}

export class IntegrityError extends ProvisionError {
  expected?: string;
  actual?: string;

  constructor(dependency: string, msg: string, hashes: { expected?: string; actual?: string } = {}) {
    super('verify', dependency, msg);
    this.expected = hashes.expected;
    this.actual = hashes.actual;
  }
}

export class ExtractError extends ProvisionError {
  constructor(dependency: string, msg: string, cause?: unknown) {
    super('extract', dependency, msg, cause);
  }
}

export class InstallError extends ProvisionError {
  /** Index into the dependency's copy rules, -1 when the failure was outside a copy rule */
  index: number;
  rule?: CopyRule;

  constructor(dependency: string, msg: string, index: number, rule?: CopyRule, cause?: unknown) {
    super('install', dependency, msg, cause);
    this.index = index;
    this.rule = rule;
  }
}

export class CleanError extends ProvisionError {
  constructor(dependency: string, msg: string, cause?: unknown) {
    super('clean', dependency, msg, cause);
  }
}
