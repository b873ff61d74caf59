import { promises as fs } from 'fs';
import * as path from 'path';
import { performance } from 'perf_hooks';
import { ulid } from 'ulid';
import { msSince } from './commands/common.js';
import type { CopyRule, DependencySpec } from './dependency.js';
import { toError } from './error.list.js';
import { InstallError } from './errors.js';
import type { LogType } from './log.js';

const PartialExtension = '.partial';

export interface InstallOptions {
  /** Root that absolute destinations are installed under, "/" for a container image */
  root: string;
  logger: LogType;
}

export interface InstallStats {
  directories: number;
  copied: number;
  markers: number;
}

/**
 * Map a declared absolute destination under the install root
 *
 * @throws if the destination resolves outside of `root`
 */
export function resolveTarget(root: string, target: string): string {
  const base = path.resolve(root);
  const dest = path.join(base, target);
  if (dest !== base && !dest.startsWith(base + path.sep) && base !== path.sep) {
    throw new Error(`Target escapes install root: ${target}`);
  }
  return dest;
}

/** Resolve a copy rule source inside the extracted tree */
function resolveSource(tree: string, source: string): string {
  const root = path.resolve(tree);
  const src = path.resolve(root, source);
  if (src !== root && !src.startsWith(root + path.sep)) throw new Error(`Source escapes extracted tree: ${source}`);
  return src;
}

/**
 * Copy a file or directory into place.
 *
 * The copy is made next to the destination then renamed over it,
 * a failed copy leaves the previous destination untouched.
 */
async function replaceWith(source: string, target: string): Promise<void> {
  const partial = `${target}${PartialExtension}-${ulid()}`;
  await fs.mkdir(path.dirname(target), { recursive: true });
  try {
    await fs.cp(source, partial, { recursive: true, force: true, verbatimSymlinks: true });
    await fs.rm(target, { recursive: true, force: true });
    await fs.rename(partial, target);
  } catch (e) {
    await fs.rm(partial, { recursive: true, force: true });
    throw e;
  }
}

async function copyRule(tree: string, rule: CopyRule, root: string): Promise<string> {
  const source = resolveSource(tree, rule.source);
  // Missing sources fail before the destination is touched
  await fs.stat(source);
  const target = resolveTarget(root, rule.target);
  await replaceWith(source, target);
  if (rule.executable) await fs.chmod(target, 0o755);
  return target;
}

/**
 * Lay out an extracted archive as declared by a dependency.
 *
 * Creates the declared directories, applies the copy rules in order then writes the marker files.
 * Rules that completed before a failure are not rolled back.
 */
export async function installLayout(tree: string, dep: DependencySpec, opts: InstallOptions): Promise<InstallStats> {
  const startTime = performance.now();
  const stats: InstallStats = { directories: 0, copied: 0, markers: 0 };
  const log = opts.logger.child({ dependency: dep.name });

  for (const dir of dep.directories) {
    try {
      await fs.mkdir(resolveTarget(opts.root, dir), { recursive: true });
    } catch (e) {
      throw new InstallError(dep.name, `Failed to create directory ${dir}`, -1, undefined, e);
    }
    stats.directories++;
  }

  for (let index = 0; index < dep.copyRules.length; index++) {
    const rule = dep.copyRules[index];
    try {
      const target = await copyRule(tree, rule, opts.root);
      log.debug({ index, source: rule.source, target, executable: rule.executable ?? false }, 'Install:Copy');
    } catch (e) {
      throw new InstallError(dep.name, `Copy rule ${index} failed: ${rule.source} -> ${rule.target}`, index, rule, e);
    }
    stats.copied++;
  }

  for (const marker of dep.markers) {
    const target = resolveTarget(opts.root, marker);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      // Create if missing, leave any existing content alone
      await fs.writeFile(target, '', { flag: 'a' });
    } catch (e) {
      throw new InstallError(dep.name, `Failed to create marker ${marker}`, -1, undefined, e);
    }
    stats.markers++;
  }

  log.info({ ...stats, root: opts.root, duration: msSince(startTime) }, 'Install:Done');
  return stats;
}

/**
 * Check a dependency's layout is present under `root`
 *
 * @returns an error for every missing path or missing execute bit
 */
export async function validateLayout(dep: DependencySpec, root: string): Promise<Error[]> {
  const errors: Error[] = [];
  const check = async (target: string, kind: 'directory' | 'file' | 'any', executable = false): Promise<void> => {
    let fullPath: string;
    try {
      fullPath = resolveTarget(root, target);
    } catch (e) {
      errors.push(new Error(`${dep.name}: ${toError(e).message}`));
      return;
    }
    const stat = await fs.stat(fullPath).catch(() => null);
    if (stat == null) {
      errors.push(new Error(`${dep.name}: missing ${fullPath}`));
      return;
    }
    if (kind === 'directory' && !stat.isDirectory()) errors.push(new Error(`${dep.name}: not a directory ${fullPath}`));
    if (kind === 'file' && !stat.isFile()) errors.push(new Error(`${dep.name}: not a file ${fullPath}`));
    if (executable && (stat.mode & 0o111) === 0) errors.push(new Error(`${dep.name}: not executable ${fullPath}`));
  };

  for (const dir of dep.directories) await check(dir, 'directory');
  for (const rule of dep.copyRules) await check(rule.target, 'any', rule.executable ?? false);
  for (const marker of dep.markers) await check(marker, 'file');
  return errors;
}
