import { fsa } from '@linzjs/s3fs';
import { fileURLToPath } from 'url';
import { DependencyFileSchema, type DependencySpec } from './dependency.js';
import type { LogType } from './log.js';

/** Dependency declarations shipped with the tool, Spark 3 with Hadoop AWS support */
export const DefaultConfigPath = fileURLToPath(new URL('../config/spark3.json', import.meta.url));

const TemplateReg = /\{([a-zA-Z]+)\}/g;

/**
 * Replace `{name}` and `{version}` placeholders
 *
 * @throws if a placeholder is unknown or has no value
 */
export function expandTemplate(input: string, vars: Record<string, string | undefined>): string {
  return input.replace(TemplateReg, (_match, key: string) => {
    const value = vars[key];
    if (value == null) throw new Error(`Unknown template variable "{${key}}" in "${input}"`);
    return value;
  });
}

export class DependencyLoader {
  /** Source of the declarations, used in error messages */
  source: string;
  dependencies: DependencySpec[];

  constructor(source: string, dependencies: DependencySpec[]) {
    this.source = source;
    this.dependencies = dependencies;
  }

  static async load(fileName: string, log: LogType): Promise<DependencyLoader> {
    const buf = await fsa.read(fileName);
    const loader = this.parse(fileName, buf.toString());
    log.debug({ path: fileName, dependencies: loader.dependencies.map((d) => d.name) }, 'Dependencies:Loaded');
    return loader;
  }

  /** Validate raw JSON declarations and expand their templates */
  static parse(source: string, json: string): DependencyLoader {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (e) {
      throw new Error(`Invalid dependency file ${source}: not JSON`, { cause: e });
    }

    const parsed = DependencyFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new Error(`Invalid dependency file ${source}: ${issues.join(', ')}`);
    }

    const seen = new Set<string>();
    const dependencies: DependencySpec[] = [];
    for (const dep of parsed.data.dependencies) {
      if (seen.has(dep.name)) throw new Error(`Invalid dependency file ${source}: duplicate dependency "${dep.name}"`);
      seen.add(dep.name);

      const vars = { name: dep.name, version: dep.version };
      const expand = (s: string): string => expandTemplate(s, vars);
      dependencies.push(
        Object.freeze({
          name: dep.name,
          version: dep.version,
          sourceUrl: expand(dep.sourceUrl),
          expectedHash: dep.expectedHash,
          stripComponents: dep.stripComponents,
          directories: Object.freeze(dep.directories.map(expand)),
          markers: Object.freeze(dep.markers.map(expand)),
          copyRules: Object.freeze(
            dep.copyRules.map((r) =>
              Object.freeze({ source: expand(r.source), target: expand(r.target), executable: r.executable }),
            ),
          ),
        }),
      );
    }
    return new DependencyLoader(source, dependencies);
  }
}
