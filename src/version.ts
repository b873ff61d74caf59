import * as fs from 'fs';
import { fileURLToPath } from 'url';

const PackageRoot = fileURLToPath(new URL('..', import.meta.url));

function getGitHash(): string | null {
  const path = PackageRoot + '.git/HEAD';
  if (!fs.existsSync(path)) return null;
  const rev = fs.readFileSync(path).toString().trim();
  if (rev.indexOf(':') === -1) return rev;
  return fs
    .readFileSync(PackageRoot + '.git/' + rev.substring(5).trim())
    .toString()
    .trim();
}

function getPackageJson(): string | null {
  const path = PackageRoot + 'package.json';
  if (!fs.existsSync(path)) return null;
  const pkg: unknown = JSON.parse(fs.readFileSync(path).toString());
  if (typeof pkg !== 'object' || pkg == null || !('version' in pkg) || typeof pkg.version !== 'string') return null;
  return pkg.version;
}

let _version: { hash: string | null; version: string | null } | null;
export function getVersion(): { hash: string | null; version: string | null } {
  if (_version == null) _version = { hash: getGitHash(), version: getPackageJson() };
  return _version;
}
