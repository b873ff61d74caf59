import { subcommands } from 'cmd-ts';
import { getVersion } from '../version.js';
import { commandHash } from './hash.js';
import { commandInstall } from './install.js';
import { commandValidate } from './validate.js';

export const cmd = subcommands({
  name: 'provision',
  description: 'Fetch, verify and stage binary distributions',
  version: getVersion().version ?? 'unknown',
  cmds: { install: commandInstall, hash: commandHash, validate: commandValidate },
});
