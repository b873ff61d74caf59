#!/usr/bin/env node
import { run } from 'cmd-ts';
import { cmd } from './commands/index.js';
import { Tracer } from './tracer.js';

await Tracer.run(() => run(cmd, process.argv.slice(2)));
