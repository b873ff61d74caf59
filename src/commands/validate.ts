import { command } from 'cmd-ts';
import { DependencyLoader } from '../dependency.loader.js';
import { ErrorList } from '../error.list.js';
import { validateLayout } from '../install.js';
import { logger } from '../log.js';
import { Tracer } from '../tracer.js';
import { config, root, verbose } from './common.js';

export const commandValidate = command({
  name: 'validate',
  description: 'Validate the declared layout has been installed',
  args: { verbose, config, root },
  handler: (args) => {
    return Tracer.startRootSpan('command:validate', async () => {
      if (args.verbose) logger.level = 'trace';
      const loader = await DependencyLoader.load(args.config, logger);

      const errors: Error[] = [];
      for (const dep of loader.dependencies) {
        const depErrors = await validateLayout(dep, args.root);
        if (depErrors.length === 0) logger.info({ dependency: dep.name }, 'Validate:Ok');
        for (const err of depErrors) logger.error({ dependency: dep.name, reason: err.message }, 'Validate:Missing');
        errors.push(...depErrors);
      }

      if (errors.length > 0) throw new ErrorList('LayoutInvalid', errors);
      logger.info({ root: args.root, dependencies: loader.dependencies.length }, 'Validate:Done');
    });
  },
});
