import { createCli } from './cli/index.js';
import { loadServiceSettings } from './config.js';
import { createExtractionService } from './extraction/setup.js';

const settings = loadServiceSettings();
const cli = createCli({ service: createExtractionService({ settings }), port: settings.port });

try {
  await cli.parseAsync(process.argv);
} catch {
  // Already reported on stderr by the command handler.
  process.exitCode = 1;
}
