#!/usr/bin/env tsx
import { createProgram, CliContext } from './cli/index';
import { loadConfigFromEnvironment } from './config';
import { createServices, Services, shutdownServices } from './services/container';

const config = loadConfigFromEnvironment();

let services: Promise<Services> | undefined;

const context: CliContext = {
  services: () => {
    services ??= createServices(config);
    return services;
  },
  print: (text) => console.log(text),
  printError: (text) => console.error(text),
};

await createProgram(context).parseAsync(process.argv);

if (services) {
  await shutdownServices(await services);
}
