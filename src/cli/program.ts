/**
 * Command-line program definition, separate from the entry point so it can
 * be exercised without running it.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { registerIndexCommand } from './commands/operations.js';
import { registerServeCommand } from './commands/serve.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('soap-daemon')
    .description('SOAP message dispatch daemon driven by WSDL files')
    .version(VERSION, '-V, --version', 'Output the version number');

  registerIndexCommand(program);
  registerServeCommand(program);

  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# Show the operations of a WSDL')}
  $ soap-daemon index service.wsdl

  ${chalk.gray('# Serve them with callbacks from a module')}
  $ soap-daemon serve service.wsdl --handlers ./handlers.js --port 8081
`
  );

  return program;
}
