/**
 * Index Command
 *
 * Lists the operations the daemon would serve for a set of WSDL files.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadWsdlFiles } from '../lib/WsdlLoader.js';

export function registerIndexCommand(program: Command): void {
  program
    .command('index')
    .description('Print the operations defined by WSDL files, per SOAP version')
    .argument('<wsdl...>', 'WSDL files')
    .action((files: string[]) => {
      try {
        const { registry } = loadWsdlFiles(files);
        const index = registry.printIndex();
        process.stdout.write(index || chalk.yellow('no SOAP operations found\n'));
      } catch (error) {
        console.error(chalk.red('Failed to read WSDL:'), error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
      }
    });
}
