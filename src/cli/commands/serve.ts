/**
 * Serve Command
 *
 * Runs the daemon over HTTP for a set of WSDL files until SIGINT/SIGTERM.
 */

import { readFileSync } from 'fs';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { SoapDispatcher } from '../../daemon/Dispatcher.js';
import { SoapHttpServer } from '../../http/SoapHttpBinding.js';
import { shutdownLogging } from '../../logging/index.js';
import { loadHandlerModule, loadWsdlFiles } from '../lib/WsdlLoader.js';
import type { HandlerModule } from '../lib/WsdlLoader.js';

interface ServeOptions {
  handlers?: string;
  host?: string;
  port?: number;
  slowSelect: boolean;
  wsdlResponse?: string;
}

function parsePort(value: string): number {
  const port = parseInt(value, 10);
  if (isNaN(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Not a port number.');
  }
  return port;
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Serve the operations of WSDL files over HTTP')
    .argument('<wsdl...>', 'WSDL files')
    .option('--handlers <module>', 'Module exporting `callbacks` (and optionally `defaultCallback`)')
    .option('--host <host>', 'Listen address (default SOAP_HTTP_HOST or 0.0.0.0)')
    .option('--port <port>', 'Listen port (default SOAP_HTTP_PORT or 8081)', parsePort)
    .option('--no-slow-select', 'Do not offer messages without a usable action to every operation')
    .option('--wsdl-response <file>', 'WSDL text answered on GET ?WSDL')
    .action(async (files: string[], options: ServeOptions) => {
      const handlers: HandlerModule = options.handlers
        ? await loadHandlerModule(options.handlers)
        : { callbacks: {} };

      const { registry, summaries } = loadWsdlFiles(files, handlers);
      for (const [file, summary] of summaries) {
        console.log(`${chalk.gray(file)}: ${summary.operations.length} operations`);
      }

      const dispatcher = new SoapDispatcher(registry, {
        acceptSlowSelect: options.slowSelect ? undefined : false,
      });
      const server = new SoapHttpServer(dispatcher, {
        host: options.host,
        port: options.port,
        wsdl: options.wsdlResponse ? readFileSync(options.wsdlResponse, 'utf-8') : undefined,
      });

      const { host, port } = await server.start();
      console.log(chalk.green(`Serving SOAP on http://${host}:${port}/`));

      const shutdown = (signal: string): void => {
        console.log(chalk.gray(`${signal} received, stopping`));
        server
          .stop()
          .then(() => shutdownLogging())
          .catch((error: unknown) => {
            console.error(chalk.red('Shutdown failed:'), error instanceof Error ? error.message : String(error));
            process.exitCode = 1;
          });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });
}
