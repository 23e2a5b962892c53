import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ValidationError } from '../errors.js';
import { HTTP_SERVER_CONFIG } from '../server/http/config.js';
import { startHttpServer } from '../server/http/httpServer.js';
import { generateFromRequestFile } from './generate.js';

export const cmd = async (argv: string[] = hideBin(process.argv)) => {
  const exe = yargs(argv).scriptName('terragrunt-config-api');

  exe.command(
    'http',
    'Start the Terragrunt config API over HTTP.',
    (yargs) => {
      return yargs
        .option('port', {
          type: 'number',
          default: HTTP_SERVER_CONFIG.defaultPort
        })
        .option('host', {
          type: 'string',
          default: HTTP_SERVER_CONFIG.defaultHost
        });
    },
    ({ port, host }) => {
      try {
        startHttpServer(port, host);
      } catch (error) {
        console.error('Failed to start HTTP server:', error);
        process.exit(1);
      }
    }
  );

  exe.command(
    'generate <request>',
    'Write the Terragrunt HCL described by a VPC request JSON file.',
    (yargs) => {
      return yargs
        .positional('request', {
          type: 'string',
          demandOption: true,
          describe: 'Path to the request document'
        })
        .option('stdout', {
          type: 'boolean',
          default: false,
          describe: 'Print the HCL instead of writing it to conf_path'
        });
    },
    async ({ request, stdout }) => {
      try {
        const result = await generateFromRequestFile(request, { dryRun: stdout });
        if (result.written) {
          console.error(`Wrote ${result.hclPath}`);
        } else {
          process.stdout.write(result.hcl);
        }
      } catch (error) {
        if (error instanceof ValidationError) {
          error.issues.forEach((issue) => console.error(`${issue.path}: ${issue.message}`));
        } else {
          console.error(error instanceof Error ? error.message : error);
        }
        process.exitCode = 1;
      }
    }
  );

  await exe.demandCommand().strict().parseAsync();
};
