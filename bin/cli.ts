#!/usr/bin/env node
import path from 'node:path';
import process from 'node:process';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import {
  DEFAULT_CONFIG_FILES,
  GeneratorError,
  discoverConfigFile,
  loadGeneratorConfig,
  runGeneration,
  toGeneratorOptions,
  type GeneratedFile,
  type GenerationRequest,
  type GeneratorLogger
} from '../src/index.js';

type CliArguments = {
  projectRoot: string;
  config?: string;
  schema?: string;
  dryRun: boolean;
  verbose: boolean;
};

function createLogger(verbose: boolean): GeneratorLogger {
  return {
    info(message) {
      if (verbose) console.log(message);
    },
    warn(message) {
      console.warn(`warning: ${message}`);
    }
  };
}

function report(files: GeneratedFile[], args: CliArguments): void {
  if (!files.length) {
    console.warn('No files were generated. Check the table filter and class name settings.');
    return;
  }

  if (args.dryRun) {
    for (const file of files) {
      console.log(`\n// Table: ${file.tableName}\n// File: ${file.filePath}\n${file.content}`);
    }
    return;
  }

  if (args.verbose) {
    for (const file of files) {
      console.log(`Wrote ${file.filePath}`);
    }
  }
  console.log(`Generated ${files.length} file(s).`);
}

async function run(args: CliArguments, request: GenerationRequest): Promise<void> {
  const projectRoot = path.resolve(process.cwd(), args.projectRoot);
  const configPath = args.config
    ? path.resolve(process.cwd(), args.config)
    : await discoverConfigFile(projectRoot);

  if (!configPath) {
    console.error(
      `No configuration file found under ${projectRoot}. Create one of ${DEFAULT_CONFIG_FILES.join(', ')} or pass --config.`
    );
    process.exitCode = 1;
    return;
  }

  const config = await loadGeneratorConfig(configPath);
  const options = toGeneratorOptions(config, path.dirname(configPath));
  const files = await runGeneration(
    {
      ...options,
      schemaName: args.schema ?? options.schemaName,
      dryRun: args.dryRun,
      logger: createLogger(args.verbose)
    },
    request
  );
  report(files, args);
}

async function main(): Promise<void> {
  await yargs(hideBin(process.argv))
    .scriptName('schema-dao-generator')
    .usage('$0 <command> [options]')
    .option('project-root', {
      alias: 'p',
      type: 'string',
      describe: 'Directory searched for the generator configuration file',
      default: '.'
    })
    .option('config', {
      alias: 'c',
      type: 'string',
      describe: 'Explicit configuration file to use instead of discovery'
    })
    .option('schema', {
      alias: 's',
      type: 'string',
      describe: 'Database schema to introspect, overriding the configuration'
    })
    .option('dry-run', {
      alias: 'd',
      type: 'boolean',
      describe: 'Print the generated output without writing to disk',
      default: false
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      describe: 'Print connection details and one line per generated file',
      default: false
    })
    .command('all', 'Generate files for every table that passes the table filter', (y) => y, (argv) =>
      run(argv, { kind: 'all' })
    )
    .command(
      'one <table>',
      'Generate files for a single table',
      (y) => y.positional('table', { type: 'string', describe: 'Table name', demandOption: true }),
      (argv) => run(argv, { kind: 'one', tableName: argv.table })
    )
    .command(
      'many <tables..>',
      'Generate files for the listed tables; unknown names are skipped',
      (y) => y.positional('tables', { type: 'string', array: true, describe: 'Table names', demandOption: true }),
      (argv) => run(argv, { kind: 'many', tableNames: argv.tables })
    )
    .demandCommand(1)
    .help()
    .strict()
    .parseAsync();
}

main().catch((error) => {
  if (error instanceof GeneratorError) {
    console.error(`error: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exit(1);
});
