#!/usr/bin/env node

import { Command } from 'commander';
import { resolve } from 'path';
import { logger, setVerbose } from './utils/logger.js';
import {
  handleError,
  ConfigError,
  UnsupportedSyntaxError,
} from './utils/error-handler.js';
import {
  getDefaultOutputPath,
  readFileContent,
  readStdin,
  writeFileContent,
} from './utils/file-utils.js';
import { tryConvert } from './pyx/generator.js';
import { buildExtension } from './compiler/index.js';
import { CLIOptions, collectMapping, toConverterOptions } from './options.js';

const VERSION = '0.1.0';

async function main() {
  const program = new Command();

  program
    .name('pyxify')
    .description('Convert annotated Python functions into Cython source')
    .version(VERSION)
    .argument('[input]', 'Python file to convert (omit or "-" for stdin)')
    .option('-o, --output <file>', 'Where to write the .pyx file')
    .option('--stdout', 'Print the result instead of writing a file', false)
    .option('--cpdef', 'Declare typed functions with cpdef instead of cdef', false)
    .option('--typed-locals', 'Turn annotated locals into cdef declarations', false)
    .option('--strict', 'Fail on unsupported syntax instead of copying it', false)
    .option(
      '-m, --map <entry>',
      'Extra type mapping, e.g. long=long (repeatable)',
      collectMapping,
      []
    )
    .option('--build', 'Compile the result with cythonize afterwards', false)
    .option('-v, --verbose', 'Enable verbose logging', false)
    .action(async (input: string | undefined, options: CLIOptions) => {
      try {
        await run(input, options);
      } catch (error) {
        handleError(error);
      }
    });

  await program.parseAsync(process.argv);
}

async function run(input: string | undefined, options: CLIOptions): Promise<void> {
  if (options.verbose) {
    setVerbose(true);
  }

  logger.debug(`pyxify v${VERSION}`);
  logger.debug(`Options: ${JSON.stringify(options)}`);

  if (options.build && options.stdout) {
    throw new ConfigError('--build needs an output file and cannot be combined with --stdout');
  }

  const converterOptions = toConverterOptions(options);

  const inputPath =
    input === undefined || input === '-' ? undefined : resolve(process.cwd(), input);
  const source = inputPath ? await readFileContent(inputPath) : await readStdin();
  logger.debug(`Read ${source.length} character(s) from ${inputPath ?? 'stdin'}`);

  logger.startSpinner('Converting to Cython...');
  const result = tryConvert(source, converterOptions);
  if (result.kind === 'unsupported') {
    logger.failSpinner('Conversion stopped');
    throw new UnsupportedSyntaxError(result.reason, result.line);
  }

  const { report } = result;
  logger.succeedSpinner(
    `Converted ${report.nativeFunctions} native and ${report.plainFunctions} plain function(s)`
  );

  for (const diagnostic of report.diagnostics) {
    const message = `line ${diagnostic.line}: ${diagnostic.message}`;
    if (diagnostic.severity === 'warning') {
      logger.warn(message);
    } else {
      logger.debug(message);
    }
  }

  if (options.stdout) {
    process.stdout.write(result.text);
    return;
  }

  const outputPath = options.output
    ? resolve(process.cwd(), options.output)
    : getDefaultOutputPath(inputPath);
  await writeFileContent(outputPath, result.text);
  logger.success(`Wrote ${outputPath}`);

  if (options.build) {
    logger.startSpinner('Building extension module...');
    await buildExtension(outputPath);
    logger.succeedSpinner('Extension module built');
  }
}

main().catch(handleError);
