import { parse } from '../parser/python-parser.js';
import { UnsupportedSyntaxError } from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';
import { DEFAULT_OPTIONS, createReport, renderBlock } from './body.js';
import {
  ConversionReport,
  ConversionResult,
  ConverterOptions,
} from './types.js';

export interface ConvertedSource {
  text: string;
  report: ConversionReport;
}

export function resolveOptions(
  options: Partial<ConverterOptions> = {}
): ConverterOptions {
  return { ...DEFAULT_OPTIONS, ...options };
}

export function convertWithReport(
  programText: string,
  options: Partial<ConverterOptions> = {}
): ConvertedSource {
  const program = parse(programText);
  const report = createReport();

  logger.debug(`Parsed ${program.statements.length} top-level statement(s)`);

  const lines = renderBlock(program.statements, {
    options: resolveOptions(options),
    report,
  });

  let text = lines.join('\n');
  if (program.trailingNewline) {
    text += '\n';
  }

  return { text, report };
}

/**
 * Convert Python source to Cython source. Statements that cannot be read
 * are copied through unless `strict` is set, in which case this throws
 * `UnsupportedSyntaxError`.
 */
export function convert(
  programText: string,
  options: Partial<ConverterOptions> = {}
): string {
  return convertWithReport(programText, options).text;
}

export function tryConvert(
  programText: string,
  options: Partial<ConverterOptions> = {}
): ConversionResult {
  try {
    const { text, report } = convertWithReport(programText, options);
    return { kind: 'converted', text, report };
  } catch (error) {
    if (error instanceof UnsupportedSyntaxError) {
      return { kind: 'unsupported', reason: error.message, line: error.line };
    }
    throw error;
  }
}
