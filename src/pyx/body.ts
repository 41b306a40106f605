import { matchPlaceholder, parse } from '../parser/python-parser.js';
import {
  AnnotatedAssignmentStatement,
  FunctionStatement,
  Statement,
} from '../parser/types.js';
import { UnsupportedSyntaxError } from '../utils/error-handler.js';
import { DEFAULT_TYPE_MAPPING, mapType } from './type-mapping.js';
import {
  decoratorModifier,
  findUnmappedTypes,
  hasMappedTypes,
  isNativeSignature,
  renderDeclaration,
} from './templates.js';
import {
  ConversionReport,
  ConverterOptions,
  TransformedBody,
} from './types.js';

export const PLACEHOLDER = '...';

export const DEFAULT_OPTIONS: ConverterOptions = {
  functionKeyword: 'cdef',
  typedLocals: false,
  strict: false,
  typeMapping: DEFAULT_TYPE_MAPPING,
};

export interface RenderContext {
  options: ConverterOptions;
  report: ConversionReport;
  /**
   * Indentation of the statements directly in the enclosing function body;
   * undefined at module level.
   */
  bodyIndent?: string;
}

export function createReport(): ConversionReport {
  return { nativeFunctions: 0, plainFunctions: 0, diagnostics: [] };
}

export function substitutePlaceholder(line: string): string {
  const match = matchPlaceholder(line);
  return match ? `${match.head}${PLACEHOLDER}${match.suffix}` : line;
}

function blockIndent(statements: Statement[]): string | undefined {
  for (const statement of statements) {
    if (statement.kind === 'other') {
      const trimmed = statement.text.trim();
      if (trimmed === '' || trimmed.startsWith('#')) {
        continue;
      }
    }
    return statement.indent;
  }
  return undefined;
}

/**
 * Rewrite the lines of a function body. `pass` becomes `...`; everything
 * else is copied as is unless typed locals are enabled.
 */
export function transformBody(
  bodyLines: string[],
  options: Partial<ConverterOptions> = {}
): TransformedBody {
  const program = parse(bodyLines.join('\n'));
  return renderBlock(program.statements, {
    options: { ...DEFAULT_OPTIONS, ...options },
    report: createReport(),
    bodyIndent: blockIndent(program.statements),
  });
}

export function renderBlock(
  statements: Statement[],
  context: RenderContext
): TransformedBody {
  const lines: string[] = [];
  for (const statement of statements) {
    lines.push(...renderStatement(statement, context));
  }
  return lines;
}

function renderStatement(
  statement: Statement,
  context: RenderContext
): string[] {
  switch (statement.kind) {
    case 'function':
      return renderFunction(statement, context);
    case 'placeholder':
      return [
        `${statement.header ?? statement.indent}${PLACEHOLDER}${statement.suffix}`,
      ];
    case 'annotated-assignment':
      return [renderAnnotatedAssignment(statement, context)];
    case 'unsupported':
      if (context.options.strict) {
        throw new UnsupportedSyntaxError(
          `Unsupported syntax at line ${statement.line}: ${statement.reason}`,
          statement.line
        );
      }
      context.report.diagnostics.push({
        severity: 'warning',
        code: 'UNSUPPORTED_SYNTAX',
        message: `${statement.reason}; copied unchanged`,
        line: statement.line,
      });
      return statement.lines;
    case 'other':
      return [statement.text];
  }
}

function renderFunction(
  fn: FunctionStatement,
  context: RenderContext
): string[] {
  const { options, report } = context;
  const lines: string[] = [];
  const modifiers: string[] = [];

  for (const decorator of fn.decorators) {
    const modifier = decoratorModifier(decorator);
    if (modifier) {
      modifiers.push(modifier);
    } else {
      lines.push(decorator.text);
    }
  }

  const native = isNativeSignature(fn.signature, options.typeMapping);
  if (native) {
    report.nativeFunctions++;
  } else {
    report.plainFunctions++;
    if (hasMappedTypes(fn.signature, options.typeMapping)) {
      report.diagnostics.push({
        severity: 'warning',
        code: 'VARIADIC_FALLBACK',
        message: `'${fn.signature.name}' takes variadic or marker parameters; declared with def`,
        line: fn.line,
      });
    }
    for (const modifier of modifiers) {
      report.diagnostics.push({
        severity: 'warning',
        code: 'IGNORED_MODIFIER',
        message: `'${modifier}' dropped from '${fn.signature.name}': it is declared with def`,
        line: fn.line,
      });
    }
  }

  for (const { target, typeName } of findUnmappedTypes(
    fn.signature,
    options.typeMapping
  )) {
    const subject =
      target === 'return' ? 'return type' : `parameter '${target}'`;
    report.diagnostics.push({
      severity: 'info',
      code: 'UNMAPPED_TYPE',
      message: `${subject} of '${fn.signature.name}' has no native type for '${typeName}'; left untyped`,
      line: fn.line,
    });
  }

  lines.push(
    renderDeclaration(fn.signature, {
      indent: fn.indent,
      functionKeyword: options.functionKeyword,
      typeMapping: options.typeMapping,
      modifiers,
      inlineBody:
        fn.inlineBody !== undefined
          ? substitutePlaceholder(fn.inlineBody)
          : undefined,
    })
  );

  lines.push(
    ...renderBlock(fn.body, { ...context, bodyIndent: blockIndent(fn.body) })
  );
  return lines;
}

function renderAnnotatedAssignment(
  statement: AnnotatedAssignmentStatement,
  context: RenderContext
): string {
  // cdef is only allowed at function level, not inside loops or branches.
  if (
    !context.options.typedLocals ||
    context.bodyIndent === undefined ||
    statement.indent !== context.bodyIndent
  ) {
    return statement.text;
  }

  const nativeType = mapType(statement.annotation, context.options.typeMapping);
  if (!nativeType) {
    return statement.text;
  }

  const valuePart =
    statement.value !== undefined ? ` = ${statement.value}` : '';
  return `${statement.indent}cdef ${nativeType} ${statement.target}${valuePart}`;
}
