import { TypeMapping } from './type-mapping.js';

export type FunctionKeyword = 'cdef' | 'cpdef';

export interface ConverterOptions {
  /** Marker used for functions with at least one native type. */
  functionKeyword: FunctionKeyword;
  /** Rewrite `x: int = 0` in bodies as `cdef int x = 0`. */
  typedLocals: boolean;
  /** Stop at the first unsupported statement instead of passing it through. */
  strict: boolean;
  typeMapping: TypeMapping;
}

export type DiagnosticCode =
  | 'UNSUPPORTED_SYNTAX'
  | 'UNMAPPED_TYPE'
  | 'IGNORED_MODIFIER'
  | 'VARIADIC_FALLBACK';

export interface Diagnostic {
  severity: 'warning' | 'info';
  code: DiagnosticCode;
  message: string;
  line: number;
}

export interface ConversionReport {
  nativeFunctions: number;
  plainFunctions: number;
  diagnostics: Diagnostic[];
}

export type ConversionResult =
  | { kind: 'converted'; text: string; report: ConversionReport }
  | { kind: 'unsupported'; reason: string; line: number };

/** Output lines for one function body. */
export type TransformedBody = string[];
