export type ParameterPrefix = '' | '*' | '**';

export interface Parameter {
  name: string;
  prefix: ParameterPrefix;
  annotation?: string;
  defaultValue?: string;
}

/** A bare `/` or `*` in a parameter list. */
export interface ParameterMarker {
  marker: '/' | '*';
}

export type ParameterEntry = Parameter | ParameterMarker;

export interface FunctionSignature {
  name: string;
  params: ParameterEntry[];
  returnType?: string;
}

export interface Decorator {
  name: string;
  args: string;
  line: number;
  text: string;
}

interface StatementBase {
  /** 1-based line number of the statement's first line. */
  line: number;
  indent: string;
}

export interface FunctionStatement extends StatementBase {
  kind: 'function';
  decorators: Decorator[];
  signature: FunctionSignature;
  headerLines: string[];
  /** Statement text after the header colon, as in `def f(): pass`. */
  inlineBody?: string;
  body: Statement[];
}

export interface PlaceholderStatement extends StatementBase {
  kind: 'placeholder';
  /** Whatever follows `pass` on the line, usually a comment. */
  suffix: string;
  /** Block header before an inline `pass`, e.g. `for _ in xs: `. */
  header?: string;
}

export interface AnnotatedAssignmentStatement extends StatementBase {
  kind: 'annotated-assignment';
  target: string;
  annotation: string;
  value?: string;
  text: string;
}

export interface UnsupportedStatement extends StatementBase {
  kind: 'unsupported';
  reason: string;
  lines: string[];
}

export interface OtherStatement extends StatementBase {
  kind: 'other';
  text: string;
}

export type Statement =
  | FunctionStatement
  | PlaceholderStatement
  | AnnotatedAssignmentStatement
  | UnsupportedStatement
  | OtherStatement;

export interface Program {
  source: string;
  statements: Statement[];
  trailingNewline: boolean;
}

export function isParameterMarker(entry: ParameterEntry): entry is ParameterMarker {
  return 'marker' in entry;
}
