import {
  Decorator,
  FunctionSignature,
  FunctionStatement,
  ParameterEntry,
  ParameterPrefix,
  Program,
  Statement,
} from './types.js';

const DEF_HEAD_REGEX = /^(\s*)def\s+([a-zA-Z_][a-zA-Z0-9_]*)\s*\(/;
const HEADER_TAIL_REGEX = /^\s*(?:->\s*(.+?))?\s*:(.*)$/s;
const DECORATOR_REGEX = /^@\s*([a-zA-Z_][a-zA-Z0-9_.]*)\s*(?:\((.*)\))?\s*$/;
const PASS_REGEX = /^(\s*)pass(\s*(?:#.*)?)$/;
const BLOCK_HEADER_REGEX =
  /^\s*(?:for|while|if|elif|else|try|except|finally|with|class)\b/;
const ANNOTATED_ASSIGNMENT_REGEX =
  /^(\s*)([a-zA-Z_][a-zA-Z0-9_]*)\s*:\s*([^=]+?)\s*(?:=\s*(.+?))?\s*$/;

// Block keywords that look like `name: value` on a single line.
const BLOCK_KEYWORDS = new Set([
  'else', 'try', 'finally', 'except', 'lambda', 'class', 'match', 'case',
  'while', 'with', 'elif', 'if', 'for',
]);

const OPENERS = '([{';
const CLOSERS = ')]}';

export interface PlaceholderMatch {
  /** Everything before `pass`: indentation, or a block header and its colon. */
  head: string;
  suffix: string;
}

interface HeaderInfo {
  signature: FunctionSignature;
  inlineBody?: string;
}

/**
 * Split Python source into a statement tree. Only function definitions are
 * given structure; every other line is classified on its own.
 */
export function parse(text: string): Program {
  const source = text.replace(/\r\n/g, '\n');
  const trailingNewline = source.endsWith('\n');
  const body = trailingNewline ? source.slice(0, -1) : source;
  const lines = body.length > 0 ? body.split('\n') : [];
  const continued = markContinuationLines(lines);

  return {
    source,
    statements: parseBlock(lines, continued, 0, lines.length),
    trailingNewline,
  };
}

export function extractSignature(
  definitionLine: string
): FunctionSignature | undefined {
  return readHeader(definitionLine)?.signature;
}

/**
 * Match a `pass` statement, alone on its line or after a block header as in
 * `for _ in range(n): pass`.
 */
export function matchPlaceholder(line: string): PlaceholderMatch | undefined {
  const plain = line.match(PASS_REGEX);
  if (plain) {
    return { head: plain[1], suffix: plain[2] };
  }

  if (!BLOCK_HEADER_REGEX.test(line)) {
    return undefined;
  }
  const colonIndex = indexOfTopLevel(line, ':');
  if (colonIndex === -1) {
    return undefined;
  }
  const inline = line.slice(colonIndex + 1).match(PASS_REGEX);
  if (!inline) {
    return undefined;
  }
  return { head: line.slice(0, colonIndex + 1) + inline[1], suffix: inline[2] };
}

function parseBlock(
  lines: string[],
  continued: boolean[],
  start: number,
  end: number
): Statement[] {
  const statements: Statement[] = [];
  let pendingDecorators: Decorator[] = [];

  const flushDecorators = () => {
    for (const decorator of pendingDecorators) {
      statements.push({
        kind: 'other',
        line: decorator.line,
        indent: leadingWhitespace(decorator.text),
        text: decorator.text,
      });
    }
    pendingDecorators = [];
  };

  let i = start;
  while (i < end) {
    const line = lines[i];
    const trimmed = line.trim();
    const indent = leadingWhitespace(line);

    if (continued[i]) {
      flushDecorators();
      statements.push({ kind: 'other', line: i + 1, indent, text: line });
      i++;
      continue;
    }

    const decoratorMatch = stripComments(trimmed).trim().match(DECORATOR_REGEX);
    if (decoratorMatch) {
      pendingDecorators.push({
        name: decoratorMatch[1],
        args: (decoratorMatch[2] ?? '').trim(),
        line: i + 1,
        text: line,
      });
      i++;
      continue;
    }

    if (/^async\s+def\b/.test(trimmed)) {
      flushDecorators();
      const blockEnd = findBlockEnd(lines, continued, i + 1, end, indent.length);
      statements.push({
        kind: 'unsupported',
        line: i + 1,
        indent,
        reason: 'async function definitions are not supported',
        lines: lines.slice(i, blockEnd),
      });
      i = blockEnd;
      continue;
    }

    if (/^def\b/.test(trimmed)) {
      const headerEnd = findHeaderEnd(lines, i, end);
      const headerLines = lines.slice(i, headerEnd);
      const header = readHeader(headerLines.join('\n'));

      if (!header) {
        flushDecorators();
        statements.push({
          kind: 'unsupported',
          line: i + 1,
          indent,
          reason: 'unreadable function header',
          lines: [line],
        });
        i++;
        continue;
      }

      const decorators = pendingDecorators.every(
        (d) => leadingWhitespace(d.text) === indent
      )
        ? pendingDecorators
        : [];
      if (decorators.length === 0) {
        flushDecorators();
      }
      pendingDecorators = [];

      const blockEnd = findBlockEnd(
        lines,
        continued,
        headerEnd,
        end,
        indent.length
      );
      const fn: FunctionStatement = {
        kind: 'function',
        line: i + 1,
        indent,
        decorators,
        signature: header.signature,
        headerLines,
        inlineBody: header.inlineBody,
        body: parseBlock(lines, continued, headerEnd, blockEnd),
      };
      statements.push(fn);
      i = blockEnd;
      continue;
    }

    flushDecorators();
    statements.push(classifyLine(line, i + 1));
    i++;
  }

  flushDecorators();
  return statements;
}

function classifyLine(line: string, lineNumber: number): Statement {
  const indent = leadingWhitespace(line);

  const placeholder = matchPlaceholder(line);
  if (placeholder) {
    return {
      kind: 'placeholder',
      line: lineNumber,
      indent,
      suffix: placeholder.suffix,
      ...(placeholder.head !== indent ? { header: placeholder.head } : {}),
    };
  }

  const assignMatch = line.match(ANNOTATED_ASSIGNMENT_REGEX);
  if (assignMatch && !BLOCK_KEYWORDS.has(assignMatch[2])) {
    return {
      kind: 'annotated-assignment',
      line: lineNumber,
      indent,
      target: assignMatch[2],
      annotation: assignMatch[3],
      value: assignMatch[4],
      text: line,
    };
  }

  return { kind: 'other', line: lineNumber, indent, text: line };
}

function readHeader(text: string): HeaderInfo | undefined {
  const head = text.match(DEF_HEAD_REGEX);
  if (!head) {
    return undefined;
  }

  const openIndex = head[0].length - 1;
  const closeIndex = findClosingBracket(text, openIndex);
  if (closeIndex === -1) {
    return undefined;
  }

  const tail = text.slice(closeIndex + 1).match(HEADER_TAIL_REGEX);
  if (!tail) {
    return undefined;
  }

  const params = splitTopLevel(
    stripComments(text.slice(openIndex + 1, closeIndex)),
    ','
  )
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .map(parseParameter);

  const returnType = tail[1]?.trim();
  const inlineBody = tail[2];

  return {
    signature: {
      name: head[2],
      params,
      ...(returnType ? { returnType } : {}),
    },
    ...(inlineBody.trim() ? { inlineBody } : {}),
  };
}

function parseParameter(raw: string): ParameterEntry {
  if (raw === '/' || raw === '*') {
    return { marker: raw };
  }

  let prefix: ParameterPrefix = '';
  let rest = raw;
  if (rest.startsWith('**')) {
    prefix = '**';
    rest = rest.slice(2).trim();
  } else if (rest.startsWith('*')) {
    prefix = '*';
    rest = rest.slice(1).trim();
  }

  let defaultValue: string | undefined;
  const equalsIndex = indexOfTopLevel(rest, '=');
  if (equalsIndex !== -1) {
    defaultValue = rest.slice(equalsIndex + 1).trim();
    rest = rest.slice(0, equalsIndex);
  }

  let annotation: string | undefined;
  const colonIndex = indexOfTopLevel(rest, ':');
  if (colonIndex !== -1) {
    annotation = rest.slice(colonIndex + 1).trim();
    rest = rest.slice(0, colonIndex);
  }

  return {
    name: rest.trim(),
    prefix,
    ...(annotation ? { annotation } : {}),
    ...(defaultValue !== undefined ? { defaultValue } : {}),
  };
}

/**
 * Index just past the last line of a (possibly multi-line) header: lines
 * are consumed until brackets balance.
 */
function findHeaderEnd(lines: string[], start: number, end: number): number {
  let depth = 0;
  for (let j = start; j < end; j++) {
    depth += bracketDelta(lines[j]);
    if (depth <= 0) {
      return j + 1;
    }
  }
  return start + 1;
}

function findBlockEnd(
  lines: string[],
  continued: boolean[],
  start: number,
  end: number,
  indentWidth: number
): number {
  let blockEnd = start;
  for (let j = start; j < end; j++) {
    if (continued[j]) {
      blockEnd = j + 1;
      continue;
    }
    if (lines[j].trim() === '') {
      continue;
    }
    if (leadingWhitespace(lines[j]).length > indentWidth) {
      blockEnd = j + 1;
      continue;
    }
    break;
  }
  return blockEnd;
}

/**
 * For each line, whether it continues an earlier one: it starts inside a
 * triple-quoted string or inside an unclosed bracket.
 */
export function markContinuationLines(lines: string[]): boolean[] {
  const result: boolean[] = [];
  let open: string | null = null;
  let depth = 0;

  for (const line of lines) {
    result.push(open !== null || depth > 0);
    let pos = 0;
    while (pos < line.length) {
      if (open !== null) {
        if (line[pos] === '\\') {
          pos += 2;
        } else if (line.startsWith(open, pos)) {
          pos += 3;
          open = null;
        } else {
          pos++;
        }
        continue;
      }

      const ch = line[pos];
      if (ch === '#') {
        break;
      }
      if (line.startsWith('"""', pos) || line.startsWith("'''", pos)) {
        open = line.slice(pos, pos + 3);
        pos += 3;
      } else if (ch === '"' || ch === "'") {
        pos = skipString(line, pos) + 1;
      } else {
        if (OPENERS.includes(ch)) {
          depth++;
        } else if (CLOSERS.includes(ch)) {
          depth = Math.max(0, depth - 1);
        }
        pos++;
      }
    }
  }

  return result;
}

function skipString(text: string, quoteIndex: number): number {
  const quote = text[quoteIndex];
  let pos = quoteIndex + 1;
  while (pos < text.length) {
    if (text[pos] === '\\') {
      pos += 2;
      continue;
    }
    if (text[pos] === quote) {
      return pos;
    }
    pos++;
  }
  return text.length;
}

function bracketDelta(line: string): number {
  let depth = 0;
  for (let pos = 0; pos < line.length; pos++) {
    const ch = line[pos];
    if (ch === '#') {
      break;
    }
    if (ch === '"' || ch === "'") {
      pos = skipString(line, pos);
    } else if (OPENERS.includes(ch)) {
      depth++;
    } else if (CLOSERS.includes(ch)) {
      depth--;
    }
  }
  return depth;
}

/**
 * Position of the newline ending a `#` comment, or the end of the text.
 */
function skipComment(text: string, hashIndex: number): number {
  const newline = text.indexOf('\n', hashIndex);
  return newline === -1 ? text.length : newline;
}

function stripComments(text: string): string {
  let result = '';
  for (let pos = 0; pos < text.length; pos++) {
    const ch = text[pos];
    if (ch === '#') {
      pos = skipComment(text, pos) - 1;
    } else if (ch === '"' || ch === "'") {
      const close = skipString(text, pos);
      result += text.slice(pos, close + 1);
      pos = close;
    } else {
      result += ch;
    }
  }
  return result;
}

function findClosingBracket(text: string, openIndex: number): number {
  let depth = 0;
  for (let pos = openIndex; pos < text.length; pos++) {
    const ch = text[pos];
    if (ch === '#') {
      pos = skipComment(text, pos);
    } else if (ch === '"' || ch === "'") {
      pos = skipString(text, pos);
    } else if (OPENERS.includes(ch)) {
      depth++;
    } else if (CLOSERS.includes(ch)) {
      depth--;
      if (depth === 0) {
        return pos;
      }
    }
  }
  return -1;
}

function indexOfTopLevel(text: string, target: string): number {
  let depth = 0;
  for (let pos = 0; pos < text.length; pos++) {
    const ch = text[pos];
    if (ch === '#') {
      pos = skipComment(text, pos);
    } else if (ch === '"' || ch === "'") {
      pos = skipString(text, pos);
    } else if (OPENERS.includes(ch)) {
      depth++;
    } else if (CLOSERS.includes(ch)) {
      depth--;
    } else if (ch === target && depth === 0) {
      return pos;
    }
  }
  return -1;
}

export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let rest = text;
  let index = indexOfTopLevel(rest, separator);
  while (index !== -1) {
    parts.push(rest.slice(0, index));
    rest = rest.slice(index + 1);
    index = indexOfTopLevel(rest, separator);
  }
  parts.push(rest);
  return parts;
}

function leadingWhitespace(line: string): string {
  const match = line.match(/^\s*/);
  return match ? match[0] : '';
}
