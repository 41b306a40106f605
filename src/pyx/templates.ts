import {
  Decorator,
  FunctionSignature,
  ParameterEntry,
  isParameterMarker,
} from '../parser/types.js';
import { DEFAULT_TYPE_MAPPING, TypeMapping, mapType } from './type-mapping.js';
import { FunctionKeyword } from './types.js';

export interface DeclarationOptions {
  indent?: string;
  functionKeyword?: FunctionKeyword;
  typeMapping?: TypeMapping;
  /** Clauses after the parameter list, e.g. `nogil` or `except -1`. */
  modifiers?: string[];
  /** Raw text after the header colon. */
  inlineBody?: string;
}

export interface UnmappedType {
  target: string;
  typeName: string;
}

export function renderParameter(
  entry: ParameterEntry,
  mapping: TypeMapping = DEFAULT_TYPE_MAPPING
): string {
  if (isParameterMarker(entry)) {
    return entry.marker;
  }

  const defaultPart =
    entry.defaultValue !== undefined ? `=${entry.defaultValue}` : '';

  // Variadic parameters cannot carry a C type.
  if (entry.prefix !== '') {
    return `${entry.prefix}${entry.name}${defaultPart}`;
  }

  const nativeType = entry.annotation
    ? mapType(entry.annotation, mapping)
    : undefined;
  return nativeType
    ? `${nativeType} ${entry.name}${defaultPart}`
    : `${entry.name}${defaultPart}`;
}

/**
 * Whether the return type or any plain parameter maps to a Cython type.
 */
export function hasMappedTypes(
  signature: FunctionSignature,
  mapping: TypeMapping = DEFAULT_TYPE_MAPPING
): boolean {
  if (signature.returnType && mapType(signature.returnType, mapping)) {
    return true;
  }
  return signature.params.some(
    (entry) =>
      !isParameterMarker(entry) &&
      entry.prefix === '' &&
      entry.annotation !== undefined &&
      mapType(entry.annotation, mapping) !== undefined
  );
}

export function hasVariadicParameters(signature: FunctionSignature): boolean {
  return signature.params.some(
    (entry) => isParameterMarker(entry) || entry.prefix !== ''
  );
}

/**
 * A signature gets a cdef/cpdef declaration when it has a mapped type and
 * no variadic or marker parameters, which those declarations cannot take.
 */
export function isNativeSignature(
  signature: FunctionSignature,
  mapping: TypeMapping = DEFAULT_TYPE_MAPPING
): boolean {
  return hasMappedTypes(signature, mapping) && !hasVariadicParameters(signature);
}

export function findUnmappedTypes(
  signature: FunctionSignature,
  mapping: TypeMapping = DEFAULT_TYPE_MAPPING
): UnmappedType[] {
  const unmapped: UnmappedType[] = [];

  for (const entry of signature.params) {
    if (isParameterMarker(entry) || entry.annotation === undefined) {
      continue;
    }
    if (entry.prefix !== '' || !mapType(entry.annotation, mapping)) {
      unmapped.push({ target: entry.name, typeName: entry.annotation });
    }
  }

  if (signature.returnType && !mapType(signature.returnType, mapping)) {
    unmapped.push({ target: 'return', typeName: signature.returnType });
  }

  return unmapped;
}

export function renderDeclaration(
  signature: FunctionSignature,
  options: DeclarationOptions = {}
): string {
  const mapping = options.typeMapping ?? DEFAULT_TYPE_MAPPING;
  const native = isNativeSignature(signature, mapping);

  const keyword = native ? options.functionKeyword ?? 'cdef' : 'def';
  const returnType =
    native && signature.returnType
      ? mapType(signature.returnType, mapping)
      : undefined;
  const returnPart = returnType ? `${returnType} ` : '';
  const params = signature.params
    .map((entry) => renderParameter(entry, mapping))
    .join(', ');

  const modifiers = native ? options.modifiers ?? [] : [];
  const modifierPart = modifiers.length > 0 ? ` ${modifiers.join(' ')}` : '';

  return (
    `${options.indent ?? ''}${keyword} ${returnPart}${signature.name}` +
    `(${params})${modifierPart}:${options.inlineBody ?? ''}`
  );
}

/**
 * Clause contributed by a function decorator, if it is one we translate.
 */
export function decoratorModifier(decorator: Decorator): string | undefined {
  switch (decorator.name) {
    case 'no_gil':
      return 'nogil';
    case 'except_error': {
      const value = decorator.args.replace(/^(['"])(.*)\1$/, '$2').trim();
      return value ? `except ${value}` : 'except *';
    }
    default:
      return undefined;
  }
}
