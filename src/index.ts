export { parse, extractSignature, parseFile } from './parser/index.js';
export type * from './parser/types.js';
export {
  convert,
  convertWithReport,
  tryConvert,
  resolveOptions,
} from './pyx/generator.js';
export type { ConvertedSource } from './pyx/generator.js';
export { transformBody, substitutePlaceholder, PLACEHOLDER, DEFAULT_OPTIONS } from './pyx/body.js';
export { renderDeclaration, renderParameter, isNativeSignature } from './pyx/templates.js';
export {
  DEFAULT_TYPE_MAPPING,
  mapType,
  extendTypeMapping,
} from './pyx/type-mapping.js';
export type { TypeMapping } from './pyx/type-mapping.js';
export type * from './pyx/types.js';
export { buildExtension } from './compiler/index.js';
export * from './utils/error-handler.js';
