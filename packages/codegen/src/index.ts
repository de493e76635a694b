/**
 * @pegforge/codegen
 *
 * Renders compiled grammars as TypeScript modules whose parser class extends
 * `BaseParser` from `@pegforge/runtime`.
 *
 * @example
 * ```typescript
 * import { compileSource } from "@pegforge/compiler";
 * import { generateParser } from "@pegforge/codegen";
 *
 * const code = generateParser(compileSource("@class SumParser\nsum: sum '+' NUMBER | NUMBER\n"));
 * ```
 *
 * @module
 */

export {
  generateParser,
  resolveClassName,
  ruleMethodName,
  bindingLocal,
  DEFAULT_CLASS_NAME,
  type GenerateOptions,
} from "./generator.js";
export { checkGeneratedSource } from "./check.js";
export { GeneratedSyntaxError } from "./errors.js";
export { CodeWriter } from "./writer.js";
