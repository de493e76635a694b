/**
 * Syntax check of generated modules through the TypeScript compiler API.
 *
 * Only the syntax is checked: the module is transpiled in isolation, without
 * a program, so types in custom actions are not verified.
 */

import ts from "typescript";
import { GeneratedSyntaxError } from "./errors.js";

/**
 * @throws GeneratedSyntaxError for the first syntax error in `code`
 */
export function checkGeneratedSource(code: string, fileName = "parser.ts"): void {
  const { diagnostics } = ts.transpileModule(code, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
    },
  });

  const [first] = diagnostics ?? [];
  if (first === undefined) return;

  const detail = ts.flattenDiagnosticMessageText(first.messageText, "\n");
  if (first.file === undefined || first.start === undefined) {
    throw new GeneratedSyntaxError(detail);
  }
  const { line, character } = first.file.getLineAndCharacterOfPosition(first.start);
  throw new GeneratedSyntaxError(
    detail,
    { file: fileName, line: line + 1, column: character + 1 },
    code.split("\n")[line]
  );
}
