/**
 * Diagnostics System for pegforge
 *
 * Provides Rust-style error messages with:
 * - Structured error codes (PEG1001-PEG3999)
 * - Rich diagnostics with a primary source span, notes and help
 * - Builder API for grammar validation and analysis passes
 *
 * @example
 * ```typescript
 * throw new GrammarError(
 *   new DiagnosticBuilder(PEG1001)
 *     .at({ file: "expr.gram", line: 3, column: 9 })
 *     .withArgs({ name: "trem", rule: "expr" })
 *     .help("Define a rule named `trem` or fix the spelling")
 *     .build()
 * );
 * ```
 */

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Grammar = "grammar",
  Analysis = "analysis",
  Parse = "parse",
  Configuration = "config",
  Codegen = "codegen",
  Internal = "internal",
}

export type Severity = "error" | "warning" | "info";

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code, rendered as `PEG<code>` */
  readonly code: number;

  /** Default severity */
  readonly severity: Severity;

  /** Category for filtering and grouping */
  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation for `pegforge explain` */
  readonly explanation: string;
}

// ============================================================================
// Rich Diagnostic Types
// ============================================================================

/** A 1-based position in a source file. */
export interface SourceSpan {
  file?: string;
  line: number;
  column: number;
  endLine?: number;
  endColumn?: number;
}

/** Structured diagnostic, rendered by {@link renderDiagnosticCLI}. */
export interface RichDiagnostic {
  code: number;
  severity: Severity;
  category: DiagnosticCategory;

  /** Primary message (with placeholders interpolated) */
  message: string;

  /** The main error location */
  span?: SourceSpan;

  notes: string[];

  /** Help text (actionable suggestion in prose) */
  help?: string;

  explanation?: string;
}

// ============================================================================
// Diagnostic Builder
// ============================================================================

/**
 * Fluent builder for constructing rich diagnostics.
 */
export class DiagnosticBuilder {
  private diagnostic: RichDiagnostic;
  private args: Record<string, string> = {};

  constructor(private readonly descriptor: DiagnosticDescriptor) {
    this.diagnostic = {
      code: descriptor.code,
      severity: descriptor.severity,
      category: descriptor.category,
      message: descriptor.messageTemplate,
      notes: [],
      explanation: descriptor.explanation,
    };
  }

  /**
   * Set the primary span for this diagnostic.
   */
  at(span: SourceSpan | undefined): this {
    if (span) this.diagnostic.span = span;
    return this;
  }

  /**
   * Provide arguments for message template interpolation.
   */
  withArgs(args: Record<string, string | number | undefined>): this {
    for (const [key, value] of Object.entries(args)) {
      if (value !== undefined) {
        this.args[key] = String(value);
      }
    }
    return this;
  }

  note(message: string): this {
    this.diagnostic.notes.push(message);
    return this;
  }

  help(message: string): this {
    this.diagnostic.help = message;
    return this;
  }

  private interpolateMessage(): string {
    let message = this.descriptor.messageTemplate;
    for (const [key, value] of Object.entries(this.args)) {
      message = message.split(`{${key}}`).join(value);
    }
    return message;
  }

  build(): RichDiagnostic {
    return { ...this.diagnostic, notes: [...this.diagnostic.notes], message: this.interpolateMessage() };
  }
}

// ============================================================================
// Error base class
// ============================================================================

/** Base class of every error pegforge throws; carries its diagnostic. */
export class PegforgeError extends Error {
  constructor(readonly diagnostic: RichDiagnostic) {
    super(`[PEG${diagnostic.code}] ${diagnostic.message}`);
    this.name = "PegforgeError";
  }

  get code(): number {
    return this.diagnostic.code;
  }
}

// ============================================================================
// Error Catalog: Grammar (1001-1099)
// ============================================================================

export const PEG1001: DiagnosticDescriptor = {
  code: 1001,
  severity: "error",
  category: DiagnosticCategory.Grammar,
  messageTemplate: "Unknown rule or token `{name}` referenced in rule `{rule}`",
  explanation: `Every name used in an alternative must be a rule defined in the grammar
or a token category the tokenizer produces.

Built-in token categories:
  NAME NUMBER STRING OP NEWLINE INDENT DEDENT ENDMARKER KEYWORD SOFT_KEYWORD

Literal keywords and operators are written in quotes:
  'if'     hard keyword
  "match"  soft keyword
  '+'      operator`,
};

export const PEG1002: DiagnosticDescriptor = {
  code: 1002,
  severity: "error",
  category: DiagnosticCategory.Grammar,
  messageTemplate: "Rule `{name}` is defined more than once",
  explanation: `A rule name may be declared only once. Merge the alternatives of both
declarations into a single rule:

  expr: expr '+' term | term`,
};

export const PEG1003: DiagnosticDescriptor = {
  code: 1003,
  severity: "error",
  category: DiagnosticCategory.Grammar,
  messageTemplate: "Invalid grammar syntax: {detail}",
  explanation: `The grammar file could not be read. Rules have the shape

  name[type] (memo): alternative | alternative

and continuation lines start with '|' and are indented.`,
};

export const PEG1004: DiagnosticDescriptor = {
  code: 1004,
  severity: "error",
  category: DiagnosticCategory.Grammar,
  messageTemplate: "Rule name `{name}` is reserved",
  explanation: `Names starting with an underscore are used for the helper methods that
generated parsers contain (_loop0_1, _gather_2, _tmp_3, ...).`,
};

export const PEG1005: DiagnosticDescriptor = {
  code: 1005,
  severity: "error",
  category: DiagnosticCategory.Grammar,
  messageTemplate: "Grammar defines no rules",
  explanation: `A grammar needs at least one rule. The first rule is the start rule.`,
};

export const PEG1006: DiagnosticDescriptor = {
  code: 1006,
  severity: "warning",
  category: DiagnosticCategory.Grammar,
  messageTemplate: "In `{rule}` the alternative `{alternative}` is never tried",
  explanation: `Ordered choice commits to the first alternative that matches. When an
earlier alternative is a prefix of a later one, the later one can never win:

  stmt: NAME | NAME '=' expr     # NAME always matches first

Put the longer alternative first.`,
};

// ============================================================================
// Error Catalog: Analysis (2001-2099)
// ============================================================================

export const PEG2001: DiagnosticDescriptor = {
  code: 2001,
  severity: "error",
  category: DiagnosticCategory.Internal,
  messageTemplate: "Left recursion classification failed for {rules}",
  explanation: `Each cluster of mutually left-recursive rules needs a leader: a rule that
lies on every left-recursive cycle of the cluster and runs the seed-growing
loop. A cluster where no single rule lies on every cycle is not supported:

  a: b 'x' | c 'y' | 'n'
  b: a 'p' | c 'q' | 'm'
  c: a 'r' | b 's' | 'k'     # a -> b -> a misses c, b -> c -> b misses a

Rewrite the grammar so that one rule is shared by all cycles, for example by
inlining the alternatives of one rule into the others, or by moving the
left-recursive alternatives into a single rule.

The same error is raised at parse time when a rule that was classified as not
left-recursive re-enters itself at the same position.`,
};

export const PEG2002: DiagnosticDescriptor = {
  code: 2002,
  severity: "warning",
  category: DiagnosticCategory.Analysis,
  messageTemplate: "Rule `{rule}` repeats `{item}`, which can match nothing",
  explanation: `A repetition of an item that matches the empty input would loop forever.
Generated parsers stop a repetition as soon as an iteration consumes no
tokens, so the loop yields at most one empty match.`,
};

// ============================================================================
// Error Catalog: Parse (3001-3099)
// ============================================================================

export const PEG3001: DiagnosticDescriptor = {
  code: 3001,
  severity: "error",
  category: DiagnosticCategory.Parse,
  messageTemplate: "{detail}",
  explanation: `The tokenizer rejected the input: an unterminated string, an unexpected
character, or a dedent that does not match any outer indentation level.`,
};

export const PEG3002: DiagnosticDescriptor = {
  code: 3002,
  severity: "error",
  category: DiagnosticCategory.Parse,
  messageTemplate: "expected {expected}",
  explanation: `A forced item (&&e) did not match. Forced items mark places where the
construct has been recognized unambiguously, so the parser reports the error
right here instead of backtracking.`,
};

export const PEG3003: DiagnosticDescriptor = {
  code: 3003,
  severity: "error",
  category: DiagnosticCategory.Parse,
  messageTemplate: "invalid syntax",
  explanation: `No alternative of the start rule matched the whole input. The reported
position is the furthest token any alternative reached.`,
};

// ============================================================================
// Error Catalog: Configuration (4001-4099)
// ============================================================================

export const PEG4001: DiagnosticDescriptor = {
  code: 4001,
  severity: "error",
  category: DiagnosticCategory.Configuration,
  messageTemplate: "Invalid configuration value for `{key}`: {detail}",
  explanation: `A configuration file or PEGFORGE_* environment variable holds a value of
the wrong type. See the PegforgeConfig interface for the accepted keys.`,
};

// ============================================================================
// Error Catalog: Code generation (5001-5099)
// ============================================================================

export const PEG5001: DiagnosticDescriptor = {
  code: 5001,
  severity: "error",
  category: DiagnosticCategory.Codegen,
  messageTemplate: "Generated parser is not valid TypeScript: {detail}",
  explanation: `The generated module failed the TypeScript syntax check. Custom actions
are copied into the output verbatim, so the usual cause is an action that is
not a TypeScript expression, or a rule or binding name that is a reserved word.`,
};

// ============================================================================
// Catalog Lookup
// ============================================================================

export const DIAGNOSTIC_CATALOG: ReadonlyMap<number, DiagnosticDescriptor> = new Map(
  [PEG1001, PEG1002, PEG1003, PEG1004, PEG1005, PEG1006, PEG2001, PEG2002, PEG3001, PEG3002, PEG3003, PEG4001, PEG5001].map(
    (d): [number, DiagnosticDescriptor] => [d.code, d]
  )
);

/**
 * Look up a descriptor by code. Accepts `1001`, `"1001"` or `"PEG1001"`.
 */
export function getDiagnosticDescriptor(code: number | string): DiagnosticDescriptor | undefined {
  const numeric = typeof code === "number" ? code : Number(code.replace(/^PEG/i, ""));
  return DIAGNOSTIC_CATALOG.get(numeric);
}

/** Long-form text for `pegforge explain`. */
export function explainDiagnostic(code: number | string): string | undefined {
  const descriptor = getDiagnosticDescriptor(code);
  if (!descriptor) return undefined;
  return `PEG${descriptor.code} (${descriptor.severity}, ${descriptor.category})\n\n${descriptor.explanation}`;
}

// ============================================================================
// CLI Renderer: Rust-Style Error Output
// ============================================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
} as const;

type ColorName = keyof typeof COLORS;

function colorsEnabled(): boolean {
  if (typeof process === "undefined") return false;
  const env = process.env;
  return !env.NO_COLOR && !env.PEGFORGE_NO_COLOR && env.FORCE_COLOR !== "0";
}

function severityColor(severity: Severity): "red" | "yellow" | "cyan" {
  switch (severity) {
    case "error":
      return "red";
    case "warning":
      return "yellow";
    case "info":
      return "cyan";
  }
}

function createUnderline(startColumn: number, length: number): string {
  return " ".repeat(Math.max(0, startColumn - 1)) + "^".repeat(Math.max(1, length));
}

export interface CLIRenderOptions {
  /** Whether to use colors (default: auto-detect) */
  colors?: boolean;
  /** Source text the span points into; enables the code excerpt */
  source?: string;
  /** Context lines before the error line (default: 1) */
  contextLines?: number;
  showExplanation?: boolean;
}

/**
 * Render a RichDiagnostic in Rust-style format.
 *
 * @example Output:
 * ```
 * error[PEG1001]: Unknown rule or token `trem` referenced in rule `expr`
 *   --> expr.gram:1:16
 *    |
 *  1 | expr: expr '+' trem | term
 *    |                ^^^^
 *    = help: Define a rule named `trem` or fix the spelling
 * ```
 */
export function renderDiagnosticCLI(diagnostic: RichDiagnostic, options: CLIRenderOptions = {}): string {
  const useColors = options.colors ?? colorsEnabled();
  const contextLines = options.contextLines ?? 1;
  const color = (text: string, ...styles: ColorName[]): string =>
    useColors ? `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}` : text;

  const lines: string[] = [];
  const severityClr = severityColor(diagnostic.severity);
  lines.push(
    `${color(`${diagnostic.severity}[PEG${diagnostic.code}]`, "bold", severityClr)}: ${color(diagnostic.message, "bold")}`
  );

  const span = diagnostic.span;
  if (span) {
    lines.push(`  ${color("-->", "blue")} ${span.file ?? "<input>"}:${span.line}:${span.column}`);
  }

  if (span && options.source !== undefined) {
    const sourceLines = options.source.split("\n");
    const firstLine = Math.max(1, span.line - contextLines);
    const width = Math.max(2, String(span.line).length);
    const gutter = " ".repeat(width);
    lines.push(` ${gutter} ${color("|", "blue")}`);
    for (let lineNum = firstLine; lineNum <= span.line; lineNum++) {
      const text = sourceLines[lineNum - 1] ?? "";
      lines.push(` ${color(String(lineNum).padStart(width, " "), "blue")} ${color("|", "blue")} ${text}`);
    }
    const length =
      span.endLine === span.line && span.endColumn !== undefined ? span.endColumn - span.column : 1;
    lines.push(` ${gutter} ${color("|", "blue")} ${color(createUnderline(span.column, length), severityClr)}`);
  }

  for (const note of diagnostic.notes) {
    lines.push(`   ${color("= note:", "bold")} ${note}`);
  }

  if (diagnostic.help) {
    lines.push(`   ${color("= help:", "bold", "green")} ${diagnostic.help}`);
  }

  if (options.showExplanation && diagnostic.explanation) {
    lines.push("");
    lines.push(color("Explanation:", "bold"));
    for (const expLine of diagnostic.explanation.split("\n")) {
      lines.push(`  ${expLine}`);
    }
  }

  return lines.join("\n");
}

/**
 * Render multiple diagnostics with a summary.
 */
export function renderDiagnosticsCLI(diagnostics: readonly RichDiagnostic[], options: CLIRenderOptions = {}): string {
  if (diagnostics.length === 0) {
    return "";
  }

  const lines: string[] = [];
  for (const diag of diagnostics) {
    lines.push(renderDiagnosticCLI(diag, options));
    lines.push("");
  }

  const errorCount = diagnostics.filter((d) => d.severity === "error").length;
  const warnCount = diagnostics.filter((d) => d.severity === "warning").length;

  const parts: string[] = [];
  if (errorCount > 0) parts.push(`${errorCount} error${errorCount > 1 ? "s" : ""}`);
  if (warnCount > 0) parts.push(`${warnCount} warning${warnCount > 1 ? "s" : ""}`);
  if (parts.length > 0) lines.push(`${parts.join(", ")} generated`);

  return lines.join("\n");
}
