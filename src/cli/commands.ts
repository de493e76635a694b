/**
 * pegforge CLI commands.
 *
 * Every command reads and writes through a {@link CliIO}, and reports the
 * process exit code instead of exiting, so the commands run unchanged in
 * tests.
 */

import * as fs from "fs";
import * as path from "path";
import {
  config,
  createLogger,
  explainDiagnostic,
  PegforgeError,
  renderDiagnosticCLI,
  renderDiagnosticsCLI,
} from "@pegforge/core";
import type { Logger, RichDiagnostic } from "@pegforge/core";
import { compileSource } from "@pegforge/compiler";
import type { CompiledGrammar } from "@pegforge/compiler";
import { generateParser } from "@pegforge/codegen";
import { createParser, isToken } from "@pegforge/runtime";
import { tokenize } from "@pegforge/tokenizer";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readFile(file: string): string;
  writeFile(file: string, text: string): void;
}

export const nodeIO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  readFile: (file) => fs.readFileSync(file, "utf-8"),
  writeFile: (file, text) => fs.writeFileSync(file, text, "utf-8"),
};

type Command = "generate" | "check" | "parse" | "explain";

const COMMANDS: ReadonlyArray<Command> = ["generate", "check", "parse", "explain"];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export interface CliOptions {
  command: Command;
  /** Positional arguments after the command */
  files: string[];
  verbose: boolean;
  out?: string;
  className?: string;
  start?: string;
  firstSets: boolean;
  /** Tokenize parse input without NEWLINE/INDENT/DEDENT tokens */
  newlines: boolean;
}

/** Bad command line; printed with the usage line. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const USAGE = "Usage: pegforge <generate|check|parse|explain> [options]";

export function parseArgs(args: readonly string[]): CliOptions {
  const [command = "", ...rest] = args;
  if (!isCommand(command)) {
    throw new UsageError(`Unknown command: ${command}`);
  }

  const options: CliOptions = { command, files: [], verbose: false, firstSets: false, newlines: true };
  const value = (flag: string, i: number): string => {
    const next = rest[i];
    if (next === undefined || next.startsWith("-")) throw new UsageError(`${flag} requires a value`);
    return next;
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
    } else if (arg === "--out" || arg === "-o") {
      options.out = value(arg, ++i);
    } else if (arg === "--class") {
      options.className = value(arg, ++i);
    } else if (arg === "--start") {
      options.start = value(arg, ++i);
    } else if (arg === "--first-sets") {
      options.firstSets = true;
    } else if (arg === "--no-newlines") {
      options.newlines = false;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      options.files.push(arg);
    }
  }

  const needed = command === "parse" ? 2 : 1;
  if (options.files.length < needed) {
    throw new UsageError(
      command === "parse"
        ? "parse requires a grammar and an input file: pegforge parse <grammar.gram> <input>"
        : command === "explain"
          ? "explain requires a diagnostic code: pegforge explain PEG1001"
          : `${command} requires a grammar file: pegforge ${command} <grammar.gram>`
    );
  }
  return options;
}

export const HELP = `
pegforge - PEG parser generator with left recursion

USAGE:
  pegforge <command> [options]

COMMANDS:
  generate <grammar.gram>          Write a TypeScript parser for the grammar
  check <grammar.gram>             Validate and analyze the grammar
  parse <grammar.gram> <input>     Parse a file with the grammar, print the result as JSON
  explain <code>                   Explain a diagnostic code (PEG1001 or 1001)

OPTIONS:
  -o, --out <path>       Output file (generate; default: stdout)
  --class <name>         Parser class name (generate; wins over @class)
  --first-sets           Print first sets (check)
  --start <rule>         Start rule (parse; default: the first rule)
  --no-newlines          Drop NEWLINE/INDENT/DEDENT tokens from the input (parse)
  -v, --verbose          Enable verbose logging
  -h, --help             Show this help message

EXAMPLES:
  pegforge generate calc.gram -o calc-parser.ts
  pegforge check calc.gram --first-sets
  pegforge parse calc.gram input.txt --start expr
  pegforge explain PEG2001
`;

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

class Session {
  /** Sources read so far, for diagnostic excerpts */
  private readonly sources = new Map<string, string>();
  readonly logger: Logger;

  constructor(
    readonly io: CliIO,
    readonly options: CliOptions
  ) {
    this.logger = createLogger("cli", {
      ...(options.verbose ? { verbose: true } : {}),
      writer: io.stderr,
      errorWriter: io.stderr,
    });
    this.logger.debug(`configuration ${JSON.stringify(config.getAll())}`);
  }

  read(file: string): string {
    const text = this.io.readFile(file);
    this.sources.set(file, text);
    return text;
  }

  report(diagnostic: RichDiagnostic): void {
    const file = diagnostic.span?.file;
    const source = file !== undefined ? this.sources.get(file) : undefined;
    this.io.stderr(renderDiagnosticCLI(diagnostic, source !== undefined ? { source } : {}));
  }

  compile(file: string): CompiledGrammar {
    const source = this.read(file);
    const grammar = compileSource(source, {
      fileName: file,
      logger: this.logger.child("compiler"),
    });
    if (grammar.warnings.length > 0) {
      // Warnings all point into `file`
      this.io.stderr(renderDiagnosticsCLI(grammar.warnings, { source }));
    }
    return grammar;
  }
}

function generate(session: Session): number {
  const { io, options } = session;
  const [file] = options.files;
  const grammar = session.compile(file);
  const code = generateParser(grammar, {
    ...(options.className !== undefined ? { className: options.className } : {}),
    logger: session.logger.child("codegen"),
  });
  if (options.out === undefined) {
    io.stdout(code);
  } else {
    io.writeFile(options.out, code);
    session.logger.info(`wrote ${path.basename(options.out)}`);
  }
  return 0;
}

function check(session: Session): number {
  const { io, options } = session;
  const [file] = options.files;
  const grammar = session.compile(file);
  const { analysis } = grammar;

  io.stdout(`${file}: ${grammar.rules.length} rules, start rule ${grammar.rules[grammar.start].name}`);
  for (const cluster of analysis.clusters) {
    io.stdout(`left-recursive: ${cluster.rules.join(", ")} (leader ${cluster.leader})`);
  }
  if (analysis.nullable.size > 0) {
    io.stdout(`nullable: ${[...analysis.nullable].join(", ")}`);
  }
  io.stdout(`memoized: ${[...analysis.memoized].join(", ") || "(none)"}`);
  if (options.firstSets) {
    for (const rule of grammar.rules) {
      const first = [...(analysis.firstSets.get(rule.name) ?? [])].sort();
      io.stdout(`first(${rule.name}) = {${first.join(", ")}}`);
    }
  }
  return 0;
}

function parse(session: Session): number {
  const { io, options } = session;
  const [grammarFile, inputFile] = options.files;
  const grammar = session.compile(grammarFile);
  const tokens = tokenize(session.read(inputFile), {
    fileName: inputFile,
    ...(options.newlines ? {} : { newlines: false, indentation: false }),
  });
  const parser = createParser(grammar, { fileName: inputFile, logger: session.logger.child("runtime") });
  const value = parser.parseOrThrow(tokens, options.start);
  io.stdout(JSON.stringify(value, (_key, item: unknown) => (isToken(item) ? item.string : item), 2));
  return 0;
}

function explain(session: Session): number {
  const { io, options } = session;
  const [code] = options.files;
  const text = explainDiagnostic(code);
  if (text === undefined) {
    io.stderr(`Unknown diagnostic code: ${code}`);
    return 1;
  }
  io.stdout(text);
  return 0;
}

const HANDLERS: Readonly<Record<Command, (session: Session) => number>> = { generate, check, parse, explain };

/**
 * Run the CLI over `args` (without the node and script paths).
 *
 * @returns the process exit code
 */
export function runCli(args: readonly string[], io: CliIO = nodeIO): number {
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    io.stdout(HELP);
    return 0;
  }

  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.stderr(`${error.message}\n${USAGE}`);
    return 1;
  }

  const session = new Session(io, options);
  try {
    return HANDLERS[options.command](session);
  } catch (error) {
    if (error instanceof PegforgeError) {
      session.report(error.diagnostic);
      return 1;
    }
    if (error instanceof Error && "code" in error && typeof error.code === "string") {
      // fs errors: ENOENT, EISDIR, ...
      io.stderr(`error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
