import { DiagnosticBuilder, PEG2001, PegforgeError } from "@pegforge/core";

/**
 * Left-recursion classification failed: a cluster has no rule on every cycle,
 * or a rule classified as not left-recursive re-entered itself at the same
 * position while parsing.
 */
export class AmbiguousLeftRecursionError extends PegforgeError {
  constructor(
    readonly rules: readonly string[],
    notes: readonly string[] = [],
    help?: string
  ) {
    const builder = new DiagnosticBuilder(PEG2001).withArgs({ rules: rules.map((r) => `\`${r}\``).join(", ") });
    for (const note of notes) builder.note(note);
    if (help !== undefined) builder.help(help);
    super(builder.build());
    this.name = "AmbiguousLeftRecursionError";
  }
}
