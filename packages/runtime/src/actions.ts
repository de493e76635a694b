/**
 * Action evaluation for interpreted parsers.
 */

import type { ActionContext, ActionHandler, ActionNode } from "./types.js";

/** Stand-in for a custom action when no handler is installed. */
export function actionNode(context: ActionContext): ActionNode {
  return { action: context.code, rule: context.rule, values: context.bindings };
}

/**
 * Build a handler from functions keyed by action text, exactly as written
 * between the braces in the grammar. Actions missing from the table yield an
 * {@link ActionNode}.
 *
 * @example
 * ```typescript
 * const actions = actionTable({
 *   "['add', expr, term]": ({ bindings }) => ["add", bindings.expr, bindings.term],
 * });
 * ```
 */
export function actionTable(table: Readonly<Record<string, ActionHandler>>): ActionHandler {
  const handlers = new Map(Object.entries(table));
  return (context) => {
    const handler = handlers.get(context.code);
    return handler ? handler(context) : actionNode(context);
  };
}

/**
 * Value of an alternative without an action: the single bound value, or the
 * bound values in order.
 */
export function defaultValue(values: readonly unknown[]): unknown {
  return values.length === 1 ? values[0] : [...values];
}
