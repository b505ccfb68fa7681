import type { Diagnostic, DiagnosticKind, RuleName, Token } from '../types';
import { buildMessage } from '../diagnostics';

/** Outcome of one grammar rule. A failure has already been reported. */
export type RuleResult<T> = { ok: true; value: T } | { ok: false };

export const FAILED: RuleResult<never> = { ok: false };

export function succeed<T>(value: T): RuleResult<T> {
  return { ok: true, value };
}

/** Mutable state for one parse invocation */
export interface ParseContext {
  diagnostics: Diagnostic[];
  /** Active rules, outermost first */
  rules: RuleName[];
  /** Index of the tune being built, once it has been allocated */
  tune?: number;
}

export function createParseContext(): ParseContext {
  return { diagnostics: [], rules: [] };
}

/** Run `fn` with `rule` pushed on the rule stack. */
export function withRule<T>(ctx: ParseContext, rule: RuleName, fn: () => T): T {
  ctx.rules.push(rule);
  try {
    return fn();
  } finally {
    ctx.rules.pop();
  }
}

export function currentRule(ctx: ParseContext): RuleName {
  return ctx.rules[ctx.rules.length - 1] ?? 'File';
}

/**
 * Record a diagnostic at `token`, tagged with the active rule stack.
 * A `found` end-of-input token turns an unexpected-token report into
 * `PrematureEnd` so running out of input reads differently from a wrong token.
 */
export function addDiagnostic(
  ctx: ParseContext,
  kind: DiagnosticKind,
  token: Token,
  expected?: string
): void {
  const actualKind = kind === 'UnexpectedToken' && token.kind === 'EndOfInput' ? 'PrematureEnd' : kind;
  const rule = currentRule(ctx);
  const diagnostic: Diagnostic = {
    kind: actualKind,
    rule,
    context: [...ctx.rules],
    position: { ...token.span.start },
    message: buildMessage(actualKind, rule, { expected, found: token }),
  };
  if (expected !== undefined) diagnostic.expected = expected;
  if (actualKind !== 'PrematureEnd') diagnostic.found = token.lexeme;
  if (ctx.tune !== undefined) diagnostic.tune = ctx.tune;
  ctx.diagnostics.push(diagnostic);
}
