// packages/jobs/src/services/expression.ts

import { Context, Data, Effect, Layer, Option } from "effect";
import type { ExecutionContext } from "./execution";

// =============================================================================
// Errors
// =============================================================================

/**
 * Raised by an evaluator. The retry strategy wraps it with the job id.
 */
export class ExpressionError extends Data.TaggedError("ExpressionError")<{
  readonly expression: string;
  readonly reason: string;
}> {
  get message(): string {
    return `Cannot evaluate "${this.expression}": ${this.reason}`;
  }
}

// =============================================================================
// Service Interface
// =============================================================================

/**
 * Evaluates expressions against an execution's variables.
 *
 * The result is whatever the expression produces; callers decide which
 * values they accept.
 */
export interface ExpressionEvaluatorI {
  readonly evaluate: (
    expression: string,
    execution: Option.Option<ExecutionContext>
  ) => Effect.Effect<unknown, ExpressionError>;
}

// =============================================================================
// Service Tag
// =============================================================================

export class ExpressionEvaluator extends Context.Tag(
  "@jobcycle/jobs/ExpressionEvaluator"
)<ExpressionEvaluator, ExpressionEvaluatorI>() {}

// =============================================================================
// Variable Reference Evaluator
// =============================================================================

const REFERENCE = /[$#]\{\s*([A-Za-z_$][\w$]*)\s*\}/g;
const LONE_REFERENCE = /^[$#]\{\s*([A-Za-z_$][\w$]*)\s*\}$/;

const lookupVariable = (
  expression: string,
  execution: Option.Option<ExecutionContext>,
  name: string
): Effect.Effect<unknown, ExpressionError> => {
  if (Option.isNone(execution)) {
    return Effect.fail(
      new ExpressionError({
        expression,
        reason: `cannot resolve "${name}" without an execution`,
      })
    );
  }
  const { variables } = execution.value;
  if (!Object.prototype.hasOwnProperty.call(variables, name)) {
    return Effect.fail(
      new ExpressionError({ expression, reason: `unknown variable "${name}"` })
    );
  }
  return Effect.succeed(variables[name]);
};

/**
 * Evaluator for `${name}` and `#{name}` variable references.
 *
 * - A lone reference yields the variable's raw value
 * - References inside text are interpolated
 * - Text without references is returned unchanged
 */
export const variableExpressionEvaluator: ExpressionEvaluatorI = {
  evaluate: (expression, execution) => {
    const trimmed = expression.trim();
    const lone = LONE_REFERENCE.exec(trimmed);
    if (lone !== null) {
      return lookupVariable(expression, execution, lone[1]);
    }

    const names = Array.from(trimmed.matchAll(REFERENCE), (match) => match[1]);
    if (names.length === 0) {
      return Effect.succeed(trimmed);
    }

    return Effect.forEach(names, (name) =>
      lookupVariable(expression, execution, name)
    ).pipe(
      Effect.map((values) => {
        let index = 0;
        return trimmed.replace(REFERENCE, () => String(values[index++]));
      })
    );
  },
};

export const VariableExpressionEvaluatorLayer = Layer.succeed(
  ExpressionEvaluator,
  variableExpressionEvaluator
);
