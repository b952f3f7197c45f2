/**
 * RowFunction: base class for targets and evaluators.
 *
 * Each function declares its parameters explicitly, so the pipeline can check which
 * columns it needs without inspecting the function itself.
 */

/**
 * Declared parameter of a row function.
 */
export interface ParameterSpec {
  name: string;
  /** The function can run without this parameter. */
  hasDefault?: boolean;
  /** Catch-all parameter: receives every mapped column not declared elsewhere. */
  variadic?: boolean;
}

/** A bare string declares a required parameter. */
export type ParameterDecl = string | ParameterSpec;

/** Parameter names that are never treated as required inputs. */
export const RESERVED_PARAMETER_NAMES: ReadonlySet<string> = new Set(['self', 'args', 'kwargs']);

export type RowInputs = Record<string, unknown>;

/**
 * Base class for all targets and evaluators.
 *
 * Example:
 * ```ts
 * class AnswerLength extends RowFunction {
 *   readonly parameters = ['answer'];
 *   call({ answer }: RowInputs) {
 *     return { length: String(answer).length };
 *   }
 * }
 * ```
 */
export abstract class RowFunction {
  abstract readonly parameters: readonly ParameterDecl[];

  /**
   * Name used for runs of this function. Defaults to the constructor name.
   */
  getName(): string {
    return this.constructor.name;
  }

  /**
   * Normalized parameter descriptors.
   */
  getParameters(): ParameterSpec[] {
    return this.parameters.map((p) => (typeof p === 'string' ? { name: p } : { ...p }));
  }

  /**
   * Names of the parameters that must be supplied: no default, not variadic, not reserved.
   */
  requiredInputs(): string[] {
    return this.getParameters()
      .filter((p) => !p.hasDefault && !p.variadic && !RESERVED_PARAMETER_NAMES.has(p.name))
      .map((p) => p.name);
  }

  /**
   * Whether the function accepts mapped columns it does not declare.
   */
  acceptsExtraInputs(): boolean {
    return this.getParameters().some((p) => p.variadic);
  }

  /**
   * Process one line. A plain object return value produces one output column per key;
   * anything else is stored under the `output` column.
   */
  abstract call(inputs: RowInputs): unknown;

  toString(): string {
    const params = this.getParameters()
      .map((p) => (p.variadic ? `...${p.name}` : p.hasDefault ? `${p.name}?` : p.name))
      .join(', ');
    return `${this.getName()}(${params})`;
  }
}

/**
 * Options for wrapping a plain function as a RowFunction.
 */
export interface DefineFunctionOptions {
  name?: string;
  parameters: readonly ParameterDecl[];
  fn: (inputs: RowInputs) => unknown;
}

class FunctionRowFunction extends RowFunction {
  readonly parameters: readonly ParameterDecl[];
  private readonly name: string;
  private readonly fn: (inputs: RowInputs) => unknown;

  constructor(opts: DefineFunctionOptions) {
    super();
    this.parameters = [...opts.parameters];
    this.name = opts.name ?? (opts.fn.name || 'function');
    this.fn = opts.fn;
  }

  getName(): string {
    return this.name;
  }

  call(inputs: RowInputs): unknown {
    return this.fn(inputs);
  }
}

/**
 * Wrap a plain (sync or async) function with a declared parameter list.
 */
export function defineFunction(opts: DefineFunctionOptions): RowFunction {
  return new FunctionRowFunction(opts);
}
