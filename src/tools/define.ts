import { z } from 'zod';
import type { ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import { InvalidPayloadError } from '../lib/errors';

/**
 * Side channel a tool uses to report progress to whoever invoked it
 */
export interface ToolContext {
  info(message: string): Promise<void>;
}

/**
 * A named, remotely invokable operation with declared argument and result shapes
 *
 * Transport adapters (MCP, plain JSON over HTTP) only ever see this erased form.
 */
export interface Tool {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly annotations: ToolAnnotations;
  /** Argument shape; unknown keys are rejected */
  readonly input: z.ZodRawShape;
  /** `input` as a strict object schema */
  readonly schema: z.AnyZodObject;
  /** Key under which MCP structured content carries the result */
  readonly resultKey: string;
  readonly result: z.ZodTypeAny;
  /**
   * Validates raw arguments and runs the tool
   *
   * @throws {InvalidPayloadError} If the arguments don't match `input`
   */
  invoke(args: unknown, ctx: ToolContext): Promise<unknown>;
}

export interface ToolSpec<TInput extends z.ZodRawShape, TResult extends z.ZodTypeAny> {
  name: string;
  title: string;
  description: string;
  annotations?: ToolAnnotations;
  input: TInput;
  resultKey: string;
  result: TResult;
  run(
    args: z.output<z.ZodObject<TInput, 'strict'>>,
    ctx: ToolContext
  ): Promise<z.input<TResult>>;
}

/**
 * Declares a tool, binding its argument schema to its implementation
 *
 * @example
 * ```typescript
 * const echo = defineTool({
 *   name: 'echo',
 *   title: 'Echo',
 *   description: 'Returns its input',
 *   input: { text: z.string() },
 *   resultKey: 'text',
 *   result: z.string(),
 *   run: async ({ text }) => text
 * });
 * ```
 */
export function defineTool<TInput extends z.ZodRawShape, TResult extends z.ZodTypeAny>(
  spec: ToolSpec<TInput, TResult>
): Tool {
  const schema = z.object(spec.input).strict();

  return {
    name: spec.name,
    title: spec.title,
    description: spec.description,
    annotations: { title: spec.title, ...spec.annotations },
    input: spec.input,
    schema,
    resultKey: spec.resultKey,
    result: spec.result,
    async invoke(args, ctx) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        throw new InvalidPayloadError(parsed.error.issues, `arguments for ${spec.name}`);
      }
      return spec.run(parsed.data, ctx);
    }
  };
}

/**
 * Context that only records progress in the server log
 */
export function logOnlyContext(log: (message: string) => void): ToolContext {
  return {
    async info(message) {
      log(message);
    }
  };
}
