/**
 * layerline - Capability Interface
 *
 * The single-operation contract every leaf and decorator implements.
 * A capability receives one input and resolves with one output; a failure
 * is a rejected promise carrying an Error.
 */

/**
 * ICapability - Core capability interface
 *
 * Any implementer (leaf or decorator) is substitutable wherever the
 * contract is required. Implementers must not assume they are the
 * outermost or innermost layer of a chain.
 *
 * @example
 * ```typescript
 * class UppercaseEcho implements ICapability<string, string> {
 *   async invoke(input: string): Promise<string> {
 *     return input.toUpperCase();
 *   }
 * }
 * ```
 */
export interface ICapability<TInput, TOutput> {
  /**
   * Perform the operation
   *
   * @param input - Domain input flowing down the chain
   * @returns Domain output flowing back up the chain
   */
  invoke(input: TInput): Promise<TOutput>;
}

/**
 * Capability function type for inline implementers
 */
export type CapabilityFunction<TInput, TOutput> = (input: TInput) => Promise<TOutput>;

/**
 * A layer wraps an inner capability and returns a capability of the same shape
 */
export type CapabilityLayer<TInput, TOutput> = (
  inner: ICapability<TInput, TOutput>,
) => ICapability<TInput, TOutput>;

/**
 * Type guard to check if something is a capability
 */
export function isCapability(obj: unknown): obj is ICapability<unknown, unknown> {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'invoke' in obj &&
    typeof obj.invoke === 'function'
  );
}

/**
 * Convert a function to a capability object
 */
export function createCapability<TInput, TOutput>(
  fn: CapabilityFunction<TInput, TOutput>,
): ICapability<TInput, TOutput> {
  return {
    invoke: fn,
  };
}

// ==================== Results ====================

/**
 * Outcome of a capability call with the error carried as a value.
 *
 * @example
 * ```typescript
 * const result = await settle(client, request);
 *
 * if (result.isSuccess) {
 *   console.log('Status:', result.value.status);
 * } else {
 *   console.error('Request failed:', result.error.message);
 * }
 * ```
 */
export type OperationResult<T> =
  | { readonly isSuccess: true; readonly value: T }
  | { readonly isSuccess: false; readonly error: Error };

/**
 * Invoke a capability and capture its outcome as an OperationResult.
 * Non-Error rejections are wrapped so `error` is always an Error.
 */
export async function settle<TInput, TOutput>(
  capability: ICapability<TInput, TOutput>,
  input: TInput,
): Promise<OperationResult<TOutput>> {
  try {
    const value = await capability.invoke(input);
    return { isSuccess: true, value };
  } catch (error) {
    return { isSuccess: false, error: toError(error) };
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
