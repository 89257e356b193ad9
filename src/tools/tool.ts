/**
 * Tool namespace: how a capability is described to an agent host.
 *
 * A tool is an id plus a lazy `init` that builds its description, its
 * parameter schema and its `execute` function. The host calls `init` once,
 * shows the description to the model, and calls `execute` with parsed
 * arguments and a context for progress updates.
 */

import type { z } from 'zod';

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace Tool {
  export interface Metadata {
    [key: string]: unknown;
  }

  /**
   * Handed to `execute`. `metadata` lets a running tool publish a title or
   * partial metadata before its result is ready.
   */
  export interface Context<M extends Metadata = Metadata> {
    metadata(input: { title?: string; metadata?: Partial<M> }): void;
  }

  export interface InitContext {
    onDebug?: (message: string, data?: Record<string, unknown>) => void;
  }

  export interface Result<M extends Metadata = Metadata> {
    title: string;
    metadata: M;
    /** Text returned to the model */
    output: string;
  }

  export interface Initialized<P extends z.ZodType = z.ZodType, M extends Metadata = Metadata> {
    description: string;
    parameters: P;
    execute(args: z.infer<P>, ctx: Context<M>): Result<M> | Promise<Result<M>>;
  }

  export type Init<P extends z.ZodType = z.ZodType, M extends Metadata = Metadata> = (
    ctx?: InitContext
  ) => Initialized<P, M> | Promise<Initialized<P, M>>;

  export interface Info<P extends z.ZodType = z.ZodType, M extends Metadata = Metadata> {
    id: string;
    init: Init<P, M>;
  }

  export function define<P extends z.ZodType, M extends Metadata = Metadata>(
    id: string,
    init: Init<P, M>
  ): Info<P, M> {
    return { id, init };
  }

  /**
   * Context whose `metadata` discards updates unless overridden.
   */
  export function createNoopContext<M extends Metadata = Metadata>(
    overrides?: Partial<Context<M>>
  ): Context<M> {
    return {
      metadata: () => {},
      ...overrides,
    };
  }
}
