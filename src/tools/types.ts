import { z } from 'zod';

export interface ToolContext {
  userId: string;
  sessionId: string;
  runId: string;
  signal: AbortSignal;
}

export interface ToolSpec<T extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  schema?: T;
  // Plans that touch a sensitive tool always go to a human first.
  sensitive?: boolean;
  // Validate arguments against `schema` before running. Defaults to true.
  strictArgs?: boolean;
  timeoutMs?: number;
  run(args: z.infer<T>, ctx: ToolContext): Promise<unknown>;
}

// Erases the schema parameter so differently-typed tools fit in one registry.
export type AnyToolSpec = ToolSpec<z.ZodTypeAny>;

export function defineTool<T extends z.ZodTypeAny>(spec: ToolSpec<T>): AnyToolSpec {
  return spec;
}
