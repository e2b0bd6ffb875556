import { z } from 'zod';

export type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

export const jsonSchema: z.ZodType<Json> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonSchema), z.record(jsonSchema)])
);

export const RUN_STATUSES = ['planning', 'awaiting_approval', 'executing', 'responding', 'completed', 'aborted'] as const;
export const runStatusSchema = z.enum(RUN_STATUSES);
export type RunStatus = z.infer<typeof runStatusSchema>;

export const nodeNameSchema = z.enum(['planner', 'approval_gate', 'executor', 'responder', 'end']);
export type NodeName = z.infer<typeof nodeNameSchema>;

export const sessionKeySchema = z.object({
  userId: z.string().min(1),
  sessionId: z.string().min(1),
});
export type SessionKey = z.infer<typeof sessionKeySchema>;

export const decisionKindSchema = z.enum(['approve', 'reject', 'modify']);
export type DecisionKind = z.infer<typeof decisionKindSchema>;

export const approvalDecisionSchema = z.object({
  kind: decisionKindSchema,
  feedback: z.string().optional(),
});
export type ApprovalDecision = z.infer<typeof approvalDecisionSchema>;

export const turnSchema = z.object({
  id: z.string(),
  userId: z.string(),
  sessionId: z.string(),
  runId: z.string(),
  text: z.string(),
  answer: z.string().optional(),
  createdAt: z.number(),
  completedAt: z.number().optional(),
  // Set when the plan for this turn was rejected or sent back for changes.
  feedback: z
    .object({
      decision: z.enum(['reject', 'modify']),
      text: z.string().optional(),
    })
    .optional(),
});
export type Turn = z.infer<typeof turnSchema>;

export const toolInvocationSchema = z.object({
  id: z.string(),
  tool: z.string(),
  args: z.record(jsonSchema),
  rationale: z.string(),
});
export type ToolInvocation = z.infer<typeof toolInvocationSchema>;

export const planSchema = z.object({
  invocations: z.array(toolInvocationSchema),
  confidence: z.number().min(0).max(1),
  reasoning: z.string(),
  source: z.enum(['model', 'fallback']),
});
export type Plan = z.infer<typeof planSchema>;

export const toolErrorKindSchema = z.enum(['UnknownTool', 'InvalidArguments', 'ToolTimeout', 'ToolExecutionError']);
export type ToolErrorKind = z.infer<typeof toolErrorKindSchema>;

export const toolResultSchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    invocationId: z.string(),
    tool: z.string(),
    output: jsonSchema,
    durationMs: z.number(),
  }),
  z.object({
    ok: z.literal(false),
    invocationId: z.string(),
    tool: z.string(),
    error: z.object({ kind: toolErrorKindSchema, message: z.string() }),
    durationMs: z.number(),
  }),
]);
export type ToolResult = z.infer<typeof toolResultSchema>;

export const approvalRequestSchema = z.object({
  runId: z.string(),
  plan: planSchema,
  confidence: z.number(),
  reasons: z.array(z.string()),
  sensitiveTools: z.array(z.string()),
  message: z.string(),
  requestedAt: z.number(),
});
export type ApprovalRequest = z.infer<typeof approvalRequestSchema>;

export const runFailureSchema = z.object({
  code: z.string(),
  reason: z.string(),
  retryable: z.boolean(),
});
export type RunFailure = z.infer<typeof runFailureSchema>;

export const transitionSchema = z.object({
  from: runStatusSchema,
  to: runStatusSchema,
  at: z.number(),
});
export type Transition = z.infer<typeof transitionSchema>;

export const runStateSchema = z.object({
  runId: z.string(),
  session: sessionKeySchema,
  turn: turnSchema,
  status: runStatusSchema,
  position: nodeNameSchema,
  plan: planSchema.optional(),
  toolResults: z.array(toolResultSchema),
  approval: approvalRequestSchema.optional(),
  decision: approvalDecisionSchema.optional(),
  answer: z.string().optional(),
  failure: runFailureSchema.optional(),
  transitions: z.array(transitionSchema),
  createdAt: z.number(),
  updatedAt: z.number(),
});
export type RunState = z.infer<typeof runStateSchema>;

export type RunOutcome =
  | { type: 'completed'; runId: string; answer: string; toolResults: ToolResult[] }
  | { type: 'pending_approval'; runId: string; request: ApprovalRequest }
  | { type: 'failed'; runId: string; answer: string; reason: string; code: string; retryable: boolean };
