import { ApprovalRequest, Plan } from '../agent/types.js';

export interface ApprovalPolicy {
  // Plans below this confidence wait for a human. Lower values auto-approve more.
  threshold: number;
  // When false the gate never suspends, sensitive tools included.
  enabled: boolean;
}

export type GateResult =
  | { kind: 'pass'; plan: Plan }
  | { kind: 'suspend'; request: ApprovalRequest };

/**
 * Decides whether a plan may run unattended. Pure: reads the plan and the
 * sensitivity lookup, performs no I/O, never touches tool results.
 */
export function evaluateApproval(
  runId: string,
  plan: Plan,
  policy: ApprovalPolicy,
  isSensitive: (tool: string) => boolean,
  now: number = Date.now()
): GateResult {
  if (!policy.enabled || plan.invocations.length === 0) return { kind: 'pass', plan };

  const sensitiveTools = [...new Set(plan.invocations.map(i => i.tool).filter(isSensitive))];
  const lowConfidence = plan.confidence < policy.threshold;
  if (!lowConfidence && sensitiveTools.length === 0) return { kind: 'pass', plan };

  const reasons = approvalReasons(plan.confidence, policy.threshold, sensitiveTools);
  return {
    kind: 'suspend',
    request: {
      runId,
      plan,
      confidence: plan.confidence,
      reasons,
      sensitiveTools,
      message: `Human approval needed: ${reasons.join(', ')} (confidence: ${plan.confidence.toFixed(2)})`,
      requestedAt: now,
    },
  };
}

export function approvalReasons(confidence: number, threshold: number, sensitiveTools: string[]): string[] {
  const reasons: string[] = [];
  if (confidence < 0.5) reasons.push('very low confidence');
  else if (confidence < 0.7) reasons.push('low confidence');
  if (confidence < threshold && confidence >= 0.7) reasons.push(`below threshold ${threshold}`);
  for (const tool of sensitiveTools) reasons.push(`sensitive tool: ${tool}`);
  return reasons.length ? reasons : ['requires review'];
}

export function describeRequest(request: ApprovalRequest): string {
  const calls = request.plan.invocations
    .map(i => `  - ${i.tool}(${JSON.stringify(i.args)})${i.rationale ? `: ${i.rationale}` : ''}`)
    .join('\n');
  return `${request.message}\nPlan: ${request.plan.reasoning}\n${calls}`;
}
