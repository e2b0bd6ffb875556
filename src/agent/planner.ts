import { nanoid } from 'nanoid';
import { z } from 'zod';
import { LLM } from '../llm/interfaces.js';
import { sanitizeToJson } from '../llm/openai.js';
import { Logger, silentLogger } from '../observability/logger.js';
import { ToolRegistry } from '../tools/registry.js';
import { deepFreeze } from '../utils/freeze.js';
import { containsAny, truncateMiddle } from '../utils/text.js';
import { assessConfidence, clampConfidence } from './confidence.js';
import { CoachError, PlanningFailure, errorMessage } from './errors.js';
import { Json, Plan, ToolInvocation, Turn, jsonSchema } from './types.js';

// What the model is asked to return. Parsed leniently: missing fields get defaults.
const modelPlanSchema = z.object({
  needs_tools: z.boolean().optional(),
  reasoning: z.string().default(''),
  confidence: z.union([z.number(), z.string()]).optional(),
  tools_to_use: z
    .array(
      z.object({
        tool_name: z.string(),
        parameters: z.record(jsonSchema).default({}),
        reason: z.string().default(''),
      })
    )
    .default([]),
});
type ModelPlan = z.infer<typeof modelPlanSchema>;

export interface PlanInput {
  turn: Turn;
  // Prior turns of the session, oldest first. The caller picks the window.
  memory: Turn[];
}

export class Planner {
  private log: Logger;

  constructor(private llm: LLM, private registry: ToolRegistry, logger: Logger = silentLogger) {
    this.log = logger.child('planner');
  }

  async plan({ turn, memory }: PlanInput): Promise<Plan> {
    const prompt = this.buildPrompt(turn.text, memory);
    let raw: string;
    try {
      raw = await this.llm.complete(prompt, { json: true });
    } catch (err) {
      const retryable = err instanceof CoachError ? err.retryable : false;
      throw new PlanningFailure(`Planner could not reach the model: ${errorMessage(err)}`, retryable, { cause: err });
    }

    const parsed = parseModelPlan(raw);
    if (!parsed) {
      this.log.warn('model output was not a plan, using keyword fallback', { preview: truncateMiddle(raw, 120) });
      return this.fallbackPlan(turn.text);
    }
    return this.toPlan(turn.text, parsed);
  }

  private toPlan(text: string, model: ModelPlan): Plan {
    const invocations: ToolInvocation[] = [];
    if (model.needs_tools !== false) {
      for (const call of model.tools_to_use) {
        if (!this.registry.has(call.tool_name)) {
          this.log.warn('dropping invocation of unknown tool', { tool: call.tool_name });
          continue;
        }
        invocations.push({
          id: nanoid(10),
          tool: call.tool_name,
          args: call.parameters,
          rationale: call.reason,
        });
      }
    }

    // A plan without tools goes straight to the responder, so its confidence is moot.
    const confidence = invocations.length === 0 ? 1 : readConfidence(model.confidence) ?? assessConfidence(text, invocations.length);
    this.log.debug('plan ready', { tools: invocations.map(i => i.tool), confidence });
    return deepFreeze<Plan>({
      invocations,
      confidence,
      reasoning: model.reasoning || (invocations.length ? 'Tools selected by the model.' : 'No tools needed.'),
      source: 'model',
    });
  }

  // Keyword routing for when the model answers with something other than a plan.
  fallbackPlan(text: string): Plan {
    const lc = text.toLowerCase();
    let call: { tool: string; args: Record<string, Json>; rationale: string } | undefined;
    if (containsAny(lc, ['practice', 'question', 'start'])) {
      call = { tool: 'practice_question', args: {}, rationale: 'Learner wants practice questions' };
    } else if (containsAny(lc, ['progress', 'performance'])) {
      call = { tool: 'learning_progress', args: {}, rationale: 'Learner wants to see progress' };
    } else if (containsAny(lc, ['grammar', 'english', 'vocabulary'])) {
      call = { tool: 'explain_topic', args: { topic: text }, rationale: 'Learner needs English study material' };
    }

    if (!call || !this.registry.has(call.tool)) {
      return deepFreeze<Plan>({ invocations: [], confidence: 1, reasoning: 'Fallback: general question, no tools needed', source: 'fallback' });
    }
    return deepFreeze<Plan>({
      invocations: [{ id: nanoid(10), ...call }],
      confidence: assessConfidence(text, 1),
      reasoning: `Fallback: keyword match for ${call.tool}`,
      source: 'fallback',
    });
  }

  buildPrompt(text: string, memory: Turn[]): string {
    return `You are the planning step of a study-coach assistant with access to these tools:

${this.registry.describe()}

PREVIOUS CONVERSATION:
${renderMemory(memory)}

Decide whether the learner's message needs any tools. Be specific about why.
Reviewer feedback on earlier plans, when present, takes priority.

Reply with only JSON in this exact format:
{
  "needs_tools": true,
  "reasoning": "why these tools are used, or why none are needed",
  "confidence": 0.0-1.0,
  "tools_to_use": [
    { "tool_name": "exact_tool_name", "parameters": { "param": "value" }, "reason": "why this call" }
  ]
}
If no tools are needed, set "needs_tools" to false and "tools_to_use" to [].

LEARNER MESSAGE:
${text}`;
  }
}

export function renderMemory(memory: Turn[]): string {
  if (memory.length === 0) return 'No previous turns.';
  return memory
    .map(t => {
      const lines = [`Learner: ${truncateMiddle(t.text, 500)}`];
      if (t.answer) lines.push(`Coach: ${truncateMiddle(t.answer, 500)}`);
      if (t.feedback) {
        const verdict = t.feedback.decision === 'modify' ? 'asked for a different plan' : 'rejected the plan';
        lines.push(`Reviewer ${verdict}${t.feedback.text ? `: ${t.feedback.text}` : '.'}`);
      }
      return lines.join('\n');
    })
    .join('\n\n');
}

function parseModelPlan(raw: string): ModelPlan | undefined {
  const json = sanitizeToJson(raw);
  if (!json) return undefined;
  const parsed = modelPlanSchema.safeParse(JSON.parse(json));
  return parsed.success ? parsed.data : undefined;
}

function readConfidence(value: ModelPlan['confidence']): number | undefined {
  if (value === undefined) return undefined;
  const n = typeof value === 'number' ? value : Number.parseFloat(value);
  return Number.isFinite(n) ? clampConfidence(n) : undefined;
}
