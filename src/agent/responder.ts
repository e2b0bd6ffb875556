import { LLM } from '../llm/interfaces.js';
import { Logger, silentLogger } from '../observability/logger.js';
import { truncateMiddle } from '../utils/text.js';
import { ResponderFailure, errorMessage } from './errors.js';
import { renderMemory } from './planner.js';
import { ApprovalDecision, Plan, ToolResult, Turn } from './types.js';

export const FALLBACK_ANSWER =
  'I apologize, but I encountered an error while generating my response. Please try asking your question again.';

export interface ResponseInput {
  turn: Turn;
  memory: Turn[];
  plan?: Plan;
  toolResults: ToolResult[];
  // Present when a reviewer rejected or sent back the plan.
  decision?: ApprovalDecision;
}

export class Responder {
  private log: Logger;

  constructor(private llm: LLM, logger: Logger = silentLogger) {
    this.log = logger.child('responder');
  }

  async respond(input: ResponseInput): Promise<string> {
    const declined = input.decision && input.decision.kind !== 'approve' ? input.decision : undefined;
    let answer: string;
    try {
      answer = await this.generate(input);
    } catch (err) {
      if (!(err instanceof ResponderFailure)) throw err;
      this.log.error('using fallback answer', { error: err.message });
      return declined ? declinedAnswer(declined) : FALLBACK_ANSWER;
    }
    return declined && !mentionsDecision(answer) ? `${declinedAnswer(declined)}\n\n${answer}` : answer;
  }

  private async generate(input: ResponseInput): Promise<string> {
    let answer: string;
    try {
      answer = (await this.llm.complete(this.buildPrompt(input))).trim();
    } catch (err) {
      throw new ResponderFailure(`Responder could not reach the model: ${errorMessage(err)}`, { cause: err });
    }
    if (!answer) throw new ResponderFailure('Model returned an empty answer');
    return answer;
  }

  buildPrompt({ turn, memory, plan, toolResults, decision }: ResponseInput): string {
    const sections = [
      'You are a helpful, encouraging study coach. Answer the learner directly.',
      `Planning decision:\n${plan?.reasoning ?? 'Direct response without tools'}`,
    ];
    if (toolResults.length) {
      sections.push(`Tool results:\n${toolResults.map(summarizeResult).join('\n')}`);
      sections.push('If any tool failed or returned partial information, say so and still help as best you can.');
    }
    if (decision && decision.kind !== 'approve') {
      sections.push(
        `A reviewer ${decision.kind === 'modify' ? 'asked for changes to' : 'rejected'} the proposed plan, so no tools were run.` +
          (decision.feedback ? `\nReviewer feedback: ${decision.feedback}` : '') +
          '\nAcknowledge this to the learner and answer without the tools.'
      );
    }
    sections.push(`Previous conversation:\n${renderMemory(memory)}`);
    sections.push(`Learner message:\n${turn.text}`);
    return sections.join('\n\n');
  }
}

function summarizeResult(r: ToolResult): string {
  if (r.ok) return `- ${r.tool}: ${truncateMiddle(JSON.stringify(r.output), 1000)}`;
  return `- ${r.tool} failed (${r.error.kind}): ${r.error.message}`;
}

function declinedAnswer(decision: ApprovalDecision): string {
  const head =
    decision.kind === 'modify'
      ? "Understood, I won't run that plan. I'll take your feedback into account next time."
      : "Understood, the proposed plan was rejected, so I didn't run any tools.";
  return decision.feedback ? `${head} Your feedback: "${decision.feedback}"` : head;
}

function mentionsDecision(answer: string): boolean {
  return /reject|declin|feedback|won't run|did not run|didn't run/i.test(answer);
}
