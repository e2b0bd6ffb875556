import { z } from 'zod';
import { LLM } from '../../llm/interfaces.js';
import { defineTool } from '../types.js';

const schema = z.object({
  topic: z.string().min(1).describe('concept to explain, e.g. "subject-verb agreement"'),
  level: z.enum(['beginner', 'intermediate', 'advanced']).default('intermediate'),
  withExamples: z.boolean().default(true),
});

export function createExplainTopicTool(llm: LLM) {
  return defineTool({
    name: 'explain_topic',
    description: 'Explain a study topic at the requested level, optionally with worked examples.',
    schema,
    async run({ topic, level, withExamples }) {
      const prompt = [
        `Explain "${topic}" to a ${level} learner in under 200 words.`,
        withExamples ? 'Finish with two short examples.' : 'Do not include examples.',
      ].join('\n');
      const output = await llm.complete(prompt);
      return { topic, level, explanation: output.trim() };
    },
  });
}
