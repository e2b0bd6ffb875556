import { z } from 'zod';
import { defineTool } from '../types.js';
import { ProgressFile, summarizeProgress } from './progress.js';
import { Difficulty, PracticeQuestion, QuestionBank, QuestionFilter, difficultySchema } from './questions.js';

const schema = z.object({
  topic: z.string().optional(),
  difficulty: difficultySchema.optional(),
  exclude: z.array(z.string()).default([]).describe('question ids already asked'),
  adaptive: z.boolean().default(false).describe("target the learner's weakest topic"),
});

// Weak topics get easier questions until accuracy recovers.
export function difficultyFor(accuracy: number): Difficulty {
  if (accuracy < 30) return 'easy';
  if (accuracy < 70) return 'medium';
  return 'hard';
}

export function createPracticeQuestionTool(bank: QuestionBank, progress: ProgressFile) {
  return defineTool({
    name: 'practice_question',
    description:
      'Pick a multiple-choice practice question by topic and difficulty. With adaptive, picks from the learner\'s weakest topic.',
    schema,
    async run({ topic, difficulty, exclude, adaptive }, { userId }) {
      const attempts: QuestionFilter[] = [{ topic, difficulty, exclude }];
      let focus: { topic: string; accuracy: number } | undefined;
      if (adaptive && !topic) {
        // summarizeProgress sorts weakest first.
        const [weak] = summarizeProgress(await progress.read(userId));
        if (weak) {
          focus = { topic: weak.topic, accuracy: weak.accuracy };
          // Fall back to the weak topic at any difficulty, then to anything.
          attempts.unshift(
            { topic: weak.topic, difficulty: difficulty ?? difficultyFor(weak.accuracy), exclude },
            { topic: weak.topic, exclude }
          );
        }
      }

      let match: PracticeQuestion | undefined;
      for (const filter of attempts) {
        match = await bank.pick(filter);
        if (match) break;
      }
      if (!match) return { found: false, topic: topic ?? null, difficulty: difficulty ?? null };
      // The answer stays server-side until record_progress grades it.
      const { answer: _answer, ...question } = match;
      return focus ? { found: true, question, focus } : { found: true, question };
    },
  });
}
