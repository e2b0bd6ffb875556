import { z } from 'zod';
import { defineTool } from '../types.js';
import { ProgressFile } from './progress.js';
import { QuestionBank } from './questions.js';

const schema = z.object({
  userId: z.string().min(1),
  questionId: z.string().min(1),
  answer: z.string().min(1).describe("the learner's chosen option, e.g. \"B\""),
});

export function createRecordProgressTool(bank: QuestionBank, progress: ProgressFile) {
  return defineTool({
    name: 'record_progress',
    description: "Grade the learner's answer to a practice question and record it in their progress history.",
    schema,
    // Writes to the learner's record
    sensitive: true,
    async run({ userId, questionId, answer }) {
      const graded = await bank.grade(questionId, answer);
      if (!graded) throw new Error(`Unknown question ${questionId}`);
      const { question, correct } = graded;
      const total = await progress.append(userId, { topic: question.topic, correct, questionId, at: Date.now() });
      return { recorded: true, questionId, topic: question.topic, correct, correctAnswer: question.answer, totalAnswers: total };
    },
  });
}
