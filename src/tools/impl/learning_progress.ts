import { z } from 'zod';
import { defineTool } from '../types.js';
import { ProgressFile, summarizeProgress } from './progress.js';

const schema = z.object({
  userId: z.string().min(1),
  topic: z.string().optional(),
});

export function createLearningProgressTool(progress: ProgressFile) {
  return defineTool({
    name: 'learning_progress',
    description: "Summarize the learner's accuracy per topic, weakest topics first.",
    schema,
    async run({ userId, topic }) {
      const entries = await progress.read(userId);
      const topics = summarizeProgress(topic ? entries.filter(e => e.topic === topic) : entries);
      return { userId, totalAnswers: entries.length, topics };
    },
  });
}
