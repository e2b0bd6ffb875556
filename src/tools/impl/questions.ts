import { readFile } from 'node:fs/promises';
import { z } from 'zod';

export const difficultySchema = z.enum(['easy', 'medium', 'hard']);
export type Difficulty = z.infer<typeof difficultySchema>;

const questionSchema = z.object({
  id: z.string(),
  topic: z.string(),
  difficulty: difficultySchema,
  text: z.string(),
  options: z.array(z.string()).min(2),
  answer: z.string(),
});
export type PracticeQuestion = z.infer<typeof questionSchema>;

export interface QuestionFilter {
  topic?: string;
  difficulty?: Difficulty;
  exclude?: string[];
}

// "b", "B" and "B) has" all mean option B.
export function normalizeAnswer(answer: string): string {
  return answer.trim().toUpperCase().replace(/\).*$/s, '').trim();
}

/** Multiple-choice questions, read once from a JSON file. */
export class QuestionBank {
  private questions: Promise<PracticeQuestion[]> | undefined;

  constructor(private path: string) {}

  load(): Promise<PracticeQuestion[]> {
    this.questions ??= readFile(this.path, 'utf-8')
      .then(raw => z.array(questionSchema).parse(JSON.parse(raw)))
      .catch((err: unknown) => {
        // A failed read is retried on the next call.
        this.questions = undefined;
        throw err;
      });
    return this.questions;
  }

  async find(id: string): Promise<PracticeQuestion | undefined> {
    return (await this.load()).find(q => q.id === id);
  }

  async pick({ topic, difficulty, exclude = [] }: QuestionFilter): Promise<PracticeQuestion | undefined> {
    const wanted = topic?.toLowerCase();
    return (await this.load()).find(
      q =>
        !exclude.includes(q.id) &&
        (!wanted || q.topic.toLowerCase() === wanted) &&
        (!difficulty || q.difficulty === difficulty)
    );
  }

  async grade(id: string, answer: string): Promise<{ question: PracticeQuestion; correct: boolean } | undefined> {
    const question = await this.find(id);
    if (!question) return undefined;
    return { question, correct: normalizeAnswer(answer) === normalizeAnswer(question.answer) };
  }
}
