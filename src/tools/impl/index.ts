import { AppConfig } from '../../config.js';
import { LLM } from '../../llm/interfaces.js';
import { AnyToolSpec } from '../types.js';
import { createExplainTopicTool } from './explain_topic.js';
import { createLearningProgressTool } from './learning_progress.js';
import { createPracticeQuestionTool } from './practice_question.js';
import { createRecordProgressTool } from './record_progress.js';
import { ProgressFile } from './progress.js';
import { QuestionBank } from './questions.js';
import searchWeb from './search_web.js';

export function createCoachingTools(cfg: AppConfig, llm: LLM): AnyToolSpec[] {
  // One of each, so every progress write goes through the same append chain.
  const bank = new QuestionBank(cfg.QUESTION_BANK);
  const progress = new ProgressFile(cfg.DATA_DIR);
  return [
    searchWeb,
    createExplainTopicTool(llm),
    createPracticeQuestionTool(bank, progress),
    createRecordProgressTool(bank, progress),
    createLearningProgressTool(progress),
  ];
}
