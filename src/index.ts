#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { AppConfig, ConfigOverrides, ensureDataDirs, loadConfig } from './config.js';
import { CoachError } from './agent/errors.js';
import { CoachingService, TurnResponse } from './agent/service.js';
import { DecisionKind, RunOutcome, decisionKindSchema } from './agent/types.js';
import { OpenAILLM } from './llm/openai.js';
import { createConsoleLogger } from './observability/logger.js';
import { describeRequest } from './policy/approvals.js';
import { createCoachingTools } from './tools/impl/index.js';

interface CommonOptions {
  dataDir?: string;
  model?: string;
  approvalThreshold?: string;
  approval?: boolean;
  logLevel?: string;
  trace?: boolean;
}

function buildService(opts: CommonOptions): { cfg: AppConfig; service: CoachingService } {
  const overrides: ConfigOverrides = {
    DATA_DIR: opts.dataDir,
    APPROVAL_THRESHOLD: opts.approvalThreshold,
    HUMAN_APPROVAL: opts.approval === false ? false : undefined,
    LOG_LEVEL: opts.logLevel,
  };
  const cfg = loadConfig(overrides);
  ensureDataDirs(cfg);
  const logger = createConsoleLogger(cfg.LOG_LEVEL);
  const llm = new OpenAILLM(cfg, opts.model);
  const service = new CoachingService({
    cfg,
    llm,
    tools: createCoachingTools(cfg, llm),
    logger,
    onTransition: opts.trace
      ? s => console.log(chalk.gray(`  · ${s.transitions[s.transitions.length - 1]?.from} → ${s.status}`))
      : undefined,
  });
  return { cfg, service };
}

function printResponse(res: TurnResponse) {
  if (res.status === 'answered') {
    console.log(chalk.bold('\nCoach: ') + res.answer);
  } else if (res.status === 'pending_approval') {
    console.log(chalk.yellow(`\n${describeRequest(res.approval)}`));
    console.log(chalk.gray(`Run ID: ${res.runId}`));
  } else {
    console.log(chalk.red(`\nCoach: ${res.answer}`));
    console.log(chalk.gray(res.retryable ? 'This can be retried.' : 'This request cannot be completed.'));
  }
}

function printOutcome(outcome: RunOutcome) {
  if (outcome.type === 'completed') printResponse({ status: 'answered', runId: outcome.runId, answer: outcome.answer });
  else if (outcome.type === 'pending_approval') printResponse({ status: 'pending_approval', runId: outcome.runId, approval: outcome.request });
  else printResponse({ status: 'failed', runId: outcome.runId, answer: outcome.answer, retryable: outcome.retryable });
}

async function main(action: () => Promise<void>) {
  try {
    await action();
  } catch (err) {
    if (err instanceof CoachError) {
      console.error(chalk.red(`${err.code}: ${err.message}`));
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

const program = new Command();

function parseDecision(value: string): DecisionKind {
  const parsed = decisionKindSchema.safeParse(value);
  return parsed.success ? parsed.data : program.error(`Unknown decision "${value}": use approve, reject or modify`);
}

program
  .name('coach-agent')
  .description('Study coach with planning, human approval and resumable runs')
  .version('0.1.0')
  .option('--data-dir <dir>', 'data directory for sessions, checkpoints and progress')
  .option('--model <model>', 'OpenAI model to use')
  .option('--approval-threshold <n>', 'plans below this confidence wait for approval (0-1)')
  .option('--no-approval', 'never pause for human approval')
  .option('--log-level <level>', 'debug | info | warn | error | silent')
  .option('--trace', 'print every run status change');

program.command('chat')
  .description('Interactive coaching session')
  .option('-u, --user <id>', 'user id', 'local')
  .option('-s, --session <id>', 'session id', 'default')
  .option('--metrics', 'print metrics when the session ends')
  .action((opts: { user: string; session: string; metrics?: boolean }) => main(async () => {
    const { service } = buildService(program.opts<CommonOptions>());
    const rl = readline.createInterface({ input, output });
    console.log(chalk.cyan(`Session ${opts.user}/${opts.session}. Type /history or /exit.`));
    try {
      let waiting = await service.pending(opts.user, opts.session);
      if (waiting) console.log(chalk.yellow(describeRequest(waiting)));
      for (;;) {
        if (waiting) {
          const ans = (await rl.question('Approve? [y]es / [n]o / [m]odify: ')).trim().toLowerCase();
          const kind = ans.startsWith('y') ? 'approve' : ans.startsWith('m') ? 'modify' : 'reject';
          const feedback = kind === 'approve' ? undefined : (await rl.question('Feedback (optional): ')).trim() || undefined;
          printResponse(await service.submitDecision(opts.user, opts.session, kind, feedback));
          waiting = undefined;
          continue;
        }
        const text = (await rl.question(chalk.green('\nYou: '))).trim();
        if (!text) continue;
        if (text === '/exit') break;
        if (text === '/history') {
          for (const ex of await service.chatHistory(opts.user, opts.session)) {
            console.log(`${chalk.green('You:')} ${ex.human}\n${chalk.bold('Coach:')} ${ex.ai}\n`);
          }
          continue;
        }
        const res = await service.submitTurn(opts.user, opts.session, text);
        printResponse(res);
        if (res.status === 'pending_approval') waiting = res.approval;
      }
    } finally {
      rl.close();
    }
    if (opts.metrics) console.log(chalk.gray(service.metrics.exportPrometheusMetrics()));
  }));

program.command('ask')
  .argument('<text...>', 'message for the coach')
  .option('-u, --user <id>', 'user id', 'local')
  .option('-s, --session <id>', 'session id', 'default')
  .description('Send one message; prints the answer or the pending approval')
  .action((words: string[], opts: { user: string; session: string }) => main(async () => {
    const { service } = buildService(program.opts<CommonOptions>());
    printResponse(await service.submitTurn(opts.user, opts.session, words.join(' ')));
  }));

program.command('decide')
  .argument('<decision>', 'approve | reject | modify')
  .argument('[feedback...]', 'feedback for the coach')
  .option('-u, --user <id>', 'user id', 'local')
  .option('-s, --session <id>', 'session id', 'default')
  .description("Resolve the session's pending approval")
  .action((decision: string, feedback: string[], opts: { user: string; session: string }) => main(async () => {
    const kind = parseDecision(decision);
    const { service } = buildService(program.opts<CommonOptions>());
    printResponse(await service.submitDecision(opts.user, opts.session, kind, feedback.join(' ') || undefined));
  }));

program.command('resume')
  .argument('<runId>', 'suspended run id')
  .argument('<decision>', 'approve | reject | modify')
  .argument('[feedback...]', 'feedback for the coach')
  .description('Resolve a pending approval by run id')
  .action((runId: string, decision: string, feedback: string[]) => main(async () => {
    const kind = parseDecision(decision);
    const { service } = buildService(program.opts<CommonOptions>());
    const text = feedback.join(' ');
    printOutcome(await service.orchestrator.resume(runId, { kind, ...(text ? { feedback: text } : {}) }));
  }));

program.command('cancel')
  .argument('<runId>', 'suspended run id')
  .argument('[reason...]', 'why the run is cancelled')
  .description('Abort a run that is waiting for approval')
  .action((runId: string, reason: string[]) => main(async () => {
    const { service } = buildService(program.opts<CommonOptions>());
    printOutcome(await service.orchestrator.cancel(runId, reason.join(' ') || undefined));
  }));

program.command('pending')
  .description('List runs waiting for approval')
  .action(() => main(async () => {
    const { service } = buildService(program.opts<CommonOptions>());
    const requests = await service.orchestrator.pending();
    if (requests.length === 0) console.log(chalk.gray('No runs waiting for approval.'));
    for (const r of requests) {
      console.log(chalk.yellow(`${r.runId}`) + ` ${r.message}`);
    }
  }));

program.command('history')
  .option('-u, --user <id>', 'user id', 'local')
  .option('-s, --session <id>', 'session id', 'default')
  .description('Show the conversation of a session')
  .action((opts: { user: string; session: string }) => main(async () => {
    const { service } = buildService(program.opts<CommonOptions>());
    const history = await service.chatHistory(opts.user, opts.session);
    if (history.length === 0) console.log(chalk.gray('No turns yet.'));
    for (const ex of history) console.log(`${chalk.green('You:')} ${ex.human}\n${chalk.bold('Coach:')} ${ex.ai}\n`);
  }));

program.command('tools')
  .description('List registered tools')
  .action(() => main(async () => {
    const { service } = buildService(program.opts<CommonOptions>());
    const tools = service.registry.catalog();
    console.log(chalk.bold(`Tools (${tools.length}):`));
    for (const t of tools) {
      console.log(`- ${t.name}${t.sensitive ? chalk.yellow(' [sensitive]') : ''}: ${t.description}`);
    }
  }));

await program.parseAsync();
