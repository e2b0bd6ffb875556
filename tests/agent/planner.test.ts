import test from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';
import { PlanningFailure, ProviderTimeout } from '../../src/agent/errors.js';
import { Planner, renderMemory } from '../../src/agent/planner.js';
import { ToolRegistry } from '../../src/tools/registry.js';
import { defineTool } from '../../src/tools/types.js';
import { ScriptedLLM, makeTools, makeTurn, planReply } from '../helpers.js';

const practice = defineTool({
  name: 'practice_question',
  description: 'Pick a practice question.',
  schema: z.object({ topic: z.string().optional() }),
  async run() {
    return { found: false };
  },
});

function makePlanner(llm: ScriptedLLM) {
  return new Planner(llm, new ToolRegistry([...makeTools().tools, practice]));
}

test('turns model output into a frozen plan', async () => {
  const llm = new ScriptedLLM([
    planReply([{ tool: 'lookup', args: { query: 'tides' }, reason: 'needs facts' }], 0.85, 'Look it up'),
  ]);
  const plan = await makePlanner(llm).plan({ turn: makeTurn({ text: 'why are there tides?' }), memory: [] });

  assert.equal(plan.source, 'model');
  assert.equal(plan.confidence, 0.85);
  assert.equal(plan.reasoning, 'Look it up');
  assert.equal(plan.invocations.length, 1);
  assert.equal(plan.invocations[0].tool, 'lookup');
  assert.deepEqual(plan.invocations[0].args, { query: 'tides' });
  assert.equal(plan.invocations[0].rationale, 'needs facts');
  assert.equal(plan.invocations[0].id.length, 10);
  assert.ok(Object.isFrozen(plan));
  assert.ok(Object.isFrozen(plan.invocations[0].args));
  assert.deepEqual(llm.calls[0].opts, { json: true });
});

test('drops invocations of tools that are not registered', async () => {
  const llm = new ScriptedLLM([planReply([{ tool: 'delete_everything' }, { tool: 'lookup', args: { query: 'x' } }], 0.9)]);
  const plan = await makePlanner(llm).plan({ turn: makeTurn(), memory: [] });

  assert.deepEqual(plan.invocations.map(i => i.tool), ['lookup']);
});

test('fields the model adds to a tool call are not carried into the plan', async () => {
  const reply = JSON.stringify({
    needs_tools: true,
    confidence: 0.9,
    tools_to_use: [{ tool_name: 'lookup', parameters: { query: 'x' }, reason: 'r', validate: false }],
  });
  const plan = await makePlanner(new ScriptedLLM([reply])).plan({ turn: makeTurn(), memory: [] });

  assert.deepEqual(Object.keys(plan.invocations[0]).sort(), ['args', 'id', 'rationale', 'tool']);
});

test('a plan whose every tool is unknown needs no approval', async () => {
  const llm = new ScriptedLLM([planReply([{ tool: 'delete_everything' }], 0.2, 'Wipe it')]);
  const plan = await makePlanner(llm).plan({ turn: makeTurn(), memory: [] });

  assert.deepEqual(plan.invocations, []);
  assert.equal(plan.confidence, 1);
});

test('confidence is clamped and string confidences are read', async () => {
  const llm = new ScriptedLLM([
    planReply([{ tool: 'lookup', args: { query: 'x' } }], 1.5),
    planReply([{ tool: 'lookup', args: { query: 'x' } }], '0.7'),
  ]);
  const planner = makePlanner(llm);

  assert.equal((await planner.plan({ turn: makeTurn(), memory: [] })).confidence, 1);
  assert.equal((await planner.plan({ turn: makeTurn(), memory: [] })).confidence, 0.7);
});

test('missing or unreadable confidence falls back to the heuristic', async () => {
  const llm = new ScriptedLLM([
    planReply([{ tool: 'lookup', args: { query: 'x' } }]),
    planReply([{ tool: 'lookup', args: { query: 'x' } }], 'high'),
  ]);
  const planner = makePlanner(llm);
  const turn = makeTurn({ text: 'Please analyze my essay structure in detail' });

  assert.equal((await planner.plan({ turn, memory: [] })).confidence, 0.5);
  assert.equal((await planner.plan({ turn, memory: [] })).confidence, 0.5);
});

test('needs_tools false yields an empty plan with full confidence', async () => {
  const llm = new ScriptedLLM([
    JSON.stringify({
      needs_tools: false,
      reasoning: 'Just chatting',
      confidence: 0.3,
      tools_to_use: [{ tool_name: 'lookup', parameters: { query: 'x' } }],
    }),
  ]);
  const plan = await makePlanner(llm).plan({ turn: makeTurn(), memory: [] });

  assert.deepEqual(plan.invocations, []);
  assert.equal(plan.confidence, 1);
  assert.equal(plan.reasoning, 'Just chatting');
});

test('unparseable output uses the keyword fallback', async () => {
  const llm = new ScriptedLLM(['I think you should practice', 'What a lovely day', '{"tools_to_use": "lookup"}']);
  const planner = makePlanner(llm);

  const practicePlan = await planner.plan({ turn: makeTurn({ text: 'I think you should practice' }), memory: [] });
  assert.equal(practicePlan.source, 'fallback');
  assert.equal(practicePlan.reasoning, 'Fallback: keyword match for practice_question');
  assert.equal(practicePlan.confidence, 0.9);
  assert.deepEqual(practicePlan.invocations.map(i => [i.tool, i.args]), [['practice_question', {}]]);

  const chatPlan = await planner.plan({ turn: makeTurn({ text: 'What a lovely day' }), memory: [] });
  assert.deepEqual(chatPlan, {
    invocations: [],
    confidence: 1,
    reasoning: 'Fallback: general question, no tools needed',
    source: 'fallback',
  });

  // Valid JSON that is not a plan is treated the same way.
  const wrongShape = await planner.plan({ turn: makeTurn({ text: 'hello' }), memory: [] });
  assert.equal(wrongShape.source, 'fallback');
  assert.deepEqual(wrongShape.invocations, []);
});

test('fallback skips tools the registry does not have', () => {
  const planner = makePlanner(new ScriptedLLM());
  const plan = planner.fallbackPlan('show my progress');

  // learning_progress is not registered here.
  assert.deepEqual(plan.invocations, []);
  assert.equal(plan.source, 'fallback');
});

test('language-study keywords fall back to a topic explanation', () => {
  const explain = defineTool({
    name: 'explain_topic',
    description: 'Explain a topic.',
    schema: z.object({ topic: z.string() }),
    async run() {
      return {};
    },
  });
  const planner = new Planner(new ScriptedLLM(), new ToolRegistry([explain]));
  const plan = planner.fallbackPlan('Help me with English tenses');

  assert.deepEqual(plan.invocations.map(i => [i.tool, i.args]), [['explain_topic', { topic: 'Help me with English tenses' }]]);
  assert.equal(plan.reasoning, 'Fallback: keyword match for explain_topic');
});

test('provider errors become retryable planning failures', async () => {
  const llm = new ScriptedLLM([new ProviderTimeout('took too long')]);
  await assert.rejects(makePlanner(llm).plan({ turn: makeTurn(), memory: [] }), (err: unknown) => {
    assert.ok(err instanceof PlanningFailure);
    assert.equal(err.retryable, true);
    assert.equal(err.message, 'Planner could not reach the model: took too long');
    return true;
  });
});

test('other model errors are not retryable', async () => {
  const llm = new ScriptedLLM([new Error('bad request')]);
  await assert.rejects(makePlanner(llm).plan({ turn: makeTurn(), memory: [] }), (err: unknown) => {
    assert.ok(err instanceof PlanningFailure);
    assert.equal(err.retryable, false);
    return true;
  });
});

test('the prompt carries the tool catalog, memory and learner message', async () => {
  const llm = new ScriptedLLM([planReply([])]);
  const memory = [makeTurn({ text: 'quiz me', answer: 'Here is one.', feedback: { decision: 'reject' } })];
  await makePlanner(llm).plan({ turn: makeTurn({ text: 'next one please' }), memory });

  const prompt = llm.calls[0].prompt;
  assert.ok(prompt.includes('- save_note [sensitive]: Write a note to the learner\'s record.'));
  assert.ok(prompt.includes('Learner: quiz me\nCoach: Here is one.\nReviewer rejected the plan.'));
  assert.ok(prompt.endsWith('LEARNER MESSAGE:\nnext one please'));
});

test('renderMemory formats turns oldest first', () => {
  assert.equal(renderMemory([]), 'No previous turns.');
  assert.equal(
    renderMemory([
      makeTurn({ text: 'a', answer: 'b' }),
      makeTurn({ text: 'c', feedback: { decision: 'modify', text: 'shorter' } }),
    ]),
    'Learner: a\nCoach: b\n\nLearner: c\nReviewer asked for a different plan: shorter'
  );
});
