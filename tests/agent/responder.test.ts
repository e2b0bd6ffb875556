import test from 'node:test';
import assert from 'node:assert/strict';
import { ProviderUnavailable } from '../../src/agent/errors.js';
import { FALLBACK_ANSWER, Responder } from '../../src/agent/responder.js';
import { ToolResult } from '../../src/agent/types.js';
import { ScriptedLLM, makeTurn } from '../helpers.js';

const turn = makeTurn({ text: 'Is this sentence correct?' });

test('returns the trimmed model answer', async () => {
  const llm = new ScriptedLLM(['  Yes, it is correct.  ']);
  assert.equal(await new Responder(llm).respond({ turn, memory: [], toolResults: [] }), 'Yes, it is correct.');
});

test('falls back to an apology when the model fails or says nothing', async () => {
  const llm = new ScriptedLLM([new ProviderUnavailable('down'), '   ']);
  const responder = new Responder(llm);

  assert.equal(await responder.respond({ turn, memory: [], toolResults: [] }), FALLBACK_ANSWER);
  assert.equal(await responder.respond({ turn, memory: [], toolResults: [] }), FALLBACK_ANSWER);
});

test('a declined plan is acknowledged even when the model fails', async () => {
  const llm = new ScriptedLLM([new Error('boom')]);
  const answer = await new Responder(llm).respond({
    turn,
    memory: [],
    toolResults: [],
    decision: { kind: 'modify', feedback: 'use simpler words' },
  });
  assert.equal(answer, 'Understood, I won\'t run that plan. I\'ll take your feedback into account next time. Your feedback: "use simpler words"');
});

test('an answer that already mentions the rejection is kept as is', async () => {
  const llm = new ScriptedLLM(['Since you rejected the plan, here is a quick answer: yes.']);
  const answer = await new Responder(llm).respond({ turn, memory: [], toolResults: [], decision: { kind: 'reject' } });
  assert.equal(answer, 'Since you rejected the plan, here is a quick answer: yes.');
});

test('the prompt summarizes tool results and failures', () => {
  const results: ToolResult[] = [
    { ok: true, invocationId: 'a', tool: 'lookup', output: { hits: 1 }, durationMs: 3 },
    { ok: false, invocationId: 'b', tool: 'slow', error: { kind: 'ToolTimeout', message: 'Tool slow timed out after 20ms' }, durationMs: 20 },
  ];
  const prompt = new Responder(new ScriptedLLM()).buildPrompt({
    turn,
    memory: [],
    plan: { invocations: [], confidence: 1, reasoning: 'Check the grammar', source: 'model' },
    toolResults: results,
  });

  assert.ok(prompt.includes('Planning decision:\nCheck the grammar'));
  assert.ok(prompt.includes('Tool results:\n- lookup: {"hits":1}\n- slow failed (ToolTimeout): Tool slow timed out after 20ms'));
  assert.ok(prompt.endsWith('Previous conversation:\nNo previous turns.\n\nLearner message:\nIs this sentence correct?'));
});

test('the prompt passes reviewer feedback along', () => {
  const prompt = new Responder(new ScriptedLLM()).buildPrompt({
    turn,
    memory: [],
    toolResults: [],
    decision: { kind: 'reject', feedback: 'too slow' },
  });
  assert.ok(prompt.includes('A reviewer rejected the proposed plan, so no tools were run.\nReviewer feedback: too slow'));
  assert.ok(prompt.includes('Planning decision:\nDirect response without tools'));
});
