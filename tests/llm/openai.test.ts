import test from 'node:test';
import assert from 'node:assert/strict';
import { ProviderUnavailable } from '../../src/agent/errors.js';
import { loadConfig } from '../../src/config.js';
import { OpenAILLM, sanitizeToJson } from '../../src/llm/openai.js';

test('sanitizeToJson strips code fences', () => {
  assert.equal(sanitizeToJson('```json\n{"needs_tools": false}\n```'), '{"needs_tools": false}');
});

test('sanitizeToJson pulls an object out of surrounding prose', () => {
  assert.equal(sanitizeToJson('Here is the plan: {"a": 1} hope it helps'), '{"a": 1}');
});

test('sanitizeToJson returns null when there is no JSON', () => {
  assert.equal(sanitizeToJson(''), null);
  assert.equal(sanitizeToJson('no plan today'), null);
  assert.equal(sanitizeToJson('{ not json }'), null);
});

test('without an API key the provider is unavailable', async () => {
  const llm = new OpenAILLM(loadConfig({}, {}));
  await assert.rejects(llm.complete('hello'), ProviderUnavailable);
});
