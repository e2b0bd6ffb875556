import test from 'node:test';
import assert from 'node:assert/strict';
import { z } from 'zod';
import { ConfigError } from '../../src/agent/errors.js';
import { ToolRegistry } from '../../src/tools/registry.js';
import { defineTool } from '../../src/tools/types.js';

const lookup = defineTool({
  name: 'lookup',
  description: 'Find facts.',
  schema: z.object({
    query: z.string().describe('what to find'),
    limit: z.number().optional(),
    level: z.enum(['easy', 'hard']).default('easy'),
  }),
  async run() {
    return null;
  },
});

const ping = defineTool({
  name: 'ping',
  description: 'Ping.',
  sensitive: true,
  async run() {
    return 'pong';
  },
});

test('looks tools up by name', () => {
  const registry = new ToolRegistry([lookup, ping]);
  assert.equal(registry.get('lookup'), lookup);
  assert.equal(registry.get('nope'), undefined);
  assert.equal(registry.has('ping'), true);
  assert.deepEqual(registry.list().map(t => t.name), ['lookup', 'ping']);
});

test('reports sensitivity', () => {
  const registry = new ToolRegistry([lookup, ping]);
  assert.equal(registry.isSensitive('ping'), true);
  assert.equal(registry.isSensitive('lookup'), false);
  assert.equal(registry.isSensitive('nope'), false);
});

test('catalog describes parameters from the schema', () => {
  const [entry] = new ToolRegistry([lookup]).catalog();
  assert.deepEqual(entry, {
    name: 'lookup',
    description: 'Find facts.',
    sensitive: false,
    parameters: [
      { name: 'query', type: 'string', optional: false, description: 'what to find' },
      { name: 'limit', type: 'number', optional: true, description: undefined },
      { name: 'level', type: 'easy | hard', optional: true, description: undefined },
    ],
  });
});

test('describe renders the catalog for the planner', () => {
  assert.equal(
    new ToolRegistry([lookup, ping]).describe(),
    [
      '- lookup: Find facts.',
      '  Parameters:',
      '    - query (string): what to find',
      '    - limit? (number)',
      '    - level? (easy | hard)',
      '- ping [sensitive]: Ping.',
      '  Parameters:',
      '    None',
    ].join('\n')
  );
});

test('rejects malformed registrations', () => {
  const make = (name: string, extra: { description?: string; timeoutMs?: number } = {}) =>
    defineTool({ name, description: extra.description ?? 'x', timeoutMs: extra.timeoutMs, run: async () => null });

  assert.throws(() => new ToolRegistry([make('lookup'), make('lookup')]), ConfigError);
  assert.throws(() => new ToolRegistry([make('Bad-Name')]), ConfigError);
  assert.throws(() => new ToolRegistry([make('x')]), ConfigError);
  assert.throws(() => new ToolRegistry([make('blank', { description: '  ' })]), ConfigError);
  assert.throws(() => new ToolRegistry([make('zero_timeout', { timeoutMs: 0 })]), ConfigError);
});
