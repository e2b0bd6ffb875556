import { z } from 'zod';
import { defineTool } from '../types.js';

const schema = z.object({
  query: z.string().min(1).describe('what to look up'),
  maxResults: z.number().int().min(1).max(10).default(5),
});

const tavilyResponse = z.object({
  results: z
    .array(
      z.object({
        title: z.string().default(''),
        url: z.string().default(''),
        content: z.string().optional(),
        snippet: z.string().optional(),
      })
    )
    .default([]),
});

export default defineTool({
  name: 'search_web',
  description: 'Search the web for current facts, news and general knowledge. Returns titles, URLs and snippets.',
  schema,
  async run({ query, maxResults }, { signal }) {
    const apiKey = process.env.TAVILY_API_KEY;
    if (!apiKey) throw new Error('Missing TAVILY_API_KEY');
    const res = await fetch('https://api.tavily.com/search', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ api_key: apiKey, query, max_results: maxResults }),
      signal,
    });
    if (!res.ok) throw new Error(`HTTP ${res.status}`);
    const json = tavilyResponse.parse(await res.json());
    const results = json.results.map(r => ({
      title: r.title,
      url: r.url,
      snippet: r.content || r.snippet || '',
    }));
    return { query, results };
  },
});
