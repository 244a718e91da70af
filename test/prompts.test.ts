// This test suite verifies prompt rendering and prompt-argument completion.

import { describe, expect, it } from 'vitest';
import { completePromptArgument } from '../src/mcp/completion.js';
import { getPrompt, listPrompts } from '../src/mcp/prompts.js';
import { captureError } from './helpers.js';

describe('prompt catalog', () => {
  it('lists prompts with their declared arguments', () => {
    const prompts = listPrompts();

    expect(prompts.map((prompt) => prompt.name)).toEqual(['summarize_document', 'weather_report', 'research_topic']);
    expect(prompts[0].arguments).toEqual([
      { name: 'url', description: 'Absolute http(s) URL of the document.', required: true },
      { name: 'style', description: 'Summary style: brief, detailed, bullet-points.', required: false }
    ]);
  });

  it('renders a prompt with defaults for optional arguments', () => {
    const prompt = getPrompt('summarize_document', { url: 'https://docs.example.com/a' });

    expect(prompt.description).toBe('Fetch a document with fetch_document and summarize it.');
    expect(prompt.messages).toEqual([
      {
        role: 'user',
        content: {
          type: 'text',
          text:
            'Use the fetch_document tool to read https://docs.example.com/a, then write a brief summary of it. ' +
            'Mention the document title if it has one and cite the URL.'
        }
      }
    ]);
  });

  it('scales research depth into the number of searches', () => {
    const text = getPrompt('research_topic', { topic: 'tide pools', depth: 'thorough' }).messages[0].content.text;
    expect(text).toContain('Run up to 3 search_web queries');
  });

  it('rejects unknown prompts and missing required arguments as invalid params', () => {
    expect(captureError(() => getPrompt('write_poem', {}))).toMatchObject({ code: 'invalid_params' });
    expect(captureError(() => getPrompt('weather_report', { city: '  ' }))).toMatchObject({
      code: 'invalid_params',
      details: { missing: ['city'] }
    });
  });
});

describe('prompt argument completion', () => {
  it('filters candidates by case-insensitive prefix', () => {
    const completion = completePromptArgument({
      ref: { type: 'ref/prompt', name: 'weather_report' },
      argument: { name: 'city', value: 'b' }
    });

    expect(completion).toEqual({ values: ['Barcelona', 'Berlin', 'Boston'], total: 3, hasMore: false });
  });

  it('returns every candidate for an empty value and none for unknown arguments', () => {
    expect(
      completePromptArgument({
        ref: { type: 'ref/prompt', name: 'weather_report' },
        argument: { name: 'units', value: '' }
      }).values
    ).toEqual(['metric', 'imperial']);

    expect(
      completePromptArgument({
        ref: { type: 'ref/prompt', name: 'research_topic' },
        argument: { name: 'topic', value: 'x' }
      })
    ).toEqual({ values: [], total: 0, hasMore: false });
  });

  it('ignores argument names that only exist on the prototype chain', () => {
    for (const name of ['toString', 'constructor', '__proto__', 'hasOwnProperty']) {
      expect(
        completePromptArgument({ ref: { type: 'ref/prompt', name: 'weather_report' }, argument: { name, value: '' } })
      ).toEqual({ values: [], total: 0, hasMore: false });
    }
  });

  it('rejects resource references', () => {
    const error = captureError(() =>
      completePromptArgument({ ref: { type: 'ref/resource', uri: 'server://info' }, argument: { name: 'x', value: '' } })
    );
    expect(error).toMatchObject({ code: 'invalid_params' });
  });
});
