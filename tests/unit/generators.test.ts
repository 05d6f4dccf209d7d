/**
 * Anthropic Generator Adapter Tests
 *
 * The adapters are exercised against an in-process completion client that
 * records prompts and request options.
 */

import { describe, it, expect } from 'vitest';
import {
  AnthropicQuizGenerator,
  AnthropicSyllabusGenerator,
  type CompletionClient,
} from '../../src/core/generation';
import type { RequestOptions } from '../../src/llm';

interface RecordedCall {
  prompt: string;
  options: RequestOptions | undefined;
}

function mockClient(text: string, truncated = false) {
  const calls: RecordedCall[] = [];
  const client: CompletionClient = {
    complete: async (request, options) => {
      calls.push({ prompt: request.prompt, options });
      return { text, truncated, usage: null };
    },
  };
  return { client, calls };
}

describe('AnthropicQuizGenerator', () => {
  it('should return the raw text and forward signal and timeout', async () => {
    const { client, calls } = mockClient('{"quiz": []}');
    const generator = new AnthropicQuizGenerator(client, { maxSourceChars: 100, timeoutMs: 5000 });
    const controller = new AbortController();

    const text = await generator.generate(
      { concepts: ['Recursion'], sourceMaterial: 'Notes', itemCount: 3, mode: 'focused' },
      controller.signal
    );

    expect(text).toBe('{"quiz": []}');
    expect(calls).toHaveLength(1);
    expect(calls[0].options).toEqual({ signal: controller.signal, timeoutMs: 5000 });
    expect(calls[0].prompt).toContain('- Write exactly 3 questions');
  });

  it('should still return a reply cut off at the token limit', async () => {
    const { client } = mockClient('{"quiz": [', true);
    const generator = new AnthropicQuizGenerator(client, { maxSourceChars: 100 });

    await expect(
      generator.generate({ concepts: ['Graphs'], sourceMaterial: 'Notes', itemCount: 2, mode: 'general' })
    ).resolves.toBe('{"quiz": [');
  });

  it('should truncate long source material', async () => {
    const { client, calls } = mockClient('{}');
    const generator = new AnthropicQuizGenerator(client, { maxSourceChars: 5 });

    await generator.generate({
      concepts: ['Sorting'],
      sourceMaterial: 'abcdefghij',
      itemCount: 1,
      mode: 'general',
    });

    expect(calls[0].prompt).toContain('abcde\n[... material truncated ...]');
    expect(calls[0].prompt).not.toContain('abcdef');
  });
});

describe('AnthropicSyllabusGenerator', () => {
  const options = { maxSourceChars: 1000, maxConcepts: 20, maxConceptLength: 50 };

  it('should return the parsed concept list', async () => {
    const { client } = mockClient('```json\n{"concepts": ["Recursion", "Sorting"]}\n```');
    const generator = new AnthropicSyllabusGenerator(client, options);

    await expect(generator.generate('Notes')).resolves.toEqual(['Recursion', 'Sorting']);
  });

  it('should throw when the response has no concept list', async () => {
    const { client } = mockClient('I could not find any concepts.');
    const generator = new AnthropicSyllabusGenerator(client, options);

    await expect(generator.generate('Notes')).rejects.toThrow(
      'Unusable syllabus response (no_json): Response contains no JSON object'
    );
  });
});
