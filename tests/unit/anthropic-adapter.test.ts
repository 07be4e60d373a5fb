import { beforeEach, describe, expect, it, vi } from 'vitest';

const mockCreate = vi.fn();

vi.mock('@anthropic-ai/sdk', () => {
  return {
    default: vi.fn().mockImplementation(() => ({
      messages: {
        create: mockCreate,
      },
    })),
  };
});

import Anthropic from '@anthropic-ai/sdk';
import { AnthropicAdapter } from '../../src/core/providers/AnthropicAdapter.js';
import { SYSTEM_INSTRUCTION } from '../../src/core/providers/ProviderAdapter.js';
import { ComponentLogger } from '../../src/utils/logger.js';

describe('AnthropicAdapter', () => {
  let adapter: AnthropicAdapter;

  beforeEach(() => {
    vi.clearAllMocks();
    adapter = new AnthropicAdapter({
      provider: 'claude',
      model: 'claude-3-5-sonnet-20241022',
      maxTokens: 4096,
      apiKey: 'test-secret',
    });

    mockCreate.mockResolvedValue({
      content: [
        { type: 'text', text: '[{"incident_id":' },
        { type: 'text', text: '"i1"}]' },
      ],
      stop_reason: 'end_turn',
      usage: { input_tokens: 80, output_tokens: 40 },
    });
  });

  it('uses a ten minute timeout and no SDK retries by default', () => {
    expect(Anthropic).toHaveBeenCalledWith({ apiKey: 'test-secret', timeout: 600000, maxRetries: 0 });
  });

  it('joins text blocks and sums input and output tokens', async () => {
    const response = await adapter.process('Extract this complaint');

    expect(response).toEqual({ content: '[{"incident_id":"i1"}]', tokens: 120 });
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'claude-3-5-sonnet-20241022',
      max_tokens: 4096,
      temperature: 0,
      system: SYSTEM_INSTRUCTION,
      messages: [{ role: 'user', content: 'Extract this complaint' }],
      stream: false,
    });
  });

  it('rejects responses without text', async () => {
    mockCreate.mockResolvedValueOnce({ content: [], stop_reason: 'end_turn', usage: { input_tokens: 1, output_tokens: 0 } });
    await expect(adapter.process('p')).rejects.toThrow('No text content in response');
  });

  it('keeps a response cut off at the token limit and warns', async () => {
    const warn = vi.spyOn(ComponentLogger.prototype, 'warn');
    mockCreate.mockResolvedValueOnce({
      content: [{ type: 'text', text: '[' }],
      stop_reason: 'max_tokens',
      usage: { input_tokens: 10, output_tokens: 4096 },
    });

    await expect(adapter.process('p')).resolves.toEqual({ content: '[', tokens: 4106 });
    expect(warn).toHaveBeenCalledWith('Response truncated at the token limit', { model: 'claude-3-5-sonnet-20241022', outputTokens: 4096 });
    warn.mockRestore();
  });

  it('labels authentication failures', async () => {
    mockCreate.mockRejectedValue(Object.assign(new Error('invalid x-api-key'), { status: 401 }));

    await expect(adapter.process('p')).rejects.toThrow('Authentication failed (401): invalid x-api-key');
  });
});
