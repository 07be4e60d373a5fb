import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { ProviderAdapter, ProviderResponse } from '../../src/core/providers/ProviderAdapter.js';

export async function createTempDir(prefix = 'extraction-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export type Responder = (prompt: string, call: number) => Promise<ProviderResponse> | ProviderResponse;

/**
 * In-process adapter that records prompts and in-flight calls
 */
export class FakeAdapter implements ProviderAdapter {
  readonly maxTokens = 1024;
  readonly prompts: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    public readonly provider: string,
    public readonly model: string,
    private readonly respond: Responder
  ) {}

  async process(prompt: string): Promise<ProviderResponse> {
    this.prompts.push(prompt);
    const call = this.prompts.length;
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return await this.respond(prompt, call);
    } finally {
      this.inFlight--;
    }
  }
}
