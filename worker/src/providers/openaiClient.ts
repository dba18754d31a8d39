import fs from 'fs';
import path from 'path';
import OpenAI from 'openai';
import { config, logger, type AiAssessment } from '@shellmatch/shared';
import { buildUserPrompt, computedAssessment, parseJudgeResponse } from '../judge';
import type { JudgeInput, RelationshipJudge } from '../types';

const PROMPT_PATH = path.join(__dirname, '../prompts/relationship-validator.md');

let systemPrompt: string | null = null;

export function getSystemPrompt(): string {
  if (systemPrompt === null) systemPrompt = fs.readFileSync(PROMPT_PATH, 'utf8');
  return systemPrompt;
}

export class OpenAiJudge implements RelationshipJudge {
  readonly name = 'openai';
  private readonly client: OpenAI;

  constructor(apiKey: string, private readonly model = config.openaiModel) {
    this.client = new OpenAI({ apiKey, timeout: config.openaiTimeoutMs, maxRetries: config.openaiMaxRetries });
  }

  async assess(input: JudgeInput): Promise<AiAssessment> {
    const resp = await this.client.chat.completions.create({
      model: this.model,
      temperature: 0,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: getSystemPrompt() },
        { role: 'user', content: buildUserPrompt(input) },
      ],
    });
    const text = resp.choices[0]?.message?.content ?? '';
    logger.debug('AI judge raw response', { model: this.model, length: text.length });
    const parsed = parseJudgeResponse(text);
    return { success: true, source: 'ai', ...parsed, raw_response: text };
  }
}

// Judge that scores from the computed flags only; used when no API key is configured.
export class ComputedJudge implements RelationshipJudge {
  readonly name = 'computed';

  async assess(input: JudgeInput): Promise<AiAssessment> {
    return computedAssessment(input);
  }
}

export function createJudge(): RelationshipJudge {
  if (!config.openaiApiKey) {
    logger.warn('OpenAI API key missing; using computed assessments');
    return new ComputedJudge();
  }
  return new OpenAiJudge(config.openaiApiKey);
}
