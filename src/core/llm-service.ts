// ═══════════════════════════════════════════════════════════════
// Workforce Agents :: LLM Service
// Single boundary to the Anthropic Messages API
// Never throws: every failure degrades to a rule-based reply
// ═══════════════════════════════════════════════════════════════

import Anthropic from '@anthropic-ai/sdk';
import fs from 'fs';
import { CONFIG } from './config.js';
import { errorMessage, type LoggerHandle } from './types.js';

export interface GenerateOptions {
  systemPrompt?: string;
  includeDirectory?: boolean;
  model?: 'chat' | 'analysis';
}

export interface LanguageModel {
  isAvailable(): boolean;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
  generateStructured(prompt: string, systemPrompt?: string): Promise<string>;
}

/** Read-only view of the employee records used for prompt context */
export interface EmployeeDirectory {
  summary(): string;
  describe(nameFragment: string): string | null;
}

/** The part of a Messages API reply this service reads */
export interface MessagesReply {
  content: Array<{ type: string; text?: string }>;
}

/** The part of the SDK client this service calls */
export interface MessagesClient {
  messages: {
    create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<MessagesReply>;
  };
}

export interface LLMServiceOptions {
  apiKey?: string;
  client?: MessagesClient | null;
  directory?: EmployeeDirectory;
  systemPrompt?: string;
}

const DEFAULT_SYSTEM_PROMPT = 'You are the operations assistant for an internal workforce platform. Answer briefly and factually.';

export class LLMService implements LanguageModel {
  private client: MessagesClient | null;
  private logger: LoggerHandle;
  private directory: EmployeeDirectory | null;
  private systemPrompt: string;

  constructor(logger: LoggerHandle, options: LLMServiceOptions = {}) {
    this.logger = logger;
    this.directory = options.directory ?? null;

    const apiKey = options.apiKey ?? CONFIG.anthropic.apiKey;
    if (options.client !== undefined) {
      this.client = options.client;
    } else if (apiKey) {
      this.client = new Anthropic({
        apiKey,
        timeout: CONFIG.anthropic.timeoutMs,
        maxRetries: CONFIG.anthropic.maxRetries,
      });
    } else {
      this.client = null;
      this.logger.warn('No ANTHROPIC_API_KEY set, using rule-based fallback responses');
    }

    if (options.systemPrompt !== undefined) {
      this.systemPrompt = options.systemPrompt;
    } else {
      try {
        this.systemPrompt = fs.readFileSync(CONFIG.systemPrompt.path, 'utf-8');
      } catch {
        this.systemPrompt = DEFAULT_SYSTEM_PROMPT;
        this.logger.warn('System prompt file not found, using default');
      }
    }
  }

  setDirectory(directory: EmployeeDirectory): void {
    this.directory = directory;
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    if (!this.client) return this.fallback(prompt);

    let system = options.systemPrompt || this.systemPrompt;
    if (options.includeDirectory && this.directory) {
      system += `\n\n${this.directory.summary()}`;
      system += '\nYou have access to the current employee directory. Use it to answer questions about specific employees.';
    }

    try {
      const response = await this.client.messages.create({
        model: options.model === 'analysis' ? CONFIG.anthropic.analysisModel : CONFIG.anthropic.model,
        max_tokens: CONFIG.anthropic.maxTokens,
        temperature: CONFIG.anthropic.temperature,
        system,
        messages: [{ role: 'user', content: prompt }],
      });

      const text = response.content
        .map(block => (block.type === 'text' ? block.text ?? '' : ''))
        .join('')
        .trim();

      if (!text) {
        this.logger.warn('LLM returned no text content, using fallback');
        return this.fallback(prompt);
      }
      return text;
    } catch (err) {
      this.logger.warn(`LLM call failed: ${errorMessage(err)}`);
      return this.fallback(prompt);
    }
  }

  /** JSON-oriented call on the analysis model. Callers parse the text. */
  generateStructured(prompt: string, systemPrompt = ''): Promise<string> {
    return this.generate(prompt, { systemPrompt, model: 'analysis' });
  }

  // ── Rule-based fallback ──

  fallback(prompt: string): string {
    const lower = prompt.toLowerCase();

    if (this.directory && (lower.includes('employee') || lower.includes('who is'))) {
      for (const word of prompt.split(/\s+/)) {
        const cleaned = word.replace(/[^\p{L}\p{N}'-]/gu, '');
        if (cleaned.length < 3) continue;
        const found = this.directory.describe(cleaned);
        if (found) return found;
      }
    }

    if (lower.includes('leave') && lower.includes('balance')) {
      return 'You can check your leave balance in the employee portal or contact HR.';
    }
    if (lower.includes('policy')) {
      return 'Please refer to the employee handbook or ask HR for specific policy details.';
    }
    return 'I understand your query. Please contact HR for detailed assistance.';
  }
}
