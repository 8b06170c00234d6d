import { registerAs } from '@nestjs/config';

export interface LlmConfig {
  apiUrl: string;
  apiKey?: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

export default registerAs('llm', (): LlmConfig => ({
  apiUrl: process.env.LLM_API_URL || 'https://api.siliconflow.cn/v1/chat/completions',
  apiKey: process.env.LLM_API_KEY?.trim() || undefined,
  model: process.env.LLM_MODEL || 'deepseek-ai/DeepSeek-V3',
  temperature: parseFloat(process.env.LLM_TEMPERATURE || '0.3'),
  timeoutMs: parseInt(process.env.LLM_TIMEOUT_MS || '60000', 10),
}));
