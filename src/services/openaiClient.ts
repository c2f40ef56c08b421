import OpenAI from 'openai';

export const OPENAI_MODELS = {
  SUMMARY: process.env.OPENAI_SUMMARY_MODEL || 'gpt-4o'
};

export const OPENAI_TIMEOUT_MS = Number(process.env.OPENAI_TIMEOUT_MS || 30000);

export function hasOpenAIKey(): boolean {
  return Boolean(process.env.OPENAI_API_KEY);
}

export function getOpenAIClient(): OpenAI {
  const apiKey = process.env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new Error('OPENAI_API_KEY is missing. Please set it in your .env file');
  }
  return new OpenAI({ apiKey, timeout: OPENAI_TIMEOUT_MS });
}
