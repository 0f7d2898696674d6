import dotenv from 'dotenv';
dotenv.config();

const readInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const serverConfig = {
  port: readInt(process.env.PORT, 5000),
  frontendUrl: process.env.FRONTEND_URL || 'http://localhost:3000',
  nodeEnv: process.env.NODE_ENV || 'development',
};

export const groqConfig = {
  apiKey: process.env.GROQ_API_KEY || '',
  model: process.env.GROQ_MODEL || 'llama-3.3-70b-versatile',
  temperature: 0.7,
  maxTokens: 150,
};

export const sessionConfig = {
  ttlSeconds: readInt(process.env.SESSION_TTL_SECONDS, 3600),
  generatorTimeoutMs: readInt(process.env.GENERATOR_TIMEOUT_MS, 30000),
  // Last 3 exchanges go to the generator; the stored transcript keeps more.
  historyWindow: 6,
  storedHistoryLimit: 40,
  defaultJobRole: 'Software Engineer',
};

export type SessionConfig = typeof sessionConfig;

if (!groqConfig.apiKey) {
  console.warn('⚠️  Groq API key is missing. Interviewer replies will use canned fallback questions.');
}
