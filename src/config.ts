import dotenv from 'dotenv';
import type { DegreeDecimals } from './modules/impact/scoring';

dotenv.config();

function parseDegreeDecimals(value: string | undefined): DegreeDecimals {
  return value?.trim() === '2' ? 2 : 1;
}

function parseOrigins(value: string | undefined): string[] {
  return (value || 'http://localhost:3000,http://localhost:3001')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
}

export const config = {
  port: Number(process.env.PORT) || 4000,
  corsOrigins: parseOrigins(process.env.CORS_ORIGINS),
  bodyLimit: '1mb',
  report: {
    // Older exports rounded the degree of impact to 2 decimals; 1 is the current format.
    degreeDecimals: parseDegreeDecimals(process.env.IMPACT_DEGREE_DECIMALS),
  },
};

/**
 * Read on every call so a key added or removed at runtime is picked up per request.
 */
export function getOpenAIConfig() {
  const temperature = process.env.OPENAI_TEMPERATURE ? Number(process.env.OPENAI_TEMPERATURE) : NaN;
  return {
    apiKey: (process.env.OPENAI_API_KEY || '').trim(),
    model: process.env.OPENAI_MODEL || 'gpt-4.1-mini',
    temperature: Number.isFinite(temperature) ? temperature : 0.4,
  };
}
