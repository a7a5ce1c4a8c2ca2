import { instrumentPresets } from '@fingerboard/theory';

const DEFAULT_API_PORT = 4180;
const DEFAULT_INSTRUMENT = 'guitar';
const DEFAULT_MAX_RESULTS = 24;

export interface ApiConfig {
  port: number;
  defaultInstrument: string;
  maxResults: number;
}

export const resolveApiPort = (rawPort: string | undefined, fallback = DEFAULT_API_PORT): number => {
  if (rawPort === undefined || rawPort.trim() === '') {
    return fallback;
  }

  const port = Number(rawPort);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT value "${rawPort}". Expected an integer between 0 and 65535.`);
  }

  return port;
};

export const resolveDefaultInstrument = (rawKey: string | undefined, fallback = DEFAULT_INSTRUMENT): string => {
  if (rawKey === undefined || rawKey.trim() === '') {
    return fallback;
  }

  const key = rawKey.trim();
  const known = instrumentPresets().map((preset) => preset.key);
  if (!known.includes(key)) {
    throw new Error(`Invalid FINGERBOARD_DEFAULT_INSTRUMENT value "${rawKey}". Expected one of: ${known.join(', ')}.`);
  }

  return key;
};

export const resolveMaxResults = (rawLimit: string | undefined, fallback = DEFAULT_MAX_RESULTS): number => {
  if (rawLimit === undefined || rawLimit.trim() === '') {
    return fallback;
  }

  const limit = Number(rawLimit);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`Invalid FINGERBOARD_MAX_RESULTS value "${rawLimit}". Expected a positive integer.`);
  }

  return limit;
};

export const loadApiConfig = (env: NodeJS.ProcessEnv = process.env): ApiConfig => ({
  port: resolveApiPort(env.PORT),
  defaultInstrument: resolveDefaultInstrument(env.FINGERBOARD_DEFAULT_INSTRUMENT),
  maxResults: resolveMaxResults(env.FINGERBOARD_MAX_RESULTS),
});
