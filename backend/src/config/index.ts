import dotenv from 'dotenv';
import path from 'path';
import { SubtitleFormat } from '../subtitles/types';
import { DEFAULT_CUE_LENGTH, isSubtitleFormat } from '../subtitles/engine';

// Load environment variables
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export interface Config {
  // Server
  port: number;
  nodeEnv: string;

  // File paths
  dataDir: string;
  sessionsDir: string;

  // Editing
  defaultCueLength: number;
  defaultFormat: SubtitleFormat;
  maxDocumentSize: number;
}

function getEnvString(key: string, defaultValue: string = ''): string {
  return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvFormat(key: string, defaultValue: SubtitleFormat): SubtitleFormat {
  const value = process.env[key]?.toLowerCase();
  return isSubtitleFormat(value) ? value : defaultValue;
}

export function loadConfig(): Config {
  const dataDir = getEnvString('DATA_DIR', './data');

  return {
    // Server
    port: getEnvNumber('PORT', 3001),
    nodeEnv: getEnvString('NODE_ENV', 'development'),

    // File paths
    dataDir,
    sessionsDir: getEnvString('SESSIONS_DIR', `${dataDir}/sessions`),

    // Editing
    defaultCueLength: getEnvNumber('DEFAULT_CUE_LENGTH', DEFAULT_CUE_LENGTH),
    defaultFormat: getEnvFormat('DEFAULT_FORMAT', 'vtt'),
    maxDocumentSize: getEnvNumber('MAX_DOCUMENT_SIZE', 5242880), // 5MB
  };
}

export const config = loadConfig();
