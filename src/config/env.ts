import path from 'path';
import { discoverLocalChapters } from '../services/QuestionStore';
import { SELECTION_MODES, type SelectionMode } from '../types/quiz';
import { CHOICE_TOKEN_DELIMITER } from '../utils/choiceToken';
import { ConfigurationError } from '../utils/errors';

// Project root (src/config -> .. -> ..) so the questions dir does not depend on process.cwd()
export const projectRoot = path.resolve(__dirname, '..', '..');

const REMOTE_TIMEOUT_MS = 15_000;
const MAX_REMOTE_RETRIES = 5;

export interface BotConfig {
  readonly botToken: string;
  readonly chatId: string;
  readonly questionsPerRun: number;
  readonly scheduleHour: number;
  readonly scheduleMinute: number;
  readonly timezone: string;
  readonly mode: SelectionMode;
  readonly chapters: readonly string[];
  readonly questionsDir: string;
  /** Without trailing slash; undefined disables the remote fallback. */
  readonly remoteBaseUrl?: string;
  readonly remoteTimeoutMs: number;
  readonly remoteRetries: number;
}

export type EnvSource = Record<string, string | undefined>;

function getRequired(source: EnvSource, key: string): string {
  const value = source[key]?.trim();
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getInteger(source: EnvSource, key: string, fallback: number, min: number, max: number): number {
  const raw = source[key]?.trim();
  if (!raw) return fallback;
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigurationError(`${key} must be an integer, got '${raw}'`);
  }
  const value = parseInt(raw, 10);
  if (value < min || value > max) {
    throw new ConfigurationError(`${key} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function isKnownTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

function getMode(source: EnvSource): SelectionMode {
  const raw = source.MODE?.trim() || 'random';
  const mode = SELECTION_MODES.find((m) => m === raw);
  if (!mode) {
    throw new ConfigurationError(`MODE must be one of ${SELECTION_MODES.join(', ')}, got '${raw}'`);
  }
  return mode;
}

function getRemoteBaseUrl(source: EnvSource): string | undefined {
  const raw = source.GITHUB_RAW_BASE?.trim();
  if (!raw) return undefined;
  if (!/^https?:\/\/\S+$/i.test(raw)) {
    throw new ConfigurationError(`GITHUB_RAW_BASE must be an http(s) URL, got '${raw}'`);
  }
  return raw.replace(/\/+$/, '');
}

function getChapters(
  source: EnvSource,
  questionsDir: string,
  discover: (dir: string) => string[]
): string[] {
  const override = source.CHAPTERS;
  const chapters = override
    ? override
        .split(',')
        .map((c) => c.trim())
        .filter(Boolean)
    : discover(questionsDir);

  if (chapters.length === 0) {
    throw new ConfigurationError(
      `No chapters found. Put json files in ${questionsDir} or set CHAPTERS env var.`
    );
  }
  const invalid = chapters.find((c) => c.includes(CHOICE_TOKEN_DELIMITER));
  if (invalid) {
    throw new ConfigurationError(`Chapter name '${invalid}' must not contain '${CHOICE_TOKEN_DELIMITER}'`);
  }
  return chapters;
}

/**
 * Builds the immutable configuration once at startup.
 * Throws ConfigurationError for anything the bot cannot run without.
 */
export function loadConfig(
  source: EnvSource = process.env,
  discover: (dir: string) => string[] = discoverLocalChapters
): BotConfig {
  const botToken = getRequired(source, 'BOT_TOKEN');
  const chatId = getRequired(source, 'CHAT_ID');

  const timezone = source.TIMEZONE?.trim() || 'Asia/Kolkata';
  if (!isKnownTimezone(timezone)) {
    throw new ConfigurationError(`TIMEZONE '${timezone}' is not a known IANA time zone`);
  }

  const questionsDir = path.resolve(projectRoot, source.QUESTIONS_DIR?.trim() || 'questions');

  return Object.freeze({
    botToken,
    chatId,
    questionsPerRun: getInteger(source, 'QUESTIONS_PER_RUN', 1, 1, Number.MAX_SAFE_INTEGER),
    scheduleHour: getInteger(source, 'SCHEDULE_HOUR', 10, 0, 23),
    scheduleMinute: getInteger(source, 'SCHEDULE_MINUTE', 0, 0, 59),
    timezone,
    mode: getMode(source),
    chapters: Object.freeze(getChapters(source, questionsDir, discover)),
    questionsDir,
    remoteBaseUrl: getRemoteBaseUrl(source),
    remoteTimeoutMs: REMOTE_TIMEOUT_MS,
    remoteRetries: getInteger(source, 'REMOTE_FETCH_RETRIES', 0, 0, MAX_REMOTE_RETRIES),
  });
}
