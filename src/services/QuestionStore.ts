/**
 * Question Store: loads one chapter's questions.
 * Local `<questionsDir>/<chapter>.json` first, then `<remoteBaseUrl>/<chapter>.json`.
 * Nothing is cached; every call reads the source again so edited banks are
 * picked up without a restart.
 */
import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import * as fs from 'fs';
import path from 'path';
import type { Question } from '../types/quiz';
import { NotFoundError, QuestionFormatError, RemoteFetchError, errorMessage } from '../utils/errors';
import { parseChapter } from '../utils/questionValidation';

export type HttpClient = Pick<AxiosInstance, 'get'>;

export interface QuestionStoreOptions {
  questionsDir: string;
  remoteBaseUrl?: string;
  remoteTimeoutMs: number;
  /** Extra attempts after a transport error or 5xx. 0 = single attempt. */
  remoteRetries: number;
  httpClient?: HttpClient;
  retryDelayMs?: number;
}

const DEFAULT_RETRY_DELAY_MS = 500;

/** Chapter names from `*.json` files in the directory, sorted. Empty when the directory is missing. */
export function discoverLocalChapters(questionsDir: string): string[] {
  if (!fs.existsSync(questionsDir)) {
    return [];
  }
  return fs
    .readdirSync(questionsDir)
    .filter((name) => name.endsWith('.json'))
    .map((name) => name.slice(0, -'.json'.length))
    .sort();
}

export class QuestionStore {
  private readonly http: HttpClient;
  private readonly retryDelayMs: number;

  constructor(private readonly options: QuestionStoreOptions) {
    this.http = options.httpClient ?? axios.create();
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  }

  async load(chapter: string): Promise<Question[]> {
    const questionsDir = path.resolve(this.options.questionsDir);
    const localPath = path.resolve(questionsDir, `${chapter}.json`);
    if (path.dirname(localPath) !== questionsDir) {
      throw new NotFoundError(chapter, `Chapter '${chapter}' does not name a file in ${questionsDir}`);
    }
    if (fs.existsSync(localPath)) {
      return parseChapter(chapter, this.readLocal(chapter, localPath));
    }

    if (this.options.remoteBaseUrl) {
      const url = `${this.options.remoteBaseUrl}/${encodeURIComponent(chapter)}.json`;
      return parseChapter(chapter, await this.fetchRemote(url));
    }

    throw new NotFoundError(chapter);
  }

  private readLocal(chapter: string, filePath: string): unknown {
    const text = fs.readFileSync(filePath, 'utf-8');
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new QuestionFormatError(chapter, `invalid JSON in ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async fetchRemote(url: string): Promise<unknown> {
    const attempts = 1 + Math.max(0, this.options.remoteRetries);
    let lastError: RemoteFetchError | undefined;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await this.fetchOnce(url);
      } catch (error) {
        if (!(error instanceof RemoteFetchError)) throw error;
        lastError = error;
        const retryable = error.status === undefined || error.status >= 500;
        if (!retryable || attempt === attempts) break;
        console.warn(`[QuestionStore] ${error.message}; retrying (${attempt}/${attempts - 1})`);
        await new Promise((r) => setTimeout(r, this.retryDelayMs));
      }
    }

    throw lastError ?? new RemoteFetchError(url, undefined, `Failed to fetch ${url}`);
  }

  private async fetchOnce(url: string): Promise<unknown> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(url, {
        timeout: this.options.remoteTimeoutMs,
        responseType: 'json',
        validateStatus: () => true,
      });
    } catch (error) {
      throw new RemoteFetchError(url, undefined, `Request to ${url} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new RemoteFetchError(url, response.status, `GET ${url} returned HTTP ${response.status}`);
    }
    console.log(`[QuestionStore] Fetched ${url}`);
    return response.data;
  }
}
