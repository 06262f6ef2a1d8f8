import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import { ReleaseApiError } from './errors';
import type { CreatedRelease } from './types';
import { BASELINE_VERSION } from './version';

export const DEFAULT_API_BASE_URL = 'https://api.github.com';
const API_VERSION = '2022-11-28';

const latestReleaseSchema = z.object({
  tag_name: z.string(),
});

const createdReleaseSchema = z.object({
  tag_name: z.string(),
  html_url: z.string().url(),
});

export interface ReleaseClientOptions {
  baseUrl?: string;
  // Swapped in by tests; production uses axios' own HTTP adapter.
  adapter?: AxiosAdapter;
}

export class GithubReleaseClient {
  private client: AxiosInstance;

  constructor(org: string, repo: string, token: string, options: ReleaseClientOptions = {}) {
    const baseUrl = options.baseUrl ?? DEFAULT_API_BASE_URL;
    this.client = axios.create({
      baseURL: `${baseUrl.replace(/\/+$/, '')}/repos/${org}/${repo}`,
      headers: {
        'Authorization': `Bearer ${token}`,
        'Accept': 'application/vnd.github+json',
        'X-GitHub-Api-Version': API_VERSION,
        'User-Agent': 'ts-sync-openapi',
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  /**
   * Tag of the most recent release, or `v0` when the repository has none.
   */
  async latestTag(): Promise<string> {
    const endpoint = '/releases/latest';
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(endpoint);
    } catch (error: unknown) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        return BASELINE_VERSION;
      }
      throw toReleaseError(error, endpoint);
    }

    const parsed = latestReleaseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ReleaseApiError(`Malformed latest release response: ${parsed.error.message}`, endpoint, response.status);
    }
    return parsed.data.tag_name;
  }

  async create(tagName: string): Promise<CreatedRelease> {
    const endpoint = '/releases';
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.post<unknown>(endpoint, { tag_name: tagName });
    } catch (error: unknown) {
      throw toReleaseError(error, endpoint);
    }

    const parsed = createdReleaseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ReleaseApiError(`Malformed create release response: ${parsed.error.message}`, endpoint, response.status);
    }
    return { tagName: parsed.data.tag_name, htmlUrl: parsed.data.html_url };
  }
}

function toReleaseError(error: unknown, endpoint: string): ReleaseApiError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const data: unknown = error.response?.data;
    const apiMessage =
      typeof data === 'object' && data !== null && 'message' in data && typeof data.message === 'string'
        ? data.message
        : error.message;
    return new ReleaseApiError(`GitHub API ${endpoint} failed: ${apiMessage}`, endpoint, status);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ReleaseApiError(`GitHub API ${endpoint} failed: ${message}`, endpoint);
}
