import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig } from 'axios';
import {
  AlbumMembershipLookup,
  AssetMutationService,
  AssetPatch,
  DuplicateGroup,
  DuplicateSource
} from '../types';
import { ApiRequestError, RequestTimeoutError } from '../utils/errors';
import { logger } from '../utils/logger';
import { findBulkIdFailures, parseAlbumIds, parseDuplicateGroups } from './mappers';

export interface ImmichClientOptions {
  server: string;
  apiKey: string;
  timeoutSeconds: number;
  // Replaces the HTTP transport, e.g. with an in-process stand-in
  adapter?: AxiosAdapter;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

const bodyText = (data: unknown): string | null => {
  if (data === undefined || data === null || data === '') return null;
  return typeof data === 'string' ? data : JSON.stringify(data);
};

/**
 * Immich REST API, limited to what the cleanup needs: reading duplicate
 * groups and album memberships, and mutating assets.
 */
export class ImmichClient implements DuplicateSource, AlbumMembershipLookup, AssetMutationService {
  private readonly http: AxiosInstance;

  constructor(private readonly options: ImmichClientOptions) {
    this.http = axios.create({
      baseURL: `${options.server}/api`,
      timeout: options.timeoutSeconds * 1000,
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
        'x-api-key': options.apiKey
      },
      ...(options.adapter ? { adapter: options.adapter } : {})
    });
  }

  thumbnailUrl(assetId: string): string {
    return `${this.options.server}/api/assets/${assetId}/thumbnail?size=preview`;
  }

  async fetchDuplicateGroups(): Promise<DuplicateGroup[]> {
    const data = await this.send('Fetching duplicates', { method: 'get', url: '/duplicates' });
    return parseDuplicateGroups(data);
  }

  async fetchAlbumIds(assetId: string): Promise<string[]> {
    const data = await this.send(`Listing albums of ${assetId}`, {
      method: 'get',
      url: '/albums',
      params: { assetId }
    });
    return parseAlbumIds(data);
  }

  async updateAsset(id: string, patch: AssetPatch): Promise<void> {
    await this.send(`Updating asset ${id}`, { method: 'put', url: `/assets/${id}`, data: patch });
  }

  async addToAlbum(albumId: string, assetId: string): Promise<void> {
    const operation = `Adding ${assetId} to album ${albumId}`;
    const data = await this.send(operation, {
      method: 'put',
      url: `/albums/${albumId}/assets`,
      data: { ids: [assetId] }
    });
    const failures = findBulkIdFailures(data);
    if (failures.length > 0) {
      throw new ApiRequestError(operation, 200, failures.join(', '));
    }
  }

  async removeFromAlbum(albumId: string, assetId: string): Promise<void> {
    await this.send(`Removing ${assetId} from album ${albumId}`, {
      method: 'delete',
      url: `/albums/${albumId}/assets`,
      data: { ids: [assetId] }
    });
  }

  async addTag(tagId: string, assetId: string): Promise<void> {
    const operation = `Tagging ${assetId} with ${tagId}`;
    const data = await this.send(operation, {
      method: 'put',
      url: `/tags/${tagId}/assets`,
      data: { ids: [assetId] }
    });
    const failures = findBulkIdFailures(data);
    if (failures.length > 0) {
      throw new ApiRequestError(operation, 200, failures.join(', '));
    }
  }

  async removeTag(tagId: string, assetId: string): Promise<void> {
    await this.send(`Removing tag ${tagId} from ${assetId}`, {
      method: 'delete',
      url: `/tags/${tagId}/assets`,
      data: { ids: [assetId] }
    });
  }

  async deleteAssets(ids: readonly string[], permanent: boolean): Promise<void> {
    await this.send(`Deleting ${ids.length} asset(s)`, {
      method: 'delete',
      url: '/assets',
      data: { ids: [...ids], force: permanent }
    });
  }

  private async send(operation: string, config: AxiosRequestConfig): Promise<unknown> {
    logger.debug(`${config.method?.toUpperCase() ?? 'GET'} ${config.url ?? ''}`);
    try {
      const response = await this.http.request<unknown>(config);
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
          throw new RequestTimeoutError(operation, this.options.timeoutSeconds, { cause: error });
        }
        throw new ApiRequestError(
          operation,
          error.response?.status ?? null,
          bodyText(error.response?.data),
          { cause: error }
        );
      }
      throw error;
    }
  }
}
