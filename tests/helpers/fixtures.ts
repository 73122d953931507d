import {
  AlbumMembershipLookup,
  Asset,
  AssetMutationService,
  AssetPatch,
  DuplicateGroup,
  DuplicateSource
} from '../../src/types';
import { createMessages } from '../../src/i18n/messages';
import { ConfirmPrompt } from '../../src/utils/prompt';

type AssetOverrides = Partial<Omit<Asset, 'albumIds' | 'tagIds'>> & {
  albumIds?: string[];
  tagIds?: string[];
};

export const makeAsset = (id: string, overrides: AssetOverrides = {}): Asset => {
  const { albumIds = [], tagIds = [], ...rest } = overrides;
  return {
    id,
    fileName: `${id}.jpg`,
    extension: 'jpg',
    mimeType: 'image/jpeg',
    capturedAt: null,
    fileSize: 1000,
    exif: {},
    location: null,
    description: null,
    rating: null,
    ...rest,
    albumIds: new Set(albumIds),
    tagIds: new Set(tagIds)
  };
};

export const makeGroup = (id: string, ...assets: Asset[]): DuplicateGroup => ({ id, assets });

export interface RecordedCall {
  method: string;
  args: unknown[];
}

/**
 * In-memory stand-in for the Immich server. Records every call and can be
 * told to fail specific ones.
 */
export class FakeImmich implements DuplicateSource, AlbumMembershipLookup, AssetMutationService {
  readonly calls: RecordedCall[] = [];
  groups: DuplicateGroup[] = [];
  albums: Record<string, string[]> = {};
  failWhen: (call: RecordedCall) => boolean = () => false;

  private record(method: string, ...args: unknown[]): void {
    const call = { method, args };
    this.calls.push(call);
    if (this.failWhen(call)) {
      throw new Error(`${method} refused`);
    }
  }

  callsTo(method: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  get mutations(): RecordedCall[] {
    return this.calls.filter((call) => call.method !== 'fetchDuplicateGroups' && call.method !== 'fetchAlbumIds');
  }

  async fetchDuplicateGroups(): Promise<DuplicateGroup[]> {
    this.record('fetchDuplicateGroups');
    return this.groups;
  }

  async fetchAlbumIds(assetId: string): Promise<string[]> {
    this.record('fetchAlbumIds', assetId);
    return this.albums[assetId] ?? [];
  }

  async updateAsset(id: string, patch: AssetPatch): Promise<void> {
    this.record('updateAsset', id, patch);
  }

  async addToAlbum(albumId: string, assetId: string): Promise<void> {
    this.record('addToAlbum', albumId, assetId);
  }

  async removeFromAlbum(albumId: string, assetId: string): Promise<void> {
    this.record('removeFromAlbum', albumId, assetId);
  }

  async addTag(tagId: string, assetId: string): Promise<void> {
    this.record('addTag', tagId, assetId);
  }

  async removeTag(tagId: string, assetId: string): Promise<void> {
    this.record('removeTag', tagId, assetId);
  }

  async deleteAssets(ids: readonly string[], permanent: boolean): Promise<void> {
    this.record('deleteAssets', [...ids], permanent);
  }
}

export class ScriptedPrompt implements ConfirmPrompt {
  readonly questions: string[] = [];
  closed = false;

  // An Error in the script makes that question fail instead of answering
  constructor(private readonly answers: Array<boolean | Error>) {}

  async confirm(question: string): Promise<boolean> {
    this.questions.push(question);
    const answer = this.answers.shift() ?? true;
    if (answer instanceof Error) throw answer;
    return answer;
  }

  close(): void {
    this.closed = true;
  }
}

export const englishMessages = createMessages('en');

export const thumbnailUrl = (assetId: string): string =>
  `https://photos.test/api/assets/${assetId}/thumbnail?size=preview`;
