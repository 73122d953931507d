export interface GeoLocation {
  latitude: number;
  longitude: number;
}

export interface Asset {
  id: string;
  fileName: string;
  extension: string;
  mimeType: string | null;
  capturedAt: Date | null;
  fileSize: number;
  exif: Readonly<Record<string, unknown>>;
  // Filled by the album lookup; empty until then
  albumIds: ReadonlySet<string>;
  tagIds: ReadonlySet<string>;
  location: GeoLocation | null;
  description: string | null;
  rating: number | null;
}

export interface DuplicateGroup {
  id: string;
  assets: readonly Asset[];
}

export type SelectionRule =
  | 'capture-date'
  | 'preferred-format'
  | 'file-size'
  | 'metadata'
  | 'original-order';

export interface RankingDecision {
  group: DuplicateGroup;
  winner: Asset;
  losers: readonly Asset[];
  reason: SelectionRule;
}

export interface AssetPatch {
  latitude?: number;
  longitude?: number;
  description?: string;
  rating?: number;
}

export interface TransferPlan {
  winnerId: string;
  albumIds: readonly string[];
  tagIds: readonly string[];
  patch: AssetPatch;
}

export interface DuplicateSource {
  fetchDuplicateGroups(): Promise<DuplicateGroup[]>;
}

export interface AlbumMembershipLookup {
  fetchAlbumIds(assetId: string): Promise<string[]>;
}

export interface AssetMutationService {
  updateAsset(id: string, patch: AssetPatch): Promise<void>;
  addToAlbum(albumId: string, assetId: string): Promise<void>;
  removeFromAlbum(albumId: string, assetId: string): Promise<void>;
  addTag(tagId: string, assetId: string): Promise<void>;
  removeTag(tagId: string, assetId: string): Promise<void>;
  deleteAssets(ids: readonly string[], permanent: boolean): Promise<void>;
}
