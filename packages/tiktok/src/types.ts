export const PRIVACY_LEVELS = [
  "PUBLIC_TO_EVERYONE",
  "MUTUAL_FOLLOW_FRIENDS",
  "FOLLOWER_OF_CREATOR",
  "SELF_ONLY",
] as const;

export type PrivacyLevel = (typeof PRIVACY_LEVELS)[number];

/** direct = Direct Post (needs audited app), inbox = draft sent to the creator's inbox */
export type PostMode = "direct" | "inbox";

export interface StoredTokens {
  userId: string;
  accessToken: string;
  refreshToken: string;
  expiry: Date;
  refreshExpiry?: Date;
  scopes: string;
}

/** Read-only view of a token handed to the upload pipeline for one job */
export interface AccessToken {
  readonly value: string;
  readonly expiresAt: Date;
  readonly userId: string;
}

export interface PostOptions {
  privacyLevel?: PrivacyLevel;
  disableComment?: boolean;
  disableDuet?: boolean;
  disableStitch?: boolean;
  videoCoverTimestampMs?: number;
  brandContentToggle?: boolean;
  brandOrganicToggle?: boolean;
  isAigc?: boolean;
  durationSec?: number;
}

export interface UploadJob {
  readonly userId: string;
  readonly videoPath: string;
  readonly description: string;
  readonly tags: readonly string[];
  readonly post: Readonly<PostOptions>;
}

export interface ChunkConstraints {
  minChunk: number;
  maxChunk: number;
  maxChunks: number;
}

export interface ChunkRange {
  readonly index: number;
  readonly start: number;
  /** inclusive */
  readonly end: number;
  readonly size: number;
}

export type ChunkPlan = readonly ChunkRange[];

export interface TiktokCreatorInfo {
  creatorAvatarUrl: string;
  creatorNickname: string;
  privacyLevelOptions: PrivacyLevel[];
  commentDisabled: boolean;
  duetDisabled: boolean;
  stitchDisabled: boolean;
  maxVideoPostDurationSec: number;
}

export interface UploadConstraints {
  chunk: ChunkConstraints;
  maxVideoPostDurationSec: number;
  privacyLevelOptions: PrivacyLevel[];
  commentDisabled: boolean;
  duetDisabled: boolean;
  stitchDisabled: boolean;
}

export type SessionStatus =
  | "INITIALIZED"
  | "UPLOADING"
  | "PROCESSING"
  | "PUBLISHED"
  | "FAILED";

export interface UploadSession {
  readonly publishId: string;
  readonly uploadUrl: string;
  readonly totalSize: number;
  readonly chunkSize: number;
  readonly chunkCount: number;
  readonly mode: PostMode;
  /** Token the session was opened with; later calls must use the same one */
  readonly accessToken: AccessToken;
  status: SessionStatus;
}

export interface SourceInfo {
  videoSize: number;
  chunkSize: number;
  totalChunkCount: number;
}

export interface PostInfo {
  title: string;
  privacyLevel: PrivacyLevel;
  disableComment: boolean;
  disableDuet: boolean;
  disableStitch: boolean;
  brandContentToggle: boolean;
  brandOrganicToggle: boolean;
  isAigc: boolean;
  videoCoverTimestampMs?: number;
}

export interface TransmitResult {
  chunksSent: number;
  /** The platform answered 201 to the final chunk */
  uploadComplete: boolean;
}

export type FinalStatus = "PUBLISHED" | "FAILED";

export interface FinalizeResult {
  status: FinalStatus;
  publishId: string;
  failReason?: string;
  publicPostIds?: string[];
}
