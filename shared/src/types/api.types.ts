/**
 * API request/response types for the photo feed API.
 */

import type { PostId } from './post.types.js';
import type { PublicUser, UserId } from './user.types.js';

/** Standard API response wrapper */
export interface ApiResponse<T> {
  readonly success: boolean;
  readonly data?: T;
  readonly error?: ApiError;
}

/** API error structure */
export interface ApiError {
  readonly code: string;
  readonly message: string;
  readonly details?: unknown;
}

/** Health check response */
export interface HealthCheckResponse {
  readonly status: 'healthy' | 'degraded' | 'unhealthy';
  readonly version: string;
  readonly uptime: number;
  readonly timestamp: string;
  readonly services: ServiceHealthMap;
}

/** Individual service health */
export interface ServiceHealth {
  readonly status: 'up' | 'down' | 'degraded';
  readonly latencyMs?: number;
}

/** Map of service health checks */
export interface ServiceHealthMap {
  readonly postgres: ServiceHealth;
  readonly redis: ServiceHealth;
}

/** Returned by register and login */
export interface SessionResponse {
  readonly token: string;
  readonly csrfToken: string;
  readonly user: PublicUser;
}

/** Create post request (image sent inline as base64) */
export interface CreatePostRequest {
  readonly csrfToken: string;
  readonly contentType: string;
  readonly imageBase64: string;
  readonly body: string;
}

/** Create comment request */
export interface CreateCommentRequest {
  readonly csrfToken: string;
  readonly postId: PostId;
  readonly comment: string;
}

/** Ban request */
export interface BanUsersRequest {
  readonly csrfToken: string;
  readonly uids: readonly UserId[];
}

/** Returned by the write endpoints */
export interface WriteResponse {
  readonly postId: PostId;
}
