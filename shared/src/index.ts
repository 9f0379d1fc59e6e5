// Shared types for the photo feed service

export type {
  UserId,
  UserAuthority,
  DeletionFlag,
  User,
  PublicUser,
  CredentialsPayload,
} from './types/user.types.js';

export type {
  PostId,
  CommentId,
  ImageMime,
  PostRecord,
  CommentRecord,
  HydratedComment,
  HydratedPost,
  ProfileAggregate,
} from './types/post.types.js';

export type {
  ApiResponse,
  ApiError,
  HealthCheckResponse,
  ServiceHealth,
  ServiceHealthMap,
  SessionResponse,
  CreatePostRequest,
  CreateCommentRequest,
  BanUsersRequest,
  WriteResponse,
} from './types/api.types.js';
