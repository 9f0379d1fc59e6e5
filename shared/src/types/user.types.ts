/**
 * User types for master data (stored in PostgreSQL).
 * Session lookups are cached in Redis under `user:<id>`.
 */

export type UserId = number;

/** 0 = normal account, anything else = moderator */
export type UserAuthority = number;

/** 0 = active, anything else = banned */
export type DeletionFlag = number;

/** Core user entity */
export interface User {
  readonly id: UserId;
  readonly accountName: string;
  readonly passhash: string;
  readonly authority: UserAuthority;
  readonly delFlg: DeletionFlag;
  readonly createdAt: Date;
}

/** User as exposed over the API */
export type PublicUser = Omit<User, 'passhash'>;

/** Registration / login payload */
export interface CredentialsPayload {
  readonly accountName: string;
  readonly password: string;
}
