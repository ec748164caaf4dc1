import type { Logger } from '../core/logger';
import type { CommentRow, PostRow, PostTagRow, TagRow, UserRow } from './schema';

/** A registered user. The password hash never leaves the store. */
export type User = Omit<UserRow, 'passwordHash'>;
export type Post = PostRow;
export type Tag = TagRow;
export type Comment = CommentRow;
export type PostTag = PostTagRow;

/**
 * Fields accepted by `updateUser`. Omitted fields keep their stored value;
 * `null` clears a nullable field.
 */
export interface UserUpdate {
  firstName?: string;
  lastName?: string;
  email?: string;
  bio?: string | null;
  admin?: boolean;
  /** New plaintext password. Hashed before it is written. */
  password?: string;
}

export interface PostUpdate {
  title?: string;
  content?: string;
  expiresOn?: Date | null;
  /** Replaces the post's whole tag set when present. */
  tags?: number[];
}

export interface TagUpdate {
  name?: string;
  description?: string | null;
  colour?: string;
}

export interface CommentUpdate {
  content?: string;
}

export interface BlogDatabaseOptions {
  /** Path of the store file, or `:memory:` for a throwaway store. */
  path: string;
  /** Defaults to the global logger. */
  logger?: Logger;
  /** bcrypt cost factor for new password hashes. @default 12 */
  passwordRounds?: number;
  /** Clock used for `addedOn`/`editedOn` stamps. @default () => new Date() */
  now?: () => Date;
}
