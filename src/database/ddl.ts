/**
 * CREATE TABLE statements for every table the store expects, in creation
 * order. Kept in step with `./schema`.
 */
export const TABLE_DDL = {
  users: `
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      first_name TEXT NOT NULL,
      last_name TEXT NOT NULL,
      email TEXT NOT NULL UNIQUE,
      password_hash TEXT NOT NULL,
      admin INTEGER NOT NULL DEFAULT 0,
      bio TEXT,
      added_on INTEGER NOT NULL
    )`,
  posts: `
    CREATE TABLE IF NOT EXISTS posts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      creator_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      title TEXT NOT NULL,
      content TEXT NOT NULL,
      added_on INTEGER NOT NULL,
      expires_on INTEGER
    )`,
  tags: `
    CREATE TABLE IF NOT EXISTS tags (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      description TEXT,
      colour TEXT NOT NULL,
      added_on INTEGER NOT NULL
    )`,
  comments: `
    CREATE TABLE IF NOT EXISTS comments (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      post_id INTEGER NOT NULL REFERENCES posts(id) ON DELETE CASCADE,
      user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      content TEXT NOT NULL,
      added_on INTEGER NOT NULL,
      edited_on INTEGER,
      deleted_on INTEGER
    )`,
  post_tags: `
    CREATE TABLE IF NOT EXISTS post_tags (
      post_id INTEGER NOT NULL REFERENCES posts(id) ON DELETE CASCADE,
      tag_id INTEGER NOT NULL REFERENCES tags(id) ON DELETE CASCADE,
      PRIMARY KEY (post_id, tag_id)
    )`,
} as const;

export type TableName = keyof typeof TABLE_DDL;

export const TABLE_NAMES: readonly TableName[] = ['users', 'posts', 'tags', 'comments', 'post_tags'];
