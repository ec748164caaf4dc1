import { sqliteTable, text, integer, primaryKey } from 'drizzle-orm/sqlite-core';

/**
 * Drizzle table definitions. The DDL that creates these tables lives in
 * `./ddl` and must stay column-for-column in step with this file.
 */

export const users = sqliteTable('users', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  firstName: text('first_name').notNull(),
  lastName: text('last_name').notNull(),
  email: text('email').notNull().unique(),
  passwordHash: text('password_hash').notNull(),
  admin: integer('admin', { mode: 'boolean' }).notNull().default(false),
  bio: text('bio'),
  addedOn: integer('added_on', { mode: 'timestamp_ms' }).notNull(),
});

export const posts = sqliteTable('posts', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  creatorId: integer('creator_id')
    .notNull()
    .references(() => users.id, { onDelete: 'cascade' }),
  title: text('title').notNull(),
  content: text('content').notNull(),
  addedOn: integer('added_on', { mode: 'timestamp_ms' }).notNull(),
  expiresOn: integer('expires_on', { mode: 'timestamp_ms' }),
});

export const tags = sqliteTable('tags', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  description: text('description'),
  colour: text('colour').notNull(),
  addedOn: integer('added_on', { mode: 'timestamp_ms' }).notNull(),
});

export const comments = sqliteTable('comments', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  postId: integer('post_id')
    .notNull()
    .references(() => posts.id, { onDelete: 'cascade' }),
  userId: integer('user_id')
    .notNull()
    .references(() => users.id, { onDelete: 'cascade' }),
  content: text('content').notNull(),
  addedOn: integer('added_on', { mode: 'timestamp_ms' }).notNull(),
  editedOn: integer('edited_on', { mode: 'timestamp_ms' }),
  // Soft-delete marker. Nothing writes it yet.
  deletedOn: integer('deleted_on', { mode: 'timestamp_ms' }),
});

export const postTags = sqliteTable(
  'post_tags',
  {
    postId: integer('post_id')
      .notNull()
      .references(() => posts.id, { onDelete: 'cascade' }),
    tagId: integer('tag_id')
      .notNull()
      .references(() => tags.id, { onDelete: 'cascade' }),
  },
  (table) => [primaryKey({ columns: [table.postId, table.tagId] })]
);


export type UserRow = typeof users.$inferSelect;
export type PostRow = typeof posts.$inferSelect;
export type TagRow = typeof tags.$inferSelect;
export type CommentRow = typeof comments.$inferSelect;
export type PostTagRow = typeof postTags.$inferSelect;
