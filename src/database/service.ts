import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createClient, type Client } from '@libsql/client';
import { drizzle, type LibSQLDatabase } from 'drizzle-orm/libsql';
import { and, asc, eq, sql } from 'drizzle-orm';
import { getLogger, withScope, type Logger } from '../core/logger';
import { ensureSchema } from './bootstrap';
import { DEFAULT_PASSWORD_ROUNDS, hashPassword, verifyPassword } from './credentials';
import { translateStoreError, withStoreErrors } from './errors';
import { comments, posts, postTags, tags, users, type UserRow } from './schema';
import type {
  BlogDatabaseOptions,
  Comment,
  CommentUpdate,
  Post,
  PostUpdate,
  Tag,
  TagUpdate,
  User,
  UserUpdate,
} from './types';

const MEMORY_PATH = ':memory:';

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function toUser(row: UserRow): User {
  const { passwordHash: _passwordHash, ...user } = row;
  return user;
}

function uniqueIds(ids: number[]): number[] {
  return [...new Set(ids)];
}

/**
 * Persistence service for the blog: users, posts, tags, comments and the
 * post/tag links, on a single SQLite connection.
 *
 * Build one with {@link BlogDatabase.open} at startup and hand it to whatever
 * needs it. Lookups return `null` when the id does not exist; they never
 * throw for a missing row. Writes surface constraint failures as
 * `ConstraintViolationException` and I/O failures as `StoreUnavailableException`.
 *
 * @example
 * ```ts
 * const store = await BlogDatabase.open({ path: 'ServerData/database.db' });
 * const userId = await store.addUser('Ada', 'Lovelace', 'ada@example.com', 'correct horse');
 * const tagId = await store.addTag('news', null, '#ff0000');
 * const postId = await store.addPost(userId, 'Hello', 'First post', null, [tagId]);
 * store.close();
 * ```
 */
export class BlogDatabase {
  private readonly db: LibSQLDatabase;

  private constructor(
    private readonly client: Client,
    private readonly logger: Logger,
    private readonly passwordRounds: number,
    private readonly now: () => Date
  ) {
    this.db = drizzle(client);
  }

  /**
   * Opens (creating if needed) the store at `options.path` and makes sure
   * every table exists.
   */
  static async open(options: BlogDatabaseOptions): Promise<BlogDatabase> {
    const logger = withScope(options.logger ?? getLogger(), 'Database');
    const { path, passwordRounds = DEFAULT_PASSWORD_ROUNDS, now = () => new Date() } = options;

    let client: Client;
    try {
      if (path !== MEMORY_PATH) {
        await mkdir(dirname(path), { recursive: true });
      }
      client = createClient({ url: path === MEMORY_PATH ? MEMORY_PATH : `file:${path}` });
    } catch (error) {
      throw translateStoreError(error);
    }

    try {
      const created = await ensureSchema(client, logger);
      if (created.length > 0) {
        logger.debug('Created tables', { tables: created });
      }
    } catch (error) {
      client.close();
      throw translateStoreError(error);
    }

    logger.debug('Opened store', { path });
    return new BlogDatabase(client, logger, passwordRounds, now);
  }

  /** Releases the connection. Calling it twice is harmless. */
  close(): void {
    if (this.client.closed) return;
    this.client.close();
    this.logger.debug('Closed store');
  }

  get closed(): boolean {
    return this.client.closed;
  }

  /** Round-trips a trivial query; used by readiness probes. */
  async ping(): Promise<void> {
    await withStoreErrors(() => this.client.execute('SELECT 1'));
  }

  // ==========================================================================
  // Users
  // ==========================================================================

  /**
   * Registers a user. The password is hashed before anything touches the
   * store and is not kept afterwards.
   *
   * @returns The new user's id.
   * @throws ConstraintViolationException when the email is already registered.
   */
  async addUser(firstName: string, lastName: string, email: string, password: string): Promise<number> {
    this.logger.info(`Adding user '${firstName} ${lastName}'`);
    const passwordHash = await hashPassword(password, this.passwordRounds);

    return withStoreErrors(async () => {
      const [row] = await this.db
        .insert(users)
        .values({
          firstName,
          lastName,
          email: normalizeEmail(email),
          passwordHash,
          addedOn: this.now(),
        })
        .returning({ id: users.id });
      return row.id;
    });
  }

  /**
   * Checks an email/password pair. Unknown emails simply fail.
   */
  async attemptLogin(email: string, password: string): Promise<boolean> {
    const rows = await withStoreErrors(() =>
      this.db
        .select({ passwordHash: users.passwordHash })
        .from(users)
        .where(eq(users.email, normalizeEmail(email)))
        .limit(1)
    );

    const row = rows[0];
    if (!row) {
      this.logger.debug('Login attempt for an unregistered email');
      return false;
    }
    return verifyPassword(password, row.passwordHash);
  }

  async removeUser(id: number): Promise<boolean> {
    this.logger.info(`Removing user ${id}`);
    return this.deleteWhere(() =>
      this.db.delete(users).where(eq(users.id, id)).returning({ id: users.id })
    );
  }

  async updateUser(id: number, changes: UserUpdate): Promise<User | null> {
    const current = await this.findUser(id);
    if (!current) return null;

    this.logger.info(`Updating user ${id}`);
    const next: UserRow = {
      ...current,
      firstName: changes.firstName ?? current.firstName,
      lastName: changes.lastName ?? current.lastName,
      email: changes.email !== undefined ? normalizeEmail(changes.email) : current.email,
      bio: changes.bio !== undefined ? changes.bio : current.bio,
      admin: changes.admin ?? current.admin,
      passwordHash:
        changes.password !== undefined
          ? await hashPassword(changes.password, this.passwordRounds)
          : current.passwordHash,
    };

    await withStoreErrors(() =>
      this.db
        .update(users)
        .set({
          firstName: next.firstName,
          lastName: next.lastName,
          email: next.email,
          bio: next.bio,
          admin: next.admin,
          passwordHash: next.passwordHash,
        })
        .where(eq(users.id, id))
    );
    return toUser(next);
  }

  async checkUserExists(id: number): Promise<boolean> {
    return this.exists(() => this.db.select({ id: users.id }).from(users).where(eq(users.id, id)).limit(1));
  }

  async checkUserEmailExists(email: string): Promise<boolean> {
    return this.exists(() =>
      this.db.select({ id: users.id }).from(users).where(eq(users.email, normalizeEmail(email))).limit(1)
    );
  }

  async getUser(id: number): Promise<User | null> {
    const row = await this.findUser(id);
    return row ? toUser(row) : null;
  }

  async getUserIdByEmail(email: string): Promise<number | null> {
    const rows = await withStoreErrors(() =>
      this.db.select({ id: users.id }).from(users).where(eq(users.email, normalizeEmail(email))).limit(1)
    );
    return rows[0]?.id ?? null;
  }

  async getUserFirstName(id: number): Promise<string | null> {
    return (await this.findUser(id))?.firstName ?? null;
  }

  async getUserLastName(id: number): Promise<string | null> {
    return (await this.findUser(id))?.lastName ?? null;
  }

  async getUserEmail(id: number): Promise<string | null> {
    return (await this.findUser(id))?.email ?? null;
  }

  async getUserBio(id: number): Promise<string | null> {
    return (await this.findUser(id))?.bio ?? null;
  }

  async getUserIsAdmin(id: number): Promise<boolean | null> {
    return (await this.findUser(id))?.admin ?? null;
  }

  async getUserAddedOn(id: number): Promise<Date | null> {
    return (await this.findUser(id))?.addedOn ?? null;
  }

  async getUserPosts(userId: number): Promise<Post[]> {
    return withStoreErrors(() =>
      this.db.select().from(posts).where(eq(posts.creatorId, userId)).orderBy(asc(posts.id))
    );
  }

  // ==========================================================================
  // Posts
  // ==========================================================================

  /**
   * @param tagIds - Tags to link to the new post. Duplicates are ignored.
   * @returns The new post's id.
   * @throws ConstraintViolationException when the creator or a tag does not exist.
   */
  async addPost(
    creatorId: number,
    title: string,
    content: string,
    expiresOn: Date | null = null,
    tagIds: number[] = []
  ): Promise<number> {
    this.logger.info(`Adding post '${title}'`);
    const insertPost = this.db
      .insert(posts)
      .values({ creatorId, title, content, addedOn: this.now(), expiresOn })
      .returning({ id: posts.id });
    const ids = uniqueIds(tagIds);

    const [inserted] = await withStoreErrors(async () => {
      if (ids.length === 0) return [await insertPost];
      // posts.id is AUTOINCREMENT, so the row inserted just before holds the highest id.
      const newPostId = sql<number>`(select max(${posts.id}) from ${posts})`;
      return this.db.batch([
        insertPost,
        this.db.insert(postTags).values(ids.map((tagId) => ({ postId: newPostId, tagId }))),
      ]);
    });
    return inserted[0].id;
  }

  async removePost(id: number): Promise<boolean> {
    this.logger.info(`Removing post ${id}`);
    return this.deleteWhere(() =>
      this.db.delete(posts).where(eq(posts.id, id)).returning({ id: posts.id })
    );
  }

  /**
   * Updates a post. When `changes.tags` is given, every existing tag link is
   * dropped and the new set inserted in its place.
   */
  async updatePost(id: number, changes: PostUpdate): Promise<Post | null> {
    const current = await this.findPost(id);
    if (!current) return null;

    this.logger.info(`Updating post ${id}`);
    const next: Post = {
      ...current,
      title: changes.title ?? current.title,
      content: changes.content ?? current.content,
      expiresOn: changes.expiresOn !== undefined ? changes.expiresOn : current.expiresOn,
    };

    const updatePost = this.db
      .update(posts)
      .set({ title: next.title, content: next.content, expiresOn: next.expiresOn })
      .where(eq(posts.id, id));

    await withStoreErrors(async () => {
      if (changes.tags === undefined) {
        await updatePost;
        return;
      }
      // One batch, so a bad tag id leaves the row and its old links as they were.
      const ids = uniqueIds(changes.tags);
      const clearTags = this.db.delete(postTags).where(eq(postTags.postId, id));
      if (ids.length === 0) {
        await this.db.batch([updatePost, clearTags]);
      } else {
        await this.db.batch([
          updatePost,
          clearTags,
          this.db.insert(postTags).values(ids.map((tagId) => ({ postId: id, tagId }))),
        ]);
      }
    });
    return next;
  }

  async checkPostExists(id: number): Promise<boolean> {
    return this.exists(() => this.db.select({ id: posts.id }).from(posts).where(eq(posts.id, id)).limit(1));
  }

  async getPost(id: number): Promise<Post | null> {
    return this.findPost(id);
  }

  async getPostCreatorId(id: number): Promise<number | null> {
    return (await this.findPost(id))?.creatorId ?? null;
  }

  async getPostTitle(id: number): Promise<string | null> {
    return (await this.findPost(id))?.title ?? null;
  }

  async getPostContent(id: number): Promise<string | null> {
    return (await this.findPost(id))?.content ?? null;
  }

  async getPostAddedOn(id: number): Promise<Date | null> {
    return (await this.findPost(id))?.addedOn ?? null;
  }

  async getPostExpiresOn(id: number): Promise<Date | null> {
    return (await this.findPost(id))?.expiresOn ?? null;
  }

  /** Ids of the tags linked to a post, ascending. */
  async getPostTags(postId: number): Promise<number[]> {
    const rows = await withStoreErrors(() =>
      this.db
        .select({ tagId: postTags.tagId })
        .from(postTags)
        .where(eq(postTags.postId, postId))
        .orderBy(asc(postTags.tagId))
    );
    return rows.map((row) => row.tagId);
  }

  async getPostComments(postId: number): Promise<Comment[]> {
    return withStoreErrors(() =>
      this.db.select().from(comments).where(eq(comments.postId, postId)).orderBy(asc(comments.id))
    );
  }

  // ==========================================================================
  // Tags
  // ==========================================================================

  async addTag(name: string, description: string | null, colour: string): Promise<number> {
    this.logger.info(`Adding tag '${name}'`);
    return withStoreErrors(async () => {
      const [row] = await this.db
        .insert(tags)
        .values({ name, description, colour, addedOn: this.now() })
        .returning({ id: tags.id });
      return row.id;
    });
  }

  async removeTag(id: number): Promise<boolean> {
    this.logger.info(`Removing tag ${id}`);
    return this.deleteWhere(() =>
      this.db.delete(tags).where(eq(tags.id, id)).returning({ id: tags.id })
    );
  }

  async updateTag(id: number, changes: TagUpdate): Promise<Tag | null> {
    const current = await this.findTag(id);
    if (!current) return null;

    this.logger.info(`Updating tag ${id}`);
    const next: Tag = {
      ...current,
      name: changes.name ?? current.name,
      description: changes.description !== undefined ? changes.description : current.description,
      colour: changes.colour ?? current.colour,
    };

    await withStoreErrors(() =>
      this.db
        .update(tags)
        .set({ name: next.name, description: next.description, colour: next.colour })
        .where(eq(tags.id, id))
    );
    return next;
  }

  async checkTagExists(id: number): Promise<boolean> {
    return this.exists(() => this.db.select({ id: tags.id }).from(tags).where(eq(tags.id, id)).limit(1));
  }

  async getTag(id: number): Promise<Tag | null> {
    return this.findTag(id);
  }

  async getTagName(id: number): Promise<string | null> {
    return (await this.findTag(id))?.name ?? null;
  }

  async getTagDescription(id: number): Promise<string | null> {
    return (await this.findTag(id))?.description ?? null;
  }

  async getTagColour(id: number): Promise<string | null> {
    return (await this.findTag(id))?.colour ?? null;
  }

  async getTagAddedOn(id: number): Promise<Date | null> {
    return (await this.findTag(id))?.addedOn ?? null;
  }

  /** Ids of the posts carrying a tag, ascending. */
  async getTagPosts(tagId: number): Promise<number[]> {
    const rows = await withStoreErrors(() =>
      this.db
        .select({ postId: postTags.postId })
        .from(postTags)
        .where(eq(postTags.tagId, tagId))
        .orderBy(asc(postTags.postId))
    );
    return rows.map((row) => row.postId);
  }

  // ==========================================================================
  // Comments
  // ==========================================================================

  async addComment(postId: number, userId: number, content: string): Promise<number> {
    this.logger.info(`Adding comment to post ${postId}`);
    return withStoreErrors(async () => {
      const [row] = await this.db
        .insert(comments)
        .values({ postId, userId, content, addedOn: this.now() })
        .returning({ id: comments.id });
      return row.id;
    });
  }

  async removeComment(id: number): Promise<boolean> {
    this.logger.info(`Removing comment ${id}`);
    return this.deleteWhere(() =>
      this.db.delete(comments).where(eq(comments.id, id)).returning({ id: comments.id })
    );
  }

  /** Rewrites a comment and stamps `editedOn`. */
  async updateComment(id: number, changes: CommentUpdate): Promise<Comment | null> {
    const current = await this.findComment(id);
    if (!current) return null;

    this.logger.info(`Updating comment ${id}`);
    const next: Comment = {
      ...current,
      content: changes.content ?? current.content,
      editedOn: this.now(),
    };

    await withStoreErrors(() =>
      this.db
        .update(comments)
        .set({ content: next.content, editedOn: next.editedOn })
        .where(eq(comments.id, id))
    );
    return next;
  }

  async checkCommentExists(id: number): Promise<boolean> {
    return this.exists(() =>
      this.db.select({ id: comments.id }).from(comments).where(eq(comments.id, id)).limit(1)
    );
  }

  async getComment(id: number): Promise<Comment | null> {
    return this.findComment(id);
  }

  async getCommentPostId(id: number): Promise<number | null> {
    return (await this.findComment(id))?.postId ?? null;
  }

  async getCommentUserId(id: number): Promise<number | null> {
    return (await this.findComment(id))?.userId ?? null;
  }

  async getCommentContent(id: number): Promise<string | null> {
    return (await this.findComment(id))?.content ?? null;
  }

  async getCommentAddedOn(id: number): Promise<Date | null> {
    return (await this.findComment(id))?.addedOn ?? null;
  }

  async getCommentEditedOn(id: number): Promise<Date | null> {
    return (await this.findComment(id))?.editedOn ?? null;
  }

  // ==========================================================================
  // Post tags
  // ==========================================================================

  /**
   * @throws ConstraintViolationException when the link already exists or
   * either side does not.
   */
  async addPostTag(postId: number, tagId: number): Promise<void> {
    this.logger.info(`Adding tag ${tagId} to post ${postId}`);
    await this.insertPostTag(postId, tagId);
  }

  async removePostTag(postId: number, tagId: number): Promise<boolean> {
    this.logger.info(`Removing tag ${tagId} from post ${postId}`);
    return this.deleteWhere(() =>
      this.db
        .delete(postTags)
        .where(and(eq(postTags.postId, postId), eq(postTags.tagId, tagId)))
        .returning({ postId: postTags.postId })
    );
  }

  async checkPostTagExists(postId: number, tagId: number): Promise<boolean> {
    return this.exists(() =>
      this.db
        .select({ postId: postTags.postId })
        .from(postTags)
        .where(and(eq(postTags.postId, postId), eq(postTags.tagId, tagId)))
        .limit(1)
    );
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async insertPostTag(postId: number, tagId: number): Promise<void> {
    await withStoreErrors(() => this.db.insert(postTags).values({ postId, tagId }));
  }

  private async findUser(id: number): Promise<UserRow | null> {
    const rows = await withStoreErrors(() => this.db.select().from(users).where(eq(users.id, id)).limit(1));
    return rows[0] ?? null;
  }

  private async findPost(id: number): Promise<Post | null> {
    const rows = await withStoreErrors(() => this.db.select().from(posts).where(eq(posts.id, id)).limit(1));
    return rows[0] ?? null;
  }

  private async findTag(id: number): Promise<Tag | null> {
    const rows = await withStoreErrors(() => this.db.select().from(tags).where(eq(tags.id, id)).limit(1));
    return rows[0] ?? null;
  }

  private async findComment(id: number): Promise<Comment | null> {
    const rows = await withStoreErrors(() =>
      this.db.select().from(comments).where(eq(comments.id, id)).limit(1)
    );
    return rows[0] ?? null;
  }

  private async exists(query: () => PromiseLike<unknown[]>): Promise<boolean> {
    const rows = await withStoreErrors(query);
    return rows.length > 0;
  }

  private async deleteWhere(query: () => PromiseLike<unknown[]>): Promise<boolean> {
    const removed = await withStoreErrors(query);
    return removed.length > 0;
  }
}
