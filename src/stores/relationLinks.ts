import { DatabaseConnection } from '../types/database.js';

/**
 * Junction tables linking a movie to its actors and genres.
 *
 * Table and column names only ever come from this closed table, so they can
 * be interpolated into SQL text safely.
 */
export const RELATION_LINKS = {
  actor: { table: 'movie_actors', column: 'actor_id' },
  genre: { table: 'movie_genres', column: 'genre_id' },
} as const;

export type RelationKind = keyof typeof RELATION_LINKS;

export interface LinkDiff {
  added: number[];
  removed: number[];
}

/**
 * Distinct ids in first-seen order
 */
export function uniqueIds(ids: readonly number[]): number[] {
  return [...new Set(ids)];
}

/**
 * Set difference between the persisted and requested link ids
 */
export function diffLinks(current: readonly number[], requested: readonly number[]): LinkDiff {
  const currentSet = new Set(current);
  const requestedSet = new Set(requested);

  return {
    added: uniqueIds(requested).filter(id => !currentSet.has(id)),
    removed: uniqueIds(current).filter(id => !requestedSet.has(id)),
  };
}

/**
 * Ids linked to a movie, in the order the links were inserted
 */
export async function fetchLinkedIds(
  db: DatabaseConnection,
  kind: RelationKind,
  movieId: number
): Promise<number[]> {
  const { table, column } = RELATION_LINKS[kind];
  const rows = await db.query<{ linked_id: number }>(
    `SELECT ${column} AS linked_id FROM ${table} WHERE movie_id = ? ORDER BY rowid`,
    [movieId]
  );
  return rows.map(row => row.linked_id);
}

/**
 * Ids of the movies linked to one actor or genre
 */
export async function fetchLinkedMovieIds(
  db: DatabaseConnection,
  kind: RelationKind,
  linkedId: number
): Promise<number[]> {
  const { table, column } = RELATION_LINKS[kind];
  const rows = await db.query<{ movie_id: number }>(
    `SELECT movie_id FROM ${table} WHERE ${column} = ? ORDER BY movie_id`,
    [linkedId]
  );
  return rows.map(row => row.movie_id);
}

export async function countLinks(
  db: DatabaseConnection,
  kind: RelationKind,
  linkedId: number
): Promise<number> {
  const { table, column } = RELATION_LINKS[kind];
  const row = await db.get<{ count: number }>(
    `SELECT COUNT(*) AS count FROM ${table} WHERE ${column} = ?`,
    [linkedId]
  );
  return row?.count ?? 0;
}

export async function addLinks(
  db: DatabaseConnection,
  kind: RelationKind,
  movieId: number,
  ids: readonly number[]
): Promise<void> {
  const { table, column } = RELATION_LINKS[kind];
  for (const id of ids) {
    await db.execute(`INSERT INTO ${table} (movie_id, ${column}) VALUES (?, ?)`, [movieId, id]);
  }
}

export async function removeLinks(
  db: DatabaseConnection,
  kind: RelationKind,
  movieId: number,
  ids: readonly number[]
): Promise<void> {
  const { table, column } = RELATION_LINKS[kind];
  for (const id of ids) {
    await db.execute(`DELETE FROM ${table} WHERE movie_id = ? AND ${column} = ?`, [movieId, id]);
  }
}

export async function removeAllLinks(
  db: DatabaseConnection,
  kind: RelationKind,
  movieId: number
): Promise<number> {
  const { table } = RELATION_LINKS[kind];
  const result = await db.execute(`DELETE FROM ${table} WHERE movie_id = ?`, [movieId]);
  return result.affectedRows;
}

/**
 * Bring the links of one kind in line with `requested`, touching only the difference
 */
export async function syncLinks(
  db: DatabaseConnection,
  kind: RelationKind,
  movieId: number,
  requested: readonly number[]
): Promise<LinkDiff> {
  const current = await fetchLinkedIds(db, kind, movieId);
  const diff = diffLinks(current, requested);

  await removeLinks(db, kind, movieId, diff.removed);
  await addLinks(db, kind, movieId, diff.added);

  return diff;
}
