export interface Actor {
  id: number;
  name: string;
}

export interface Genre {
  id: number;
  name: string;
}

export interface Movie {
  id: number;
  title: string;
  releaseYear: number;
  director: string;
  writer: string;
  producer: string;
  cinematographer: string;
  budget: number;
  country: string;
  /** Linked actors, in the order they were attached */
  actorIds: number[];
  /** Linked genres, in the order they were attached */
  genreIds: number[];
}

/**
 * Movie as supplied to create(); the store assigns the id
 */
export type MovieInput = Omit<Movie, 'id'>;

/**
 * Scalar columns of the movies table, compared field-by-field on update
 */
export type MovieDetails = Omit<Movie, 'id' | 'actorIds' | 'genreIds'>;

export const MOVIE_DETAIL_FIELDS = [
  'title',
  'releaseYear',
  'director',
  'writer',
  'producer',
  'cinematographer',
  'budget',
  'country',
] as const satisfies ReadonlyArray<keyof MovieDetails>;

/**
 * Genres are equal when both id and name match
 */
export function genresEqual(a: Genre, b: Genre): boolean {
  return a.id === b.id && a.name === b.name;
}
