import { AppConfig } from './types.js';

export const DEFAULT_GENRES: readonly string[] = [
  'Action',
  'Adventure',
  'Animation',
  'Biography',
  'Comedy',
  'Crime',
  'Documentary',
  'Drama',
  'Family',
  'Fantasy',
  'Film Noir',
  'History',
  'Horror',
  'Musical',
  'Mystery',
  'Romance',
  'Sci-Fi',
  'Sport',
  'Thriller',
  'War',
  'Western',
];

export const defaultConfig: AppConfig = {
  database: {
    directory: './data',
    name: 'movies',
  },
  logging: {
    level: 'info',
    file: {
      enabled: false,
      path: './logs',
      maxSize: '10',
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
  catalog: {
    autocomplete: {
      minLength: 3,
      limit: 10,
    },
    genreSeed: [...DEFAULT_GENRES],
  },
};
