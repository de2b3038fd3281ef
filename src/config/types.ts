export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface MediaConfig {
  videoExtensions: string[];
  subtitleExtensions: string[];
}

export interface MatchingConfig {
  /** Reject single/single movie pairs whose title overlap falls below the threshold */
  strictMovieMode: boolean;
  movieSimilarityThreshold: number;
  identifierCacheSize: number;
}

export interface RenamingConfig {
  languageSuffix: string;
  report: boolean;
}

export interface EmbeddingConfig {
  /** Empty string means "search bin/ and PATH" */
  mergeToolPath: string;
  languageCode: string;
  defaultTrack: boolean;
  report: boolean;
  backupDirName: string;
  containerExtensions: string[];
}

export interface LoggingConfig {
  level: LogLevel;
  file: {
    enabled: boolean;
    path: string;
    maxSizeMb: number;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface AppConfig {
  media: MediaConfig;
  matching: MatchingConfig;
  renaming: RenamingConfig;
  embedding: EmbeddingConfig;
  logging: LoggingConfig;
}
