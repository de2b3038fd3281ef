import { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  media: {
    videoExtensions: ['mkv', 'mp4'],
    subtitleExtensions: ['srt', 'ass'],
  },
  matching: {
    strictMovieMode: false,
    movieSimilarityThreshold: 0.3,
    identifierCacheSize: 1024,
  },
  renaming: {
    languageSuffix: '',
    report: false,
  },
  embedding: {
    mergeToolPath: '',
    languageCode: '',
    defaultTrack: true,
    report: false,
    backupDirName: 'backups',
    containerExtensions: ['mkv'],
  },
  logging: {
    level: 'info',
    file: {
      enabled: false,
      path: './logs',
      maxSizeMb: 10,
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
};
