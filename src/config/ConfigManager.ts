import dotenv from 'dotenv';
import { AppConfig, EmbeddingConfig, MatchingConfig, MediaConfig, RenamingConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { appConfigSchema } from '../validation/configSchemas.js';
import { ConfigurationError } from '../errors/index.js';

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Drop the cached instance so the next getInstance() re-reads the environment
   */
  static resetInstance(): void {
    ConfigManager.instance = undefined;
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = JSON.parse(JSON.stringify(defaultConfig));

    // File discovery
    config.media.videoExtensions = this.getExtensionList('VIDEO_EXTENSIONS', config.media.videoExtensions);
    config.media.subtitleExtensions = this.getExtensionList(
      'SUBTITLE_EXTENSIONS',
      config.media.subtitleExtensions
    );

    // Matching
    config.matching.strictMovieMode = this.getBoolean('MOVIE_STRICT_MODE', config.matching.strictMovieMode);
    config.matching.identifierCacheSize = this.getNumber(
      'IDENTIFIER_CACHE_SIZE',
      config.matching.identifierCacheSize
    );

    // Renaming
    config.renaming.languageSuffix = this.getString('RENAME_LANGUAGE_SUFFIX', config.renaming.languageSuffix);
    config.renaming.report = this.getBoolean('RENAME_REPORT', config.renaming.report);

    // Embedding
    config.embedding.mergeToolPath = this.getString('MKVMERGE_PATH', config.embedding.mergeToolPath);
    config.embedding.languageCode = this.getString('EMBED_LANGUAGE_CODE', config.embedding.languageCode);
    config.embedding.defaultTrack = this.getBoolean('EMBED_DEFAULT_TRACK', config.embedding.defaultTrack);
    config.embedding.report = this.getBoolean('EMBED_REPORT', config.embedding.report);
    config.embedding.backupDirName = this.getString('BACKUP_DIR_NAME', config.embedding.backupDirName);

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    return config;
  }

  private getString(key: string, defaultValue: string): string {
    const value = process.env[key];
    return value === undefined ? defaultValue : value.trim();
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const normalized = value.trim().toLowerCase();
    if (['true', 'yes', '1', 'on'].includes(normalized)) {
      return true;
    }
    if (['false', 'no', '0', 'off'].includes(normalized)) {
      return false;
    }
    return defaultValue;
  }

  /**
   * Comma-separated list, lowercased, leading dots stripped, invalid entries dropped.
   * Falls back to the default when nothing valid remains.
   */
  private getExtensionList(key: string, defaultValue: string[]): string[] {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = value
      .split(',')
      .map(item => item.trim().toLowerCase().replace(/^\.+/, ''))
      .filter(item => /^[a-z0-9_]+$/.test(item));
    return parsed.length > 0 ? parsed : defaultValue;
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (!match) {
      throw new ConfigurationError(key, `Environment variable ${key} must be one of: ${validValues.join(', ')}`);
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getMediaConfig(): MediaConfig {
    return this.config.media;
  }

  getMatchingConfig(): MatchingConfig {
    return this.config.matching;
  }

  getRenamingConfig(): RenamingConfig {
    return this.config.renaming;
  }

  getEmbeddingConfig(): EmbeddingConfig {
    return this.config.embedding;
  }

  reload(): void {
    dotenv.config();
    this.config = this.loadConfig();
  }

  validate(): void {
    const result = appConfigSchema.safeParse(this.config);
    if (result.success) {
      return;
    }

    const errors = result.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    const firstKey = result.error.errors[0]?.path.join('.') ?? 'config';
    throw new ConfigurationError(firstKey, `Configuration validation failed:\n${errors.join('\n')}`);
  }
}
