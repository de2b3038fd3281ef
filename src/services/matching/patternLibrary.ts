/**
 * Episode Pattern Library
 *
 * Ordered table of filename-decoding rules. Order is most specific first and
 * is part of the contract: a loose rule evaluated early would read `1080p`,
 * a release year or `x264` as an episode number.
 *
 * Every rule regex carries the `g` flag so the extractor can walk successive
 * candidates with matchAll() when a guard rejects the first one.
 */

export type PatternSpecificity = 'explicit' | 'loose';

export interface PatternCapture {
  /** undefined when the filename carries no season marker */
  season?: number;
  episode: number;
}

export interface EpisodePatternRule {
  readonly name: string;
  readonly specificity: PatternSpecificity;
  readonly regex: RegExp;
  readonly extract: (match: RegExpMatchArray) => PatternCapture | null;
  /** Reject captures equal to a 1900-2099 year */
  readonly rejectYears?: boolean;
  /** Reject matches touching a year, resolution or codec token */
  readonly guardTechnicalNeighbours?: boolean;
}

export const SEASON_RANGE = { min: 1, max: 99 } as const;
export const EPISODE_RANGE = { min: 1, max: 9999 } as const;

const YEAR_MIN = 1900;
const YEAR_MAX = 2099;

/**
 * Technical tokens that must never be read as episode numbers, and that a
 * loose match may not sit next to.
 */
const TECHNICAL_TOKEN = String.raw`(?:(?:19|20)\d{2}|\d{3,4}[pi]|\d{3,4}x\d{3,4}|[48]k|[xh]\.?26[45]|hevc|avc|xvid|divx|\d{1,2}-?bits?|ddp?\d(?:\.\d)?|aac\d?(?:\.\d)?|ac3|dts|web(?:-?dl|rip)?|bluray|bdrip|hdtv|remux)`;

const TECHNICAL_BEFORE = new RegExp(String.raw`(?:^|[^a-z0-9])${TECHNICAL_TOKEN}[ ._-]?$`, 'i');
const TECHNICAL_AFTER = new RegExp(String.raw`^[ ._-]?${TECHNICAL_TOKEN}(?:[^a-z0-9]|$)`, 'i');

function num(value: string | undefined): number | null {
  if (value === undefined) {
    return null;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? null : parsed;
}

/** Season and episode from capture groups 1 and 2 */
function seasonEpisode(match: RegExpMatchArray): PatternCapture | null {
  const season = num(match[1]);
  const episode = num(match[2]);
  if (season === null || episode === null) {
    return null;
  }
  return { season, episode };
}

/** Episode only from capture group 1, season absent */
function episodeOnly(match: RegExpMatchArray): PatternCapture | null {
  const episode = num(match[1]);
  return episode === null ? null : { episode };
}

const ORDINAL = String.raw`(\d{1,2})(?:st|nd|rd|th)\s+season`;

/**
 * The rule table. Index in this array is the rule's rank.
 */
export const EPISODE_PATTERNS: readonly EpisodePatternRule[] = [
  // S01E05, S2E10, S03 E02
  { name: 'S##E##', specificity: 'explicit', regex: /s(\d{1,2})\s?e(\d{1,4})/gi, extract: seasonEpisode },
  { name: 'S## Episode ##', specificity: 'explicit', regex: /s(\d{1,2})\s+episode\s+(\d{1,4})/gi, extract: seasonEpisode },
  // 2x05, 1x10 (needs separators on both sides so 1920x1080 never matches)
  {
    name: '##x##',
    specificity: 'explicit',
    regex: /(?:^|[._\s-])(\d{1,2})x(\d{1,3})(?=[._\s-]|$)/gi,
    extract: seasonEpisode,
  },
  { name: 'S## - E##', specificity: 'explicit', regex: /s(\d{1,2})\s*-\s*e(\d{1,4})(?![a-z])/gi, extract: seasonEpisode },
  { name: 'S## - EP##', specificity: 'explicit', regex: /s(\d{1,2})\s*-\s*ep\s*(\d{1,4})/gi, extract: seasonEpisode },
  { name: 'S## - ##', specificity: 'explicit', regex: /s(\d{1,2})\s*-\s*(\d{1,4})(?![a-z0-9])/gi, extract: seasonEpisode },
  { name: 'S##.E##', specificity: 'explicit', regex: /s(\d{1,2})\.e(\d{1,4})(?![a-z])/gi, extract: seasonEpisode },
  { name: 'S##_E##', specificity: 'explicit', regex: /s(\d{1,2})_e(\d{1,4})(?![a-z])/gi, extract: seasonEpisode },
  { name: 'S## EP##', specificity: 'explicit', regex: /s(\d{1,2})\s+ep\s*(\d{1,4})/gi, extract: seasonEpisode },
  { name: 'S##.EP##', specificity: 'explicit', regex: /s(\d{1,2})\.ep(\d{1,4})/gi, extract: seasonEpisode },

  // 2nd Season - 10, 3rd Season Episode 8, 2nd Season E10, 2nd Season EP10
  { name: '1st Season - ##', specificity: 'explicit', regex: new RegExp(`${ORDINAL}\\s*-\\s*(\\d{1,4})`, 'gi'), extract: seasonEpisode },
  { name: '1st Season Episode ##', specificity: 'explicit', regex: new RegExp(`${ORDINAL}\\s+episode\\s+(\\d{1,4})`, 'gi'), extract: seasonEpisode },
  { name: '1st Season EP##', specificity: 'explicit', regex: new RegExp(`${ORDINAL}\\s+ep\\s*(\\d{1,4})`, 'gi'), extract: seasonEpisode },
  { name: '1st Season E##', specificity: 'explicit', regex: new RegExp(`${ORDINAL}\\s+e\\s*(\\d{1,4})`, 'gi'), extract: seasonEpisode },

  // Season 2 - 23, Season12 - 103
  { name: 'Season ## - ##', specificity: 'explicit', regex: /season\s*(\d{1,2})\s*-\s*(\d{1,4})/gi, extract: seasonEpisode },
  // Season.1.Episode.5
  { name: 'Season.#.Episode.#', specificity: 'explicit', regex: /season\.(\d{1,2})[\s._-]*episode\.(\d{1,4})/gi, extract: seasonEpisode },
  // Season 1 Episode 5, Season01_Episode05, Season1Episode5
  { name: 'Season # Episode #', specificity: 'explicit', regex: /season\s*(\d{1,2})[\s_]*episode\s*(\d{1,4})/gi, extract: seasonEpisode },
  // Season 1 Ep 5, Season1.Ep5, Season 1 - Ep 5
  { name: 'Season # Ep #', specificity: 'explicit', regex: /season\s*(\d{1,2})[\s._-]*ep\.?\s*(\d{1,4})/gi, extract: seasonEpisode },
  // season2 e21
  { name: 'Season## E##', specificity: 'explicit', regex: /season\s*(\d{1,2})[\s._-]*e(\d{1,4})(?![a-z])/gi, extract: seasonEpisode },
  // S1.Ep.5, S1 Episode.5
  { name: 'S#.Ep.#', specificity: 'explicit', regex: /s(\d{1,2})[\s._-]*ep(?:isode)?\.(\d{1,4})/gi, extract: seasonEpisode },
  // S1Ep5, S1Episode5
  { name: 'S#Ep#', specificity: 'explicit', regex: /s(\d{1,2})ep(?:isode)?(\d{1,4})/gi, extract: seasonEpisode },

  // Season-less markers: the season defaults to 1
  {
    name: 'Ep##',
    specificity: 'explicit',
    regex: /(?:^|[._\s-])ep(?:isode)?[\s.]*(\d{1,4})(?=[._\s-]|$)/gi,
    extract: episodeOnly,
  },
  {
    name: 'E##',
    specificity: 'explicit',
    regex: /(?:^|[._\s-])e(\d{1,4})(?=[._\s-]|$)/gi,
    extract: episodeOnly,
  },

  // Loose bare-number rules. Only reached when nothing above matched.
  // Show 3 - 04
  {
    name: '## - ##',
    specificity: 'loose',
    regex: /(?<![0-9])(\d{1,2})\s*-\s*(\d{1,2})(?![a-z0-9])/gi,
    extract: seasonEpisode,
    guardTechnicalNeighbours: true,
  },
  // Show - 15
  {
    name: '- ##',
    specificity: 'loose',
    regex: /-\s*(\d{1,4})(?![a-z0-9])/gi,
    extract: episodeOnly,
    rejectYears: true,
    guardTechnicalNeighbours: true,
  },
  // [07]
  {
    name: '[##]',
    specificity: 'loose',
    regex: /\[(\d{1,4})\](?![a-z0-9])/gi,
    extract: episodeOnly,
    rejectYears: true,
    guardTechnicalNeighbours: true,
  },
  // Show_09
  {
    name: '_##',
    specificity: 'loose',
    regex: /_(\d{1,4})(?![a-z0-9])/gi,
    extract: episodeOnly,
    rejectYears: true,
    guardTechnicalNeighbours: true,
  },
];

export function isYear(value: number): boolean {
  return value >= YEAR_MIN && value <= YEAR_MAX;
}

export function isWithinBounds(capture: PatternCapture): boolean {
  const season = capture.season ?? 1;
  return (
    season >= SEASON_RANGE.min &&
    season <= SEASON_RANGE.max &&
    capture.episode >= EPISODE_RANGE.min &&
    capture.episode <= EPISODE_RANGE.max
  );
}

/**
 * True when the match touches (directly or across one separator) a year,
 * resolution or codec token.
 */
export function touchesTechnicalToken(text: string, start: number, end: number): boolean {
  return TECHNICAL_BEFORE.test(text.slice(0, start)) || TECHNICAL_AFTER.test(text.slice(end));
}

/**
 * Apply one rule to a name. Returns the first candidate that survives the
 * rule's guards, or null.
 */
export function applyRule(rule: EpisodePatternRule, text: string): PatternCapture | null {
  for (const match of text.matchAll(rule.regex)) {
    const capture = rule.extract(match);
    if (!capture || !isWithinBounds(capture)) {
      continue;
    }

    if (rule.rejectYears && isYear(capture.episode)) {
      continue;
    }

    if (rule.guardTechnicalNeighbours) {
      const start = match.index ?? 0;
      if (touchesTechnicalToken(text, start, start + match[0].length)) {
        continue;
      }
    }

    return capture;
  }
  return null;
}
