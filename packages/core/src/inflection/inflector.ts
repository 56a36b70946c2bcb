/**
 * Inflector
 *
 * Lightweight English inflection for Rails-style snake_case table names.
 * Just enough to derive singular, plural and foreign key forms; this is not
 * a linguistic inflector and misses irregular nouns outside the lookup table.
 *
 * Rule order is significant: ambiguous words change form if it moves.
 */

// ============================================================================
// Irregular Nouns
// ============================================================================

/** Plural to singular */
const IRREGULAR_PLURALS: Readonly<Record<string, string>> = {
  people: 'person',
  men: 'man',
  women: 'woman',
  children: 'child',
  teeth: 'tooth',
  feet: 'foot',
  geese: 'goose',
  mice: 'mouse',
  oxen: 'ox',
  data: 'datum',
  criteria: 'criterion',
  media: 'medium',
  alumni: 'alumnus',
  cacti: 'cactus',
  fungi: 'fungus',
  nuclei: 'nucleus',
  radii: 'radius',
  stimuli: 'stimulus',
  syllabi: 'syllabus',
  analyses: 'analysis',
  bases: 'basis',
  crises: 'crisis',
  diagnoses: 'diagnosis',
  hypotheses: 'hypothesis',
  parentheses: 'parenthesis',
  syntheses: 'synthesis',
  theses: 'thesis',
};

/** Singular to plural, the exact inverse of {@link IRREGULAR_PLURALS} */
const IRREGULAR_SINGULARS: Readonly<Record<string, string>> = Object.fromEntries(
  Object.entries(IRREGULAR_PLURALS).map(([plural, singular]) => [singular, plural])
);

const SIBILANT_PLURAL_SUFFIXES = ['sses', 'xes', 'zes', 'ches', 'shes'] as const;
const SIBILANT_SUFFIXES = ['s', 'x', 'z', 'ch', 'sh'] as const;
const VOWELS = 'aeiou';

function lookup(table: Readonly<Record<string, string>>, word: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(table, word) ? table[word] : undefined;
}

/**
 * Apply a transform to the last underscore-delimited segment only.
 */
function onLastSegment(word: string, transform: (segment: string) => string): string {
  const split = word.lastIndexOf('_');
  if (split === -1) {
    return transform(word);
  }
  return `${word.slice(0, split)}_${transform(word.slice(split + 1))}`;
}

// ============================================================================
// Singularize
// ============================================================================

function singularizeSegment(word: string): string {
  const irregular = lookup(IRREGULAR_PLURALS, word);
  if (irregular !== undefined) {
    return irregular;
  }

  // addresses -> address, boxes -> box, churches -> church, dishes -> dish
  if (SIBILANT_PLURAL_SUFFIXES.some(suffix => word.endsWith(suffix))) {
    return word.slice(0, -2);
  }

  // companies -> company
  if (word.endsWith('ies') && word.length > 4) {
    return `${word.slice(0, -3)}y`;
  }

  // knives -> knife
  if (word.endsWith('ves') && word.length > 4) {
    return `${word.slice(0, -3)}fe`;
  }

  // statuses -> status, buses -> bus
  if (word.endsWith('ses') && word.length > 4) {
    return word.slice(0, -2);
  }

  // heroes -> hero
  if (word.endsWith('oes') && word.length > 4) {
    return word.slice(0, -2);
  }

  if (word.endsWith('s') && !word.endsWith('ss')) {
    return word.slice(0, -1);
  }

  return word;
}

/**
 * Convert a plural table name to its singular form. Words that already look
 * singular come back unchanged (lowercased).
 *
 * @example singularize('reward_categories') // 'reward_category'
 */
export function singularize(word: string): string {
  if (!word) {
    return word;
  }
  return onLastSegment(word.toLowerCase(), singularizeSegment);
}

// ============================================================================
// Pluralize
// ============================================================================

function pluralizeSegment(word: string): string {
  const irregular = lookup(IRREGULAR_SINGULARS, word);
  if (irregular !== undefined) {
    return irregular;
  }

  // Already plural
  if (word.endsWith('ies')) {
    return word;
  }

  if (word.endsWith('fe')) {
    return `${word.slice(0, -2)}ves`;
  }

  const penultimate = word.charAt(word.length - 2);
  if (word.endsWith('y') && word.length > 2 && !VOWELS.includes(penultimate)) {
    return `${word.slice(0, -1)}ies`;
  }

  if (SIBILANT_SUFFIXES.some(suffix => word.endsWith(suffix))) {
    return `${word}es`;
  }

  return `${word}s`;
}

/**
 * Convert a singular model name to its plural table form.
 *
 * @example pluralize('post_checkin') // 'post_checkins'
 */
export function pluralize(word: string): string {
  if (!word) {
    return word;
  }
  return onLastSegment(word.toLowerCase(), pluralizeSegment);
}

// ============================================================================
// Class Names
// ============================================================================

/**
 * CamelCase model class to its conventional table name.
 *
 * @example classNameToTableName('UserRichNotification') // 'user_rich_notifications'
 * @example classNameToTableName('Person') // 'people'
 */
export function classNameToTableName(className: string): string {
  const snake = className.replace(/(?!^)(?=[A-Z])/g, '_').toLowerCase();
  return pluralize(snake);
}

/**
 * Singular snake_case name to its model class name.
 *
 * @example singularToClassName('reward_credit') // 'RewardCredit'
 */
export function singularToClassName(singular: string): string {
  return singular
    .split('_')
    .map(part => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join('');
}
