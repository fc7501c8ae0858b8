/**
 * Scoutbook Constants
 *
 * Game-rule constants used as configuration defaults.
 */

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Window during which a manually asserted planet survives bulk-scan absence.
 */
export const DEFAULT_TRUST_WINDOW_DAYS = 7;

/**
 * Window during which a user-simulated report outranks every scouting report.
 */
export const DEFAULT_SIMULATED_FRESHNESS_DAYS = 7;

/**
 * Numeric type ids below this value are technologies, ids at or above are
 * ships (and defences, which count towards military strength).
 */
export const DEFAULT_TECH_SHIP_THRESHOLD = 200;

/**
 * Ship types excluded from military strength and from stored line items.
 *
 * 202 small cargo, 203 large cargo, 208 colony ship, 209 recycler,
 * 210 espionage ship, 212 solar satellite, 217 crawler
 */
export const DEFAULT_PEACEFUL_SHIP_TYPES: readonly number[] = [202, 203, 208, 209, 210, 212, 217];

/**
 * Planet type value the report detail feed uses for moons.
 */
export const MOON_PLANET_TYPE = 3;

/**
 * Prefix of scouting report tokens. Anything else is a battle-simulator string.
 */
export const SCOUT_REPORT_PREFIX = 'sr-';

/**
 * Reserved battle-simulator key carrying the coordinate string.
 */
export const BATTLESIM_COORDS_KEY = 'coords';

/**
 * Chat clients render ":100:" as an emoji; pasted keys come back with the glyph.
 */
export const HUNDRED_GLYPH = '\u{1F4AF}';

/**
 * Highscore tables published less than this apart from the last stored
 * snapshot are not stored again.
 */
export const HIGHSCORE_MIN_INTERVAL_MS = 5 * 60 * 1000;
