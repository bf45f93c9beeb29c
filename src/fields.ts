// ─── RESERVED FIELD NAMES (SINGLE SOURCE OF TRUTH) ───

export const TYPE_FIELD = 'type';

/** Fallback payload key, used when no entry is named after the type. */
export const PLUGIN_FIELD = 'plugin';
