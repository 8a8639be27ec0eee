/**
 * Heuristic keyword lists for role-aware retrieval.
 *
 * The scanner list and the boost list overlap but are kept apart on purpose:
 * each stage can be tuned (or overridden in tests) without moving the other.
 */

/** Role indicators looked for in the question by the role-context scanner (case-insensitive) */
export const ROLE_INDICATORS: readonly string[] = Object.freeze([
    "CEO", "CFO", "CTO", "CIO", "COO",
    "Chief Executive Officer", "Chief Financial Officer",
    "Chief Technology Officer", "Chief Innovation Officer",
    "Chief Operating Officer", "President", "Director",
    "Head of", "founder", "founded",
]);

/** Capitalized function words that never count as part of a name */
export const NAME_STOPLIST: readonly string[] = Object.freeze(["The", "In", "As", "By"]);

/** Lowercase keywords that trigger the extra role-focused similarity search */
export const ROLE_BOOST_KEYWORDS: readonly string[] = Object.freeze([
    "approved", "founded", "ceo", "cfo", "cto", "cio", "chief", "head", "director",
]);
