export { parseKeywords, KEYWORD_MARKER } from "./keywords.js";
export { parseReferences, formatReferences } from "./references.js";
export type { Reference } from "./references.js";
