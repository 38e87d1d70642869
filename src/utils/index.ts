export { redactVariables, sanitizeQuery, isSensitiveKey } from "./redaction.js";

export { formatBytes, nestingDepth } from "./format.js";
