export {
  formatValidationErrors,
  validateToolParameters,
  parseToolParameters,
  getValidationSchema,
} from "./middleware.js";

export type { ValidationResult, ValidationError } from "./middleware.js";
