/**
 * tiling-config - Public API
 *
 * Config language engine for tiling window manager directive files and
 * hotkey daemon binding files: parse to typed models, generate canonical
 * text, validate, detect conflicts and exchange models as JSON.
 *
 * @module
 */

// Models
export * from "./src/models/binding-config.ts";
export * from "./src/models/diagnostic.ts";
export * from "./src/models/directive-config.ts";
export * from "./src/models/directive-settings.ts";
export * from "./src/models/engine-config.ts";
export * from "./src/models/enums.ts";
export * from "./src/models/exclusion-rule.ts";
export * from "./src/models/hotkey-binding.ts";
export * from "./src/models/signal.ts";
export * from "./src/models/space-config.ts";
export * from "./src/models/structured-error.ts";
export * from "./src/models/window-rule.ts";

// Engine
export * from "./src/services/property-tokenizer.ts";
export * from "./src/services/value-coercer.ts";
export * from "./src/services/category-classifier.ts";
export * from "./src/services/directive-parser.ts";
export * from "./src/services/directive-generator.ts";
export * from "./src/services/binding-parser.ts";
export * from "./src/services/binding-generator.ts";
export * from "./src/services/conflict-validator.ts";
export * from "./src/services/structure-validator.ts";
export * from "./src/services/settings-validator.ts";
export * from "./src/services/document-analyzer.ts";
export * from "./src/services/model-serializer.ts";
export * from "./src/services/presets.ts";

// Ambient
export { getLogger, Logger, LogLevel, resetLogger } from "./src/services/logger.ts";
export type { LogEntry, LoggerOptions } from "./src/services/logger.ts";
export { exitCodeFor, formatError } from "./src/services/error-handler.ts";
export { DISABLED_MARKER, VERSION } from "./src/constants.ts";
