// Interfaces
export type { ProviderClient, LogCallback } from "./interfaces/provider-client";

// Types
export type {
  InstancePhase,
  DesiredPhase,
  AcceleratorConfig,
  ImageReference,
  InstanceMetadata,
  InstanceSpec,
  ObservedState,
  Accepted,
} from "./types/instance";

// Errors
export {
  ProviderError,
  ProviderErrorKind,
  classifyProviderError,
  isNotFoundError,
} from "./errors/provider-error";

// Utilities
export { sanitizeLabels } from "./utils/sanitize";
