/**
 * Default values applied when a configuration leaves a field unset.
 */

export const DEFAULT_KEY_PAIR_NAME = "default-key";
export const DEFAULT_FIREWALL_RULES = ["SSH"] as const;
export const DIRECTOR_FIREWALL_RULES = ["SSH", "HTTP", "HTTPS"] as const;
export const DEFAULT_STORAGE_IOPS = 3000;

// Template registry
export const DEFAULT_TEMPLATE_CATEGORY = "general";
export const CUSTOM_TEMPLATE_CATEGORY = "custom";
export const DERIVED_TEMPLATE_CATEGORY = "derived";

// Logging defaults
export const DEFAULT_LOG_LEVEL = "info";
export const DEFAULT_LOGGER_NAME = "vmforge";
