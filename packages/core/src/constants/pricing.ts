/**
 * Simulated pricing used by cost estimation. All values are USD.
 */
import type { VMType } from "../provider";

export const HOURLY_RATE_PER_VCPU: Record<VMType, number> = {
  standard: 0.1,
  memory_optimized: 0.2,
  compute_optimized: 0.15,
};

export const STORAGE_RATE_PER_GB_HOUR = 0.001;
export const PUBLIC_NETWORK_RATE_HOURLY = 0.05;
export const PRIVATE_NETWORK_RATE_HOURLY = 0.02;
export const HOURS_PER_MONTH = 24 * 30;
export const PRICING_CURRENCY = "USD";

// Warning thresholds
export const HIGH_MEMORY_WARNING_GB = 32;
export const LARGE_STORAGE_WARNING_GB = 1000;
