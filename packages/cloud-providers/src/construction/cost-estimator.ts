import {
  HOURLY_RATE_PER_VCPU,
  HOURS_PER_MONTH,
  PRICING_CURRENCY,
  PRIVATE_NETWORK_RATE_HOURLY,
  PUBLIC_NETWORK_RATE_HOURLY,
  STORAGE_RATE_PER_GB_HOUR,
} from "@vmforge/core";
import type { VMSpecification } from "@vmforge/core";

export interface CostEstimate {
  currency: string;
  vmCostHourly: number;
  storageCostHourly: number;
  networkCostHourly: number;
  totalHourly: number;
  estimatedMonthly: number;
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Simulated pricing: a per-vCPU hourly rate by VM type, a per-GB storage rate
 * and a flat network charge. No external price lookups.
 */
export function estimateCost(specification: VMSpecification): CostEstimate {
  const vmCost = HOURLY_RATE_PER_VCPU[specification.vmType] * specification.vmConfig.vcpus;
  const storageCost = specification.storageConfig.sizeGb * STORAGE_RATE_PER_GB_HOUR;
  const networkCost = specification.networkConfig.publicIp
    ? PUBLIC_NETWORK_RATE_HOURLY
    : PRIVATE_NETWORK_RATE_HOURLY;
  const totalHourly = vmCost + storageCost + networkCost;

  return {
    currency: PRICING_CURRENCY,
    vmCostHourly: roundTo(vmCost, 4),
    storageCostHourly: roundTo(storageCost, 4),
    networkCostHourly: roundTo(networkCost, 4),
    totalHourly: roundTo(totalHourly, 4),
    estimatedMonthly: roundTo(totalHourly * HOURS_PER_MONTH, 2),
  };
}
